export interface ExtractedDocument {
  text: string;
  pageCount: number;
}

export interface DocumentSource {
  extractText(content: Buffer): Promise<ExtractedDocument>;
}
