export const EXTRACTION_RULES = `Extract the requested fields from the document text below.

RULES:
- Only extract information explicitly present in the text
- Never guess, infer or fabricate values
- Use null for any field that is not found in the text
- Use an empty list for list fields with no matching entries`;

export const EXTRACTION_PROMPT = (text: string) => `${EXTRACTION_RULES}

Document text:
${text}`;
