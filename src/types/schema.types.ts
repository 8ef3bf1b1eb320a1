export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * User-declared field schema. Values are type tokens (`"str"`, `"int"`,
 * `"float"`, `"list"`), nested descriptions, or a one-element array holding
 * the description of each list entry. Anything else is read as a token.
 */
export interface SchemaDescription {
  [field: string]: JsonValue;
}

export type ScalarKind = 'text' | 'integer' | 'float' | 'list';

export interface ScalarFieldType {
  kind: 'scalar';
  scalar: ScalarKind;
}

export interface RecordFieldType {
  kind: 'record';
  definition: TypeDefinition;
}

export interface RecordListFieldType {
  kind: 'recordList';
  definition: TypeDefinition;
}

export type FieldType = ScalarFieldType | RecordFieldType | RecordListFieldType;

export interface FieldDefinition {
  name: string;
  type: FieldType;
  optional: boolean;
  description: string;
}

export interface TypeDefinition {
  name: string;
  fields: FieldDefinition[];
}

export type ExtractedValue = string | number | JsonValue[] | ExtractedInstance | ExtractedInstance[] | null;

export interface ExtractedInstance {
  [field: string]: ExtractedValue;
}
