import { ValidationError } from '../../utils/errors.js';
import type {
  FieldDefinition,
  JsonValue,
  SchemaDescription,
  TypeDefinition,
} from '../../types/schema.types.js';
import { resolveTypeToken } from './TypeResolver.js';

export const DEFAULT_TYPE_NAME = 'Ext';

export interface BuildOptions {
  name?: string;
  /** Overrides for the generated descriptions of top-level fields. Blank entries are ignored. */
  descriptions?: ReadonlyMap<string, string>;
}

export function isSchemaDescription(value: unknown): value is SchemaDescription {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Plain objects cannot hold this key as data; assignment reaches the prototype.
const RESERVED_FIELD_NAMES: ReadonlySet<string> = new Set(['__proto__']);

// Non-string tokens keep their JSON spelling, so `[]` or `["int"]` fall through to text.
const tokenOf = (value: JsonValue): string => (typeof value === 'string' ? value : JSON.stringify(value));

export function buildTypeDefinition(description: SchemaDescription, options: BuildOptions = {}): TypeDefinition {
  const name = options.name ?? DEFAULT_TYPE_NAME;

  if (!isSchemaDescription(description)) {
    throw new ValidationError('Schema description must be an object', { name });
  }

  const fields: FieldDefinition[] = [];

  for (const [fieldName, value] of Object.entries(description)) {
    if (RESERVED_FIELD_NAMES.has(fieldName)) {
      throw new ValidationError(`Field name "${fieldName}" is reserved`, { name });
    }

    const override = options.descriptions?.get(fieldName)?.trim();
    const listItem = Array.isArray(value) ? value[0] : undefined;

    if (isSchemaDescription(value)) {
      fields.push({
        name: fieldName,
        type: { kind: 'record', definition: buildTypeDefinition(value, { name: `${name}_${fieldName}` }) },
        optional: true,
        description: override || `Ext ${fieldName}`,
      });
    } else if (isSchemaDescription(listItem)) {
      fields.push({
        name: fieldName,
        type: { kind: 'recordList', definition: buildTypeDefinition(listItem, { name: `${name}_${fieldName}_i` }) },
        optional: true,
        description: override || `Ext list ${fieldName}`,
      });
    } else {
      fields.push({
        name: fieldName,
        type: { kind: 'scalar', scalar: resolveTypeToken(tokenOf(value)) },
        optional: true,
        description: override || `Ext ${fieldName}`,
      });
    }
  }

  return { name, fields };
}
