import { ValidationError } from '../../utils/errors.js';
import type { SchemaDescription } from '../../types/schema.types.js';
import { isSchemaDescription } from './SchemaBuilder.js';

export const DEFAULT_SCHEMA_DESCRIPTION = '{"vendor": "str", "items": [{"name": "str", "price": "float"}]}';

const tryParse = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

/**
 * Parses a schema description sent as text. Single-quoted input such as
 * `{'vendor': 'str'}` is accepted by retrying with the quotes swapped.
 */
export function parseSchemaDescription(raw: string): SchemaDescription {
  const parsed = tryParse(raw) ?? tryParse(raw.replaceAll("'", '"'));

  if (!isSchemaDescription(parsed)) {
    throw new ValidationError(`Invalid JSON: ${raw}`);
  }

  return parsed;
}
