import type {
  ExtractedInstance,
  ExtractedValue,
  FieldDefinition,
  JsonObject,
  JsonValue,
  TypeDefinition,
} from '../../types/schema.types.js';
import { isSchemaDescription } from './SchemaBuilder.js';

const isInstance = (value: unknown): value is ExtractedInstance => isSchemaDescription(value);

function materializeField(field: FieldDefinition, value: ExtractedValue | undefined): JsonValue {
  switch (field.type.kind) {
    case 'scalar':
      if (value === undefined) {
        return null;
      }
      return Array.isArray(value) ? structuredClone(value) : value;
    case 'record':
      return isInstance(value) ? materialize(value, field.type.definition) : null;
    case 'recordList': {
      const items: JsonValue[] = [];
      if (Array.isArray(value)) {
        for (const item of value) {
          if (isInstance(item)) {
            items.push(materialize(item, field.type.definition));
          }
        }
      }
      return items;
    }
  }
}

/**
 * Projects a validated instance onto plain JSON. Keys follow the field order
 * of the definition, so equal instances serialize to identical text.
 */
export function materialize(instance: ExtractedInstance, definition: TypeDefinition): JsonObject {
  return Object.fromEntries(
    definition.fields.map(field => [
      field.name,
      materializeField(field, Object.hasOwn(instance, field.name) ? instance[field.name] : undefined),
    ])
  );
}

export function serializeResult(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}
