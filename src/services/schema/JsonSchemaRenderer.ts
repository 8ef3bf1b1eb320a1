import type { FieldDefinition, JsonObject, ScalarKind, TypeDefinition } from '../../types/schema.types.js';

const SCALAR_JSON_TYPES: Record<ScalarKind, string> = {
  text: 'string',
  integer: 'integer',
  float: 'number',
  list: 'array',
};

function renderField(field: FieldDefinition): JsonObject {
  switch (field.type.kind) {
    case 'scalar': {
      const rendered: JsonObject = {
        type: [SCALAR_JSON_TYPES[field.type.scalar], 'null'],
        description: field.description,
      };
      if (field.type.scalar === 'list') {
        rendered.items = {};
      }
      return rendered;
    }
    case 'record':
      return {
        anyOf: [renderJsonSchema(field.type.definition), { type: 'null' }],
        description: field.description,
      };
    case 'recordList':
      return {
        type: 'array',
        items: renderJsonSchema(field.type.definition),
        description: field.description,
      };
  }
}

/**
 * Renders a type definition as the JSON Schema handed to the model as tool
 * parameters. Nothing is listed as required.
 */
export function renderJsonSchema(definition: TypeDefinition): JsonObject {
  const properties: JsonObject = Object.fromEntries(definition.fields.map(field => [field.name, renderField(field)]));

  return {
    title: definition.name,
    type: 'object',
    properties,
    required: [],
  };
}
