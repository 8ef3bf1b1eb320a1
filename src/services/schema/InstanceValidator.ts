import { z } from 'zod';
import { StructuralValidationError } from '../../utils/errors.js';
import type {
  ExtractedInstance,
  ExtractedValue,
  FieldDefinition,
  JsonValue,
  ScalarKind,
  TypeDefinition,
} from '../../types/schema.types.js';

type FieldSchema = z.ZodType<ExtractedValue, z.ZodTypeDef, unknown>;
export type InstanceSchema = z.ZodType<ExtractedInstance, z.ZodTypeDef, unknown>;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

function scalarSchema(kind: ScalarKind): FieldSchema {
  switch (kind) {
    case 'integer':
      return z.number().int();
    case 'float':
      return z.number();
    case 'list':
      return z.array(jsonValueSchema);
    case 'text':
      return z.string();
  }
}

function fieldSchema(field: FieldDefinition): FieldSchema {
  switch (field.type.kind) {
    case 'scalar':
      return scalarSchema(field.type.scalar).nullable().default(null);
    case 'record':
      return toZodSchema(field.type.definition).nullable().default(null);
    case 'recordList':
      return z
        .array(toZodSchema(field.type.definition))
        .nullish()
        .transform(items => items ?? []);
  }
}

/**
 * Derives the zod schema an LLM response must satisfy. Every field is
 * optional; undeclared keys are stripped.
 */
export function toZodSchema(definition: TypeDefinition): InstanceSchema {
  const shape: Record<string, FieldSchema> = Object.fromEntries(
    definition.fields.map(field => [field.name, fieldSchema(field)])
  );
  return z.object(shape);
}

export function validateInstance(raw: unknown, definition: TypeDefinition): ExtractedInstance {
  const result = toZodSchema(definition).safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new StructuralValidationError(
      `Model output does not match ${definition.name}: ${issues.join('; ')}`,
      { issues }
    );
  }

  return result.data;
}
