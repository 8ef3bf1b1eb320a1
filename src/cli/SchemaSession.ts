import { ValidationError } from '../utils/errors.js';
import type { SchemaDescription, TypeDefinition } from '../types/schema.types.js';
import { buildTypeDefinition } from '../services/schema/SchemaBuilder.js';

interface SessionField {
  typeToken: string;
  description: string;
}

/**
 * Accumulates fields entered over several console turns. Re-adding a name
 * replaces its type and description in place. `finish` closes the session.
 */
export class SchemaSession {
  private fields = new Map<string, SessionField>();
  private finished = false;

  get fieldCount(): number {
    return this.fields.size;
  }

  addField(name: string, typeToken: string, description = ''): void {
    if (this.finished) {
      throw new ValidationError('Schema definition is already finished');
    }

    const fieldName = name.trim();
    if (!fieldName) {
      throw new ValidationError('Field name must not be empty');
    }

    this.fields.set(fieldName, { typeToken: typeToken.trim(), description: description.trim() });
  }

  finish(): TypeDefinition {
    this.finished = true;

    const description: SchemaDescription = Object.fromEntries(
      [...this.fields].map(([name, field]) => [name, field.typeToken])
    );
    const descriptions = new Map([...this.fields].map(([name, field]) => [name, field.description]));

    return buildTypeDefinition(description, { descriptions });
  }
}
