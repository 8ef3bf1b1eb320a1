import type { ScalarKind } from '../../types/schema.types.js';

const TOKEN_KINDS = new Map<string, ScalarKind>([
  ['int', 'integer'],
  ['float', 'float'],
  ['list', 'list'],
]);

/** Unrecognized tokens, `"str"` included, resolve to text. */
export function resolveTypeToken(token: string): ScalarKind {
  return TOKEN_KINDS.get(token.trim().toLowerCase()) ?? 'text';
}
