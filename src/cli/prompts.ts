import { createInterface } from 'readline';
import { ValidationError } from '../utils/errors.js';
import { SchemaSession } from './SchemaSession.js';

export type Ask = (question: string) => Promise<string>;

export interface Prompter {
  ask: Ask;
  close: () => void;
}

export function createPrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  const ask: Ask = question =>
    new Promise((resolve, reject) => {
      if (closed) {
        reject(new ValidationError('Input closed before all answers were given'));
        return;
      }
      const onClose = () => reject(new ValidationError('Input closed before all answers were given'));
      rl.once('close', onClose);
      rl.question(question, answer => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });

  return { ask, close: () => rl.close() };
}

export async function collectSchema(ask: Ask): Promise<SchemaSession> {
  const session = new SchemaSession();

  while (true) {
    const name = (await ask("Field name (or 'done'): ")).trim();
    if (name.toLowerCase() === 'done') {
      break;
    }
    if (!name) {
      continue;
    }

    const typeToken = (await ask('Type (str/int/float/list): ')).trim();
    const description = (await ask('Description: ')).trim();
    session.addField(name, typeToken, description);
  }

  return session;
}

/** Strips whitespace and the quotes terminals add around dragged-in paths. */
export const cleanPathInput = (raw: string): string => raw.trim().replace(/^['"]+|['"]+$/g, '');
