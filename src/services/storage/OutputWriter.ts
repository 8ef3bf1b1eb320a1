import { writeFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { OutputPersistenceError } from '../../utils/errors.js';

/** Best-effort persistence of the latest result. Failures are logged, never thrown. */
export class OutputWriter {
  async write(path: string, content: string): Promise<boolean> {
    try {
      await writeFile(path, content, 'utf-8');
      logger.debug({ path, size: content.length }, 'Output saved');
      return true;
    } catch (error) {
      const failure = new OutputPersistenceError('Failed to save output', {
        path,
        reason: error instanceof Error ? error.message : String(error),
      });
      logger.warn({ error: failure, details: failure.details }, failure.message);
      return false;
    }
  }
}
