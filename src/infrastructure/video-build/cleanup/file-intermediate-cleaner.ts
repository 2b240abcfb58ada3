import { promises as fs } from 'node:fs';

import type { IntermediateCleaner } from '../../../domain/video-container/index.js';
import { hasErrorCode } from '../../../shared/errors/errno.js';
import { createChildLogger } from '../../../shared/logger/pino.js';

export class FileIntermediateCleaner implements IntermediateCleaner {
  private readonly logger = createChildLogger({ module: 'FileIntermediateCleaner' });

  public async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn({ error, path: filePath }, 'Failed to remove intermediate file');
      }
      return false;
    }
  }
}
