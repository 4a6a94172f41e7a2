import fs from 'fs';
import path from 'path';

import { logger } from '../logger.js';

/** Drop the private temp directory a failed fetch wrote into. */
export function discardDownload(target: string): void {
  try {
    fs.rmSync(path.dirname(target), { recursive: true, force: true });
  } catch (err) {
    logger.warn({ target, err }, 'Failed to remove partial download');
  }
}

/** Remove a mountpoint nothing is mounted on any more. */
export function removeMountPoint(directory: string): void {
  try {
    fs.rmdirSync(directory);
  } catch (err) {
    logger.warn({ directory, err }, 'Failed to remove temporary mountpoint');
  }
}
