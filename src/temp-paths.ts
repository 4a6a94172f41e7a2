import fs from 'fs';
import path from 'path';

import { TMP_DIR } from './config.js';

/** Fresh temporary locations, one directory per call. */
export const TempPaths = {
  /** Empty directory usable as a mountpoint: $TMP/swi-mnt-XXXXXX */
  mountPoint(): string {
    return fs.mkdtempSync(path.join(TMP_DIR, 'swi-mnt-'));
  },

  /** Not-yet-created file named `name` inside a fresh $TMP/swi-get-XXXXXX */
  downloadFile(name: string): string {
    const dir = fs.mkdtempSync(path.join(TMP_DIR, 'swi-get-'));
    return path.join(dir, path.basename(name) || 'image.swi');
  },
} as const;
