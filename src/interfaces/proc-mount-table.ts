/**
 * ProcMountTable: ILiveMountTable read fresh from /proc/mounts on each call.
 */
import fs from 'fs';
import path from 'path';

import { PROC_MOUNTS_PATH } from '../config.js';
import type { LiveMount } from '../types.js';
import type { ILiveMountTable } from './live-mount-table.js';

// Spaces and friends in mount paths appear as \040 style octal escapes
function unescapeField(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, oct: string) =>
    String.fromCharCode(parseInt(oct, 8)),
  );
}

function realpathOrSelf(p: string): string {
  try {
    return fs.realpathSync(p);
  } catch {
    return p;
  }
}

export class ProcMountTable implements ILiveMountTable {
  constructor(private readonly mountsPath: string = PROC_MOUNTS_PATH) {}

  list(): LiveMount[] {
    const mounts: LiveMount[] = [];
    for (const line of fs.readFileSync(this.mountsPath, 'utf-8').split('\n')) {
      const [device, directory] = line.trim().split(/\s+/);
      if (!device || !directory) continue;
      mounts.push({
        device: unescapeField(device),
        directory: unescapeField(directory),
      });
    }
    return mounts;
  }

  mountsOf(device: string): LiveMount[] {
    const wanted = new Set([device, realpathOrSelf(device)]);
    return this.list().filter(
      (m) => wanted.has(m.device) || wanted.has(realpathOrSelf(m.device)),
    );
  }

  mountAt(directory: string): LiveMount | null {
    const target = path.resolve(directory);
    // Later lines shadow earlier mounts on the same directory
    return this.list().filter((m) => m.directory === target).at(-1) ?? null;
  }
}
