/**
 * YamlMountRegistry: IMountRegistry over a YAML file shaped like
 *
 *   mounts:
 *     ONL-IMAGES:
 *       dir: /mnt/onl/images
 *       fsck: true
 */
import fs from 'fs';
import yaml from 'js-yaml';
import path from 'path';

import { MOUNT_REGISTRY_PATH } from '../config.js';
import { logger } from '../logger.js';
import type { MountRecord } from '../types.js';
import type { IMountRegistry, RegistryMatch } from './mount-registry.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class YamlMountRegistry implements IMountRegistry {
  constructor(private readonly registryPath: string = MOUNT_REGISTRY_PATH) {}

  entries(): MountRecord[] {
    let doc: unknown;
    try {
      doc = yaml.load(fs.readFileSync(this.registryPath, 'utf-8'));
    } catch (err) {
      logger.warn(
        { registryPath: this.registryPath, err },
        'Mount registry unreadable, treating as empty',
      );
      return [];
    }
    if (!isRecord(doc) || !isRecord(doc.mounts)) return [];

    const records: MountRecord[] = [];
    for (const [label, entry] of Object.entries(doc.mounts)) {
      if (isRecord(entry) && typeof entry.dir === 'string') {
        records.push({ label, directory: entry.dir });
      }
    }
    return records;
  }

  lookup(label: string): string | null {
    return this.entries().find((r) => r.label === label)?.directory ?? null;
  }

  findByPath(target: string): RegistryMatch | null {
    const normalized = path.resolve(target);
    let best: RegistryMatch | null = null;

    for (const record of this.entries()) {
      const dir = path.resolve(record.directory);
      const rel = path.relative(dir, normalized);
      if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) continue;
      if (!best || dir.length > path.resolve(best.directory).length) {
        best = { ...record, relativePath: rel };
      }
    }
    return best;
  }
}
