import { existsSync, mkdirSync, readdirSync, renameSync, rmSync, statSync } from 'node:fs';
import path from 'node:path';

import type { BuildLogger } from './build-logger.js';

export type CompileFolderMode = 'clean' | 'archive';

export const ARCHIVE_FOLDER = '_archive';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `2024-03-09_14-05-00`, local time. */
export function formatArchiveTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

/**
 * Clear the previous build output before a new build. `archive` moves the
 * folder to `<parent>/_archive/<name>_<timestamp>`; `clean` deletes it.
 * Returns the archive path when one was made.
 */
export function prepareCompileFolder(compileRoot: string, mode: CompileFolderMode, logger: BuildLogger): string | null {
  const log = logger.child('OS');
  if (!existsSync(compileRoot) || readdirSync(compileRoot).length === 0) {
    log.info('No existing compile folder to clean.');
    mkdirSync(compileRoot, { recursive: true });
    return null;
  }

  if (mode === 'archive') {
    const archiveDir = path.join(path.dirname(compileRoot), ARCHIVE_FOLDER);
    mkdirSync(archiveDir, { recursive: true });
    const stamp = formatArchiveTimestamp(statSync(compileRoot).mtime);
    let target = path.join(archiveDir, `${path.basename(compileRoot)}_${stamp}`);
    for (let n = 2; existsSync(target); n++) {
      target = path.join(archiveDir, `${path.basename(compileRoot)}_${stamp}_${n}`);
    }
    renameSync(compileRoot, target);
    mkdirSync(compileRoot, { recursive: true });
    log.info(`Archived compile folder to: ${target}`);
    return target;
  }

  log.info('Cleaning existing compile folder...');
  rmSync(compileRoot, { recursive: true, force: true });
  mkdirSync(compileRoot, { recursive: true });
  return null;
}
