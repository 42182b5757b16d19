import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { formatArchiveTimestamp, prepareCompileFolder } from './compile-folder.js';
import { captureLogger, withTempDir, writeFile } from './test-helpers.js';

describe('formatArchiveTimestamp', () => {
  it('pads every field', () => {
    expect(formatArchiveTimestamp(new Date(2024, 2, 9, 4, 5, 6))).toBe('2024-03-09_04-05-06');
  });
});

describe('prepareCompileFolder', () => {
  it('deletes the previous output in clean mode', () => {
    withTempDir((dir) => {
      const root = join(dir, 'compile');
      writeFile(join(root, 'hero', 'old.mdl'), 'old');
      const { logger, lines } = captureLogger();

      expect(prepareCompileFolder(root, 'clean', logger)).toBeNull();
      expect(readdirSync(root)).toEqual([]);
      expect(lines).toEqual(['[OS] Cleaning existing compile folder...']);
    });
  });

  it('moves the previous output aside in archive mode', () => {
    withTempDir((dir) => {
      const root = join(dir, 'compile');
      writeFile(join(root, 'hero', 'old.mdl'), 'old');
      const { logger } = captureLogger();

      const archived = prepareCompileFolder(root, 'archive', logger);

      expect(archived).toMatch(/[\\/]_archive[\\/]compile_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/);
      expect(readFileSync(join(archived ?? '', 'hero', 'old.mdl'), 'utf8')).toBe('old');
      expect(readdirSync(root)).toEqual([]);
    });
  });

  it('creates a missing folder', () => {
    withTempDir((dir) => {
      const root = join(dir, 'compile');
      const { logger, lines } = captureLogger();

      prepareCompileFolder(root, 'archive', logger);

      expect(existsSync(root)).toBe(true);
      expect(lines).toEqual(['[OS] No existing compile folder to clean.']);
    });
  });
});
