import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  locateShader,
  locateTexture,
  normalizeMaterialName,
  normalizeTextureReference,
  readGameInfoSearchPaths,
} from './search-roots.js';
import { withTempDir, writeFile } from './test-helpers.js';

describe('normalizers', () => {
  it('strips the materials prefix, extensions and backslashes', () => {
    expect(normalizeMaterialName('materials\\models\\Hero\\cloth1.vmt')).toBe('models/Hero/cloth1');
    expect(normalizeMaterialName('/models//hero/')).toBe('models/hero');
    expect(normalizeTextureReference('Materials/models/hero/t.VTF')).toBe('models/hero/t');
  });
});

describe('locate', () => {
  it('prefers the first search root that holds the file', () => {
    withTempDir((dir) => {
      const first = join(dir, 'first');
      const second = join(dir, 'second');
      writeFile(join(second, 'materials', 'models', 'x', 'cloth1.vmt'), 'second');
      writeFile(join(first, 'materials', 'models', 'x', 'cloth1.vmt'), 'first');

      const result = locateShader('models/x/cloth1', [first, second]);
      expect(result).toEqual({
        found: true,
        file: {
          root: first,
          absolutePath: join(first, 'materials', 'models', 'x', 'cloth1.vmt'),
          relativePath: 'materials/models/x/cloth1.vmt',
        },
      });
    });
  });

  it('returns every path it tried when nothing matches', () => {
    withTempDir((dir) => {
      const result = locateTexture('models/x/t', [join(dir, 'a'), join(dir, 'b')]);

      expect(result).toEqual({
        found: false,
        relativePath: 'materials/models/x/t.vtf',
        tried: [
          join(dir, 'a', 'materials', 'models', 'x', 't.vtf'),
          join(dir, 'b', 'materials', 'models', 'x', 't.vtf'),
        ],
      });
    });
  });
});

describe('readGameInfoSearchPaths', () => {
  it('maps game entries to existing folders', () => {
    withTempDir((dir) => {
      mkdirSync(join(dir, 'hl2'));
      const gameinfo = writeFile(
        join(dir, 'mod', 'gameinfo.txt'),
        [
          '"GameInfo"',
          '{',
          '\tgame "Test Mod"',
          '\tFileSystem',
          '\t{',
          '\t\tSearchPaths',
          '\t\t{',
          '\t\t\tgame+mod\t\t|gameinfo_path|.',
          '\t\t\tgame\t\t|all_source_engine_paths|hl2',
          '\t\t\tgame\t\tmissing_dir',
          '\t\t\tplatform\t|all_source_engine_paths|platform',
          '\t\t}',
          '\t}',
          '}',
        ].join('\n'),
      );

      expect(readGameInfoSearchPaths(gameinfo)).toEqual([join(dir, 'mod'), join(dir, 'hl2')]);
    });
  });

  it('falls back to the parent folder without a SearchPaths block', () => {
    withTempDir((dir) => {
      const gameinfo = writeFile(join(dir, 'mod', 'gameinfo.txt'), '"GameInfo" { game "x" }');

      expect(readGameInfoSearchPaths(gameinfo)).toEqual([dir]);
    });
  });
});
