import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { ExternalToolError } from './errors.js';
import {
  ModelCompiler,
  buildStudiomdlArgs,
  modelOutputPath,
  parseDumpedMaterials,
  parseWrittenModels,
} from './model-compiler.js';
import { FakeRunner, captureLogger, withTempDir, writeFile } from './test-helpers.js';

describe('studiomdl output parsing', () => {
  it('finds written models and dumped materials', () => {
    const stdout = [
      'Processing hero.qc',
      'writing /game/models/hero/hero.mdl:',
      'material 0 0 models\\hero\\cloth1',
      '  material 1 0 models/hero/skin',
      'material 2 0 models\\hero\\cloth1',
      'materials: 3',
    ].join('\r\n');

    expect(parseWrittenModels(stdout)).toEqual(['/game/models/hero/hero.mdl']);
    expect(parseDumpedMaterials(stdout)).toEqual(['models/hero/cloth1', 'models/hero/skin']);
  });

  it('builds the argument list', () => {
    expect(buildStudiomdlArgs('/src/hero.qc', '/game/mod')).toEqual([
      '-nop4', '-verbose', '-dumpmaterials', '-game', '/game/mod', '/src/hero.qc',
    ]);
    expect(buildStudiomdlArgs('/src/hero.qc', null)).toEqual(['-nop4', '-verbose', '-dumpmaterials', '/src/hero.qc']);
  });

  it('keeps the path from the models folder on', () => {
    expect(modelOutputPath('/game/mod/models/hero/hero.vvd', '/out/hero')).toBe('/out/hero/models/hero/hero.vvd');
    expect(modelOutputPath('/game/mod/hero.vvd', '/out/hero')).toBe('/out/hero/hero.vvd');
  });
});

describe('ModelCompiler', () => {
  it('moves compiled files into the output and removes vacated folders', () => {
    withTempDir((dir) => {
      const game = join(dir, 'game');
      writeFile(join(game, 'gameinfo.txt'), '"GameInfo" {}');
      const qc = writeFile(join(dir, 'src', 'hero.qc'), '$modelname "hero/hero.mdl"\n');
      const built = join(game, 'models', 'hero');

      const runner = new FakeRunner(() => {
        for (const name of ['hero.mdl', 'hero.vvd', 'hero.phy', 'hero.dx90.vtx']) writeFile(join(built, name), name);
        return { stdout: `writing ${join(built, 'hero.mdl')}:\nmaterial 0 0 models\\hero\\cloth1\n` };
      });
      const { logger } = captureLogger();
      const out = join(dir, 'out', 'hero');

      const result = new ModelCompiler('studiomdl', logger, runner).compile({ qcFile: qc, outputDir: out, gameDir: game });

      expect(runner.calls).toEqual([{ command: 'studiomdl', args: buildStudiomdlArgs(qc, game) }]);
      expect(result.movedFiles).toEqual([
        join(out, 'models', 'hero', 'hero.mdl'),
        join(out, 'models', 'hero', 'hero.vvd'),
        join(out, 'models', 'hero', 'hero.phy'),
        join(out, 'models', 'hero', 'hero.dx90.vtx'),
      ]);
      expect(result.materials).toEqual(['models/hero/cloth1']);
      expect(readFileSync(join(out, 'models', 'hero', 'hero.vvd'), 'utf8')).toBe('hero.vvd');
      expect(existsSync(join(game, 'models'))).toBe(false);
      expect(existsSync(join(game, 'gameinfo.txt'))).toBe(true);
    });
  });

  it('throws when the compiler fails', () => {
    withTempDir((dir) => {
      const qc = writeFile(join(dir, 'hero.qc'), '');
      const runner = new FakeRunner(() => ({ status: 1, stderr: 'ERROR: bad qc\nmore' }));
      const { logger } = captureLogger();
      const compiler = new ModelCompiler('studiomdl', logger, runner);

      expect(() => compiler.compile({ qcFile: qc, outputDir: null, gameDir: null })).toThrow(ExternalToolError);
      expect(() => compiler.compile({ qcFile: qc, outputDir: null, gameDir: null })).toThrow(
        'studiomdl failed (exit 1): ERROR: bad qc',
      );
    });
  });
});
