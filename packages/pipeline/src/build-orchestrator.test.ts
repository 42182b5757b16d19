import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { basename, join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseBuildManifest } from '@assetsmith/core';

import { BuildOrchestrator, definesForTarget, splitModelDefines } from './build-orchestrator.js';
import { loadBuildConfig, type LoadedConfig, type ValveModelConfig } from './config.js';
import { FakeRunner, captureLogger, withTempDir, writeFile } from './test-helpers.js';

describe('model variables', () => {
  it('layers global, model-wide and targeted values', () => {
    const defines = splitModelDefines({
      skin: { value: 'red', targets: ['qc'] },
      arms: { value: 'long', targets: ['arms', 'legs'] },
      lod: '2',
      quality: { value: 'high' },
    });

    expect(defines.regular).toEqual({ lod: '2', quality: 'high' });
    expect(definesForTarget('qc', defines, { skin: 'plain', lod: '0' })).toEqual({ skin: 'red', lod: '2', quality: 'high' });
    expect(definesForTarget('arms', defines, { skin: 'plain' })).toEqual({ skin: 'plain', lod: '2', quality: 'high', arms: 'long' });
  });
});

interface Project {
  dir: string;
  gameDir: string;
  compileRoot: string;
  loaded: LoadedConfig<ValveModelConfig>;
}

function seedProject(dir: string): Project {
  const gameDir = join(dir, 'game', 'mod');
  writeFile(join(gameDir, 'gameinfo.txt'), '"GameInfo" { FileSystem { SearchPaths { game |gameinfo_path|. } } }');
  writeFile(join(gameDir, 'materials', 'models', 'hero', 'cloth1.vmt'), 'VertexLitGeneric { $basetexture "models/hero/cloth1_d" }\n');
  writeFile(join(gameDir, 'materials', 'models', 'hero', 'cloth1_d.vtf'), 'cloth');
  writeFile(join(gameDir, 'materials', 'props', 'crate.vmt'), 'LightmappedGeneric { $basetexture "props/crate" }\n');
  writeFile(join(gameDir, 'materials', 'props', 'crate.vtf'), 'crate');

  writeFile(join(dir, 'src', 'hero.qc'), '$modelname "hero/hero.mdl"\n$body body "$skin$.smd"\n');
  writeFile(join(dir, 'src', 'arms.qc'), '$modelname "hero/arms.mdl"\n$body arms "arms_$arms$_$skin$.smd"\n');
  writeFile(join(dir, 'src', 'broken.qc'), '$include "missing.qci"\n');
  writeFile(join(dir, 'data', 'readme.txt'), 'readme');

  const configPath = writeFile(
    join(dir, 'build.json'),
    JSON.stringify({
      header: 'ValveModel',
      studiomdl: 'studiomdl',
      vpk: 'vpk',
      gameinfo: 'game/mod/gameinfo.txt',
      definevariable: { skin: 'plain' },
      model: {
        hero: {
          qc: 'src/hero.qc',
          submodels: { arms: 'arms.qc' },
          definevariable: { skin: { value: 'red', targets: ['qc'] }, arms: { value: 'long', targets: ['arms'] } },
        },
        disabled: { qc: 'src/hero.qc', compile: false },
        broken: { qc: 'src/broken.qc' },
      },
      material: { props: { materials: ['props/crate'] } },
      data: { extras: [{ input: 'data/readme.txt', output: 'readme.txt' }] },
    }),
  );

  const loaded = loadBuildConfig(configPath);
  if (loaded.config.header !== 'ValveModel') throw new Error('expected a model config');
  return { dir, gameDir, compileRoot: join(dir, 'compile'), loaded: { ...loaded, config: loaded.config } };
}

/** studiomdl stand-in: records each QC it is given and writes the model it names. */
function studiomdlFake(gameDir: string, seenQc: Map<string, string>): FakeRunner {
  return new FakeRunner((call) => {
    if (call.command !== 'studiomdl') return {};
    const qc = call.args[call.args.length - 1] ?? '';
    const text = readFileSync(qc, 'utf8');
    seenQc.set(basename(qc), text);

    const name = /\$modelname\s+"hero\/(\w+)\.mdl"/.exec(text)?.[1] ?? 'unknown';
    const mdl = writeFile(join(gameDir, 'models', 'hero', `${name}.mdl`), name);
    writeFile(join(gameDir, 'models', 'hero', `${name}.vvd`), name);
    const dump = name === 'hero' ? 'material 0 0 models\\hero\\cloth1\n' : '';
    return { stdout: `writing ${mdl}:\n${dump}` };
  });
}

describe('BuildOrchestrator', () => {
  it('compiles models, copies materials and data, packages and writes a manifest', () => {
    withTempDir((dir) => {
      const project = seedProject(dir);
      const seenQc = new Map<string, string>();
      const runner = studiomdlFake(project.gameDir, seenQc);
      const { logger } = captureLogger();

      const report = new BuildOrchestrator(
        project.loaded,
        { compileRoot: project.compileRoot, packageFiles: true },
        logger,
        runner,
      ).run();

      expect(report.models.map((m) => [m.name, m.status])).toEqual([
        ['hero', 'compiled'],
        ['disabled', 'skipped'],
        ['broken', 'failed'],
      ]);

      expect(seenQc.get('temp_hero.qc')).toBe('$modelname "hero/hero.mdl"\n$body body "red.smd"\n');
      expect(seenQc.get('temp_hero_arms.qc')).toBe('$modelname "hero/arms.mdl"\n$body arms "arms_long_plain.smd"\n');
      expect(existsSync(join(dir, 'src', 'temp_hero.qc'))).toBe(false);

      const studiomdlCall = runner.calls.find((call) => call.command === 'studiomdl');
      expect(studiomdlCall?.args.slice(0, 5)).toEqual(['-nop4', '-verbose', '-dumpmaterials', '-game', project.gameDir]);

      const heroOut = join(project.compileRoot, 'hero', 'models', 'hero');
      expect(readFileSync(join(heroOut, 'hero.mdl'), 'utf8')).toBe('hero');
      expect(readFileSync(join(heroOut, 'arms.vvd'), 'utf8')).toBe('arms');
      expect(existsSync(join(project.gameDir, 'models'))).toBe(false);

      const sharedMaterials = join(project.compileRoot, 'AssetShared', 'materials', 'models', 'hero');
      expect(report.models[0]?.dumpedMaterials).toEqual(['models/hero/cloth1']);
      expect(report.models[0]?.copiedMaterialFiles).toEqual([
        join(sharedMaterials, 'cloth1_d.vtf'),
        join(sharedMaterials, 'cloth1.vmt'),
      ]);
      expect(report.materialSets['props']).toEqual([
        join(project.compileRoot, 'props', 'materials', 'props', 'crate.vtf'),
        join(project.compileRoot, 'props', 'materials', 'props', 'crate.vmt'),
      ]);
      expect(readFileSync(join(project.compileRoot, 'extras', 'readme.txt'), 'utf8')).toBe('readme');

      expect(report.packaged).toEqual(
        ['AssetShared', 'extras', 'hero', 'props'].map((folder) => join(project.compileRoot, folder)),
      );
      expect(runner.calls.filter((call) => call.command === 'vpk').map((call) => call.args)).toEqual(
        report.packaged.map((folder) => [folder]),
      );

      const manifest = parseBuildManifest(readFileSync(report.manifestPath ?? '', 'utf8'));
      expect(manifest?.entries.map((entry) => entry.outputPath).sort()).toEqual([
        'AssetShared/materials/models/hero/cloth1.vmt',
        'AssetShared/materials/models/hero/cloth1_d.vtf',
        'extras/readme.txt',
        'hero/models/hero/arms.mdl',
        'hero/models/hero/arms.vvd',
        'hero/models/hero/hero.mdl',
        'hero/models/hero/hero.vvd',
        'props/materials/props/crate.vmt',
        'props/materials/props/crate.vtf',
      ]);
      expect(manifest?.entries.find((entry) => entry.outputPath === 'extras/readme.txt')?.sourcePath).toBe('data/readme.txt');

      expect(logger.summary()).toEqual({ warnings: 1, errors: 1 });
    });
  });

  it('compiles straight into the game folder in game mode', () => {
    withTempDir((dir) => {
      const project = seedProject(dir);
      const seenQc = new Map<string, string>();
      const runner = studiomdlFake(project.gameDir, seenQc);
      const { logger } = captureLogger();

      const report = new BuildOrchestrator(
        project.loaded,
        { compileRoot: project.compileRoot, game: true, qcMode: 1 },
        logger,
        runner,
      ).run();

      expect(report.models[0]?.status).toBe('compiled');
      expect(report.manifestPath).toBeNull();
      expect(existsSync(join(project.gameDir, 'models', 'hero', 'hero.mdl'))).toBe(true);
      expect(existsSync(project.compileRoot)).toBe(false);
      expect(runner.calls.every((call) => call.command === 'studiomdl')).toBe(true);
      expect(seenQc.get('hero.qc')).toBe('$modelname "hero/hero.mdl"\n$body body "$skin$.smd"\n');
    });
  });

  it('copies model materials beside the model without localization in material mode 1', () => {
    withTempDir((dir) => {
      const project = seedProject(dir);
      const runner = studiomdlFake(project.gameDir, new Map());
      const { logger } = captureLogger();

      const report = new BuildOrchestrator(
        project.loaded,
        { compileRoot: project.compileRoot, materialMode: 1 },
        logger,
        runner,
      ).run();

      const modelMaterials = join(project.compileRoot, 'hero', 'materials', 'models', 'hero');
      expect(report.models[0]?.copiedMaterialFiles).toEqual([
        join(modelMaterials, 'cloth1_d.vtf'),
        join(modelMaterials, 'cloth1.vmt'),
      ]);
      expect(readFileSync(join(modelMaterials, 'cloth1.vmt'), 'utf8')).toBe(
        'VertexLitGeneric { $basetexture "models/hero/cloth1_d" }\n',
      );
    });
  });

  describe('model isolation', () => {
    function seedTwoModels(dir: string, aQc: string): { project: Project; runner: FakeRunner } {
      const gameDir = join(dir, 'game', 'mod');
      writeFile(join(gameDir, 'gameinfo.txt'), '"GameInfo" { FileSystem { SearchPaths { game |gameinfo_path|. } } }');
      writeFile(join(gameDir, 'materials', 'models', 'hero', 'cloth1.vmt'), 'VertexLitGeneric { $basetexture "models/hero/cloth1_d" }\n');
      writeFile(join(gameDir, 'materials', 'models', 'hero', 'cloth1_d.vtf'), 'cloth');
      writeFile(join(dir, 'src', 'a.qc'), aQc);
      writeFile(join(dir, 'src', 'b.qc'), '$modelname "hero/b.mdl"\n');
      const configPath = writeFile(
        join(dir, 'build.json'),
        JSON.stringify({
          header: 'ValveModel',
          studiomdl: 'studiomdl',
          gameinfo: 'game/mod/gameinfo.txt',
          model: { a: { qc: 'src/a.qc' }, b: { qc: 'src/b.qc' } },
        }),
      );
      const loaded = loadBuildConfig(configPath);
      if (loaded.config.header !== 'ValveModel') throw new Error('expected a model config');
      const compileRoot = join(dir, 'compile');

      const runner = new FakeRunner((call) => {
        const qc = call.args[call.args.length - 1] ?? '';
        const name = /\$modelname\s+"hero\/(\w+)\.mdl"/.exec(readFileSync(qc, 'utf8'))?.[1] ?? 'unknown';
        const mdl = writeFile(join(gameDir, 'models', 'hero', `${name}.mdl`), name);
        // A file where model a's material folder belongs makes its material copy throw.
        if (name === 'a' && aQc.includes('blocked')) writeFile(join(compileRoot, 'a', 'materials'), 'not a folder');
        return { stdout: `writing ${mdl}:\nmaterial 0 0 models\\hero\\cloth1\n` };
      });

      return { project: { dir, gameDir, compileRoot, loaded: { ...loaded, config: loaded.config } }, runner };
    }

    it('scans past an include that names a folder', () => {
      withTempDir((dir) => {
        const { project, runner } = seedTwoModels(dir, '$modelname "hero/a.mdl"\n$if 0\n$include "parts"\n$endif\n');
        mkdirSync(join(dir, 'src', 'parts'));
        const { logger } = captureLogger();

        const report = new BuildOrchestrator(project.loaded, { compileRoot: project.compileRoot }, logger, runner).run();

        expect(report.models.map((m) => [m.name, m.status])).toEqual([
          ['a', 'compiled'],
          ['b', 'compiled'],
        ]);
        expect(runner.calls).toHaveLength(2);
        expect(logger.summary().errors).toBe(0);
      });
    });

    it('fails only the model whose material copy throws and finishes the build', () => {
      withTempDir((dir) => {
        const { project, runner } = seedTwoModels(dir, '$modelname "hero/a.mdl"\n// blocked\n');
        const { logger, lines } = captureLogger();

        const report = new BuildOrchestrator(
          project.loaded,
          { compileRoot: project.compileRoot, materialMode: 1, qcMode: 1 },
          logger,
          runner,
        ).run();

        expect(report.models.map((m) => [m.name, m.status])).toEqual([
          ['a', 'failed'],
          ['b', 'compiled'],
        ]);
        expect(lines.some((line) => line.startsWith('[ERROR] [MODEL] Post-compile steps failed for a: '))).toBe(true);
        expect(readFileSync(join(project.compileRoot, 'b', 'materials', 'models', 'hero', 'cloth1_d.vtf'), 'utf8')).toBe('cloth');
        expect(report.manifestPath).toBe(join(project.compileRoot, 'build-manifest.json'));
        expect(logger.summary().errors).toBe(1);
      });
    });
  });
});
