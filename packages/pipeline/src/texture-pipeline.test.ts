import { statSync, utimesSync } from 'node:fs';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import type { ValveTextureConfig } from './config.js';
import { TextureEncoder } from './texture-encoder.js';
import { TexturePipeline, findMatchingFiles, isUpToDate, resolveTextureOutput } from './texture-pipeline.js';
import { FakeRunner, captureLogger, withTempDir, writeFile } from './test-helpers.js';

function vtfcmdFake(): FakeRunner {
  return new FakeRunner((call) => {
    const source = call.args[call.args.indexOf('-file') + 1] ?? '';
    const outputDir = call.args[call.args.indexOf('-output') + 1] ?? '';
    const stem = source.slice(source.lastIndexOf('/') + 1).replace(/\.[^.]+$/, '');
    writeFile(join(outputDir, `${stem}.vtf`), 'vtf');
    return {};
  });
}

const ICONS: ValveTextureConfig = {
  header: 'ValveTexture',
  vtfcmd: 'vtfcmd',
  vtf: { icons: { input: '^icon_.*\\.png$', output: 'out' } },
};

describe('texture paths', () => {
  it('matches a direct file or a name pattern', () => {
    withTempDir((dir) => {
      writeFile(join(dir, 'icon_b.png'), 'b');
      writeFile(join(dir, 'icon_a.png'), 'a');
      writeFile(join(dir, 'other.png'), 'o');
      writeFile(join(dir, 'sub', 'icon_c.png'), 'c');

      expect(findMatchingFiles('other.png', dir, false)).toEqual([join(dir, 'other.png')]);
      expect(findMatchingFiles('^icon_.*\\.png$', dir, false)).toEqual([join(dir, 'icon_a.png'), join(dir, 'icon_b.png')]);
      expect(findMatchingFiles('^icon_.*\\.png$', dir, true)).toEqual([
        join(dir, 'icon_a.png'),
        join(dir, 'icon_b.png'),
        join(dir, 'sub', 'icon_c.png'),
      ]);
      expect(findMatchingFiles('([', dir, false)).toEqual([]);
    });
  });

  it('resolves outputs from folder, file or default', () => {
    expect(resolveTextureOutput('/r/icon.png', { input: 'x' }, '/r')).toBe('/r/icon.vtf');
    expect(resolveTextureOutput('/r/icon.png', { input: 'x', output: 'hud' }, '/r')).toBe('/r/hud/icon.vtf');
    expect(resolveTextureOutput('/r/icon.png', { input: 'x', output: 'hud/main.tga' }, '/r')).toBe('/r/hud/main.vtf');
  });
});

describe('TexturePipeline', () => {
  it('encodes stale textures and syncs the output time to the source', () => {
    withTempDir((dir) => {
      const a = writeFile(join(dir, 'icon_a.png'), 'a');
      writeFile(join(dir, 'icon_b.png'), 'b');
      const runner = vtfcmdFake();
      const { logger } = captureLogger();
      const encoder = new TextureEncoder('vtfcmd', runner);

      const first = new TexturePipeline(ICONS, encoder, logger, { rootDir: dir }).run();
      expect(first.encoded).toEqual([
        { source: a, output: join(dir, 'out', 'icon_a.vtf') },
        { source: join(dir, 'icon_b.png'), output: join(dir, 'out', 'icon_b.vtf') },
      ]);
      expect(isUpToDate(a, join(dir, 'out', 'icon_a.vtf'))).toBe(true);

      const second = new TexturePipeline(ICONS, encoder, logger, { rootDir: dir }).run();
      expect(second.encoded).toEqual([]);
      expect(second.upToDate).toEqual([a, join(dir, 'icon_b.png')]);

      const later = new Date(statSync(a).mtimeMs + 60_000);
      utimesSync(a, later, later);
      const third = new TexturePipeline(ICONS, encoder, logger, { rootDir: dir }).run();
      expect(third.encoded.map((entry) => entry.source)).toEqual([a]);

      const forced = new TexturePipeline(ICONS, encoder, logger, { rootDir: dir, forceUpdate: true }).run();
      expect(forced.encoded).toHaveLength(2);
      expect(runner.calls).toHaveLength(5);
    });
  });

  it('encodes a file matched by two groups once', () => {
    withTempDir((dir) => {
      writeFile(join(dir, 'icon_a.png'), 'a');
      const config: ValveTextureConfig = {
        header: 'ValveTexture',
        vtfcmd: 'vtfcmd',
        vtf: { all: { input: '\\.png$' }, icons: { input: 'icon_a.png', output: 'icons' } },
      };
      const { logger, lines } = captureLogger();

      const result = new TexturePipeline(config, new TextureEncoder('vtfcmd', vtfcmdFake()), logger, { rootDir: dir }).run();

      expect(result.encoded).toEqual([{ source: join(dir, 'icon_a.png'), output: join(dir, 'icon_a.vtf') }]);
      expect(lines).toContain('[TEXTURE] Skipping icon_a.png: already processed');
    });
  });

  it('retries a file in a later group after its first encode fails', () => {
    withTempDir((dir) => {
      const source = writeFile(join(dir, 'icon_a.png'), 'a');
      const config: ValveTextureConfig = {
        header: 'ValveTexture',
        vtfcmd: 'vtfcmd',
        vtf: { all: { input: '\\.png$' }, icons: { input: 'icon_a.png', output: 'icons' } },
      };
      const working = vtfcmdFake();
      let attempts = 0;
      const runner = new FakeRunner((call) => {
        attempts += 1;
        if (attempts === 1) return { status: 1, stderr: 'bad' };
        working.run(call.command, call.args);
        return {};
      });
      const { logger } = captureLogger();

      const result = new TexturePipeline(config, new TextureEncoder('vtfcmd', runner), logger, { rootDir: dir }).run();

      expect(result.failed).toEqual([source]);
      expect(result.encoded).toEqual([{ source, output: join(dir, 'icons', 'icon_a.vtf') }]);
      expect(runner.calls).toHaveLength(2);
    });
  });

  it('logs a failed encode and continues', () => {
    withTempDir((dir) => {
      writeFile(join(dir, 'icon_a.png'), 'a');
      const { logger } = captureLogger();
      const runner = new FakeRunner(() => ({ status: 1, stderr: 'bad' }));

      const result = new TexturePipeline(ICONS, new TextureEncoder('vtfcmd', runner), logger, { rootDir: dir }).run();

      expect(result.failed).toEqual([join(dir, 'icon_a.png')]);
      expect(logger.summary().errors).toBe(1);
    });
  });
});
