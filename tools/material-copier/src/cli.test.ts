import { existsSync, mkdirSync, mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { spawnSync } from 'node:child_process';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

interface CliResult {
  readonly status: number;
  readonly stdout: string;
  readonly stderr: string;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../../..');
const CLI_PATH = resolve(PROJECT_ROOT, 'tools/material-copier/src/cli.ts');
const TSX_PATH = resolve(PROJECT_ROOT, 'node_modules/tsx/dist/cli.mjs');

function runCopierCli(args: string[]): CliResult {
  const proc = spawnSync(process.execPath, [TSX_PATH, CLI_PATH, ...args], {
    cwd: PROJECT_ROOT,
    encoding: 'utf8',
  });

  return {
    status: proc.status ?? 1,
    stdout: typeof proc.stdout === 'string' ? proc.stdout : '',
    stderr: typeof proc.stderr === 'string' ? proc.stderr : '',
  };
}

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = mkdtempSync(join(tmpdir(), 'assetsmith-material-cli-'));
  try {
    return fn(realpathSync(dir));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

function writeFile(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

describe('material-copier CLI', () => {
  it('copies a material and its texture and warns about missing names', () => {
    withTempDir((dir) => {
      const root = join(dir, 'content');
      writeFile(join(root, 'materials', 'models', 'hero', 'cloth1.vmt'), 'VertexLitGeneric { $basetexture "models/hero/cloth1_d" }\n');
      writeFile(join(root, 'materials', 'models', 'hero', 'cloth1_d.vtf'), 'cloth');
      const output = join(dir, 'out');

      const result = runCopierCli(['--output', output, '--root', root, 'models/hero/cloth1', 'ghost/none']);

      expect(result.status).toBe(0);
      expect(result.stdout).toContain('Done. 1 material(s) resolved, 2 file(s) copied.');
      expect(result.stderr).toContain('[WARN] [MATERIAL] Material "ghost/none" not found in any search root');
      expect(readFileSync(join(output, 'materials', 'models', 'hero', 'cloth1_d.vtf'), 'utf8')).toBe('cloth');
      expect(existsSync(join(output, 'materials', 'models', 'hero', 'cloth1.vmt'))).toBe(true);
    });
  });

  it('requires a search root', () => {
    const result = runCopierCli(['--output', 'out', 'models/hero/cloth1']);

    expect(result.status).toBe(1);
    expect(result.stderr).toContain('Error: one of --gameinfo or --root is required.');
  });
});
