import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { BuildLogger } from './build-logger.js';
import type { ProcessResult, ProcessRunner } from './process-runner.js';

export function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = mkdtempSync(join(tmpdir(), 'assetsmith-pipeline-'));
  try {
    return fn(realpathSync(dir));
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function writeFile(filePath: string, content: string): string {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

export interface RecordedCall {
  command: string;
  args: string[];
}

/** In-process stand-in for external executables. */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: (call: RecordedCall) => Partial<ProcessResult> = () => ({})) {}

  run(command: string, args: readonly string[]): ProcessResult {
    const call = { command, args: [...args] };
    this.calls.push(call);
    return { status: 0, stdout: '', stderr: '', ...this.handler(call) };
  }
}

export interface CapturedLogger {
  logger: BuildLogger;
  lines: string[];
}

/** Logger whose output is collected instead of printed. */
export function captureLogger(verbose = false): CapturedLogger {
  const lines: string[] = [];
  const push = (line: string): void => {
    lines.push(line);
  };
  return { logger: BuildLogger.create({ verbose, sink: { log: push, warn: push, error: push } }), lines };
}
