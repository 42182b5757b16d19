import { spawnSync } from 'node:child_process';

export interface ProcessResult {
  /** Exit status; null when the process could not be started or was killed. */
  status: number | null;
  stdout: string;
  stderr: string;
}

/** Runs an external executable to completion. Tests substitute an in-process fake. */
export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: { cwd?: string }): ProcessResult;
}

export const nodeProcessRunner: ProcessRunner = {
  run(command, args, options = {}) {
    const result = spawnSync(command, [...args], {
      cwd: options.cwd,
      encoding: 'utf8',
      maxBuffer: 64 * 1024 * 1024,
    });
    return {
      status: result.status,
      stdout: result.stdout ?? '',
      stderr: result.error ? `${result.error.message}\n${result.stderr ?? ''}` : (result.stderr ?? ''),
    };
  },
};
