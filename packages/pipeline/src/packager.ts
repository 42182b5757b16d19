import { existsSync, readdirSync, statSync } from 'node:fs';
import path from 'node:path';

import type { BuildLogger } from './build-logger.js';
import { ExternalToolError } from './errors.js';
import { nodeProcessRunner, type ProcessRunner } from './process-runner.js';

/** vpk wrapper: one archive per folder. */
export class Packager {
  constructor(
    private readonly executable: string,
    private readonly logger: BuildLogger,
    private readonly runner: ProcessRunner = nodeProcessRunner,
  ) {}

  packFolder(folder: string): void {
    const target = path.resolve(folder);
    if (!existsSync(target) || !statSync(target).isDirectory()) {
      throw new ExternalToolError('vpk', null, `folder not found: ${target}`);
    }
    this.logger.info(`Packaging folder: ${target}`);
    const result = this.runner.run(this.executable, [target]);
    if (result.status !== 0) {
      throw new ExternalToolError('vpk', result.status, result.stderr || result.stdout);
    }
    this.logger.info(`Packaged folder into VPK: ${target}`);
  }

  /** Pack every sub-folder of `outputRoot`; failures are logged. Returns the packed folders. */
  packAll(outputRoot: string): string[] {
    const packed: string[] = [];
    const folders = readdirSync(outputRoot, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => path.join(outputRoot, entry.name))
      .sort();

    for (const folder of folders) {
      try {
        this.packFolder(folder);
        packed.push(folder);
      } catch (err) {
        this.logger.error(`VPK packaging failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return packed;
  }
}
