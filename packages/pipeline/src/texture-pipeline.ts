/**
 * Texture-only builds: encode groups of images to VTF.
 *
 * Each group names its input as a file under the root folder or as a
 * regular expression matched against file names. Outputs that are at
 * least as new as their source are skipped, and each output's mtime is
 * set to its source's after encoding.
 */

import { existsSync, mkdirSync, readdirSync, statSync, utimesSync } from 'node:fs';
import path from 'node:path';

import type { BuildLogger } from './build-logger.js';
import type { TextureGroup, ValveTextureConfig } from './config.js';
import type { TextureEncoder } from './texture-encoder.js';

export interface TexturePipelineOptions {
  /** Folder group inputs and outputs are relative to. */
  rootDir: string;
  forceUpdate?: boolean;
  /** Let a file matched by several groups be encoded by each. */
  allowReprocess?: boolean;
  /** Match regex inputs in sub-folders too. */
  recursive?: boolean;
}

export interface TextureRunResult {
  encoded: { source: string; output: string }[];
  upToDate: string[];
  failed: string[];
}

function listFiles(dir: string, recursive: boolean): string[] {
  const files: string[] = [];
  if (!existsSync(dir)) return files;
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (recursive) files.push(...listFiles(fullPath, true));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/** An existing file under `rootDir`, else every file whose name matches `input` as a regex. */
export function findMatchingFiles(input: string, rootDir: string, recursive: boolean): string[] {
  const direct = path.resolve(rootDir, input);
  if (existsSync(direct) && statSync(direct).isFile()) return [direct];

  let pattern: RegExp;
  try {
    pattern = new RegExp(input);
  } catch {
    // Not a file and not a valid expression.
    return [];
  }
  return listFiles(rootDir, recursive)
    .filter((file) => pattern.test(path.basename(file)))
    .sort((left, right) => left.localeCompare(right));
}

/** `output` without an extension is a folder; with one, its stem names the VTF. */
export function resolveTextureOutput(source: string, group: TextureGroup, rootDir: string): string {
  const stem = path.basename(source, path.extname(source));
  if (!group.output) return path.join(rootDir, `${stem}.vtf`);

  const output = path.resolve(rootDir, group.output);
  const ext = path.extname(output);
  if (ext === '') return path.join(output, `${stem}.vtf`);
  return `${output.slice(0, -ext.length)}.vtf`;
}

// utimes stores whole milliseconds; sub-millisecond source times compare as equal.
const MTIME_SLACK_MS = 1;

export function isUpToDate(source: string, output: string): boolean {
  if (!existsSync(output)) return false;
  return statSync(output).mtimeMs + MTIME_SLACK_MS >= statSync(source).mtimeMs;
}

export class TexturePipeline {
  private readonly processed = new Set<string>();
  private readonly log: BuildLogger;

  constructor(
    private readonly config: ValveTextureConfig,
    private readonly encoder: TextureEncoder,
    logger: BuildLogger,
    private readonly options: TexturePipelineOptions,
  ) {
    this.log = logger.child('TEXTURE');
  }

  run(): TextureRunResult {
    const result: TextureRunResult = { encoded: [], upToDate: [], failed: [] };
    const groups = Object.entries(this.config.vtf);
    if (groups.length === 0) {
      this.log.warn("No 'vtf' groups in config; nothing to process");
      return result;
    }

    for (const [name, group] of groups) {
      this.log.info(`Processing texture group: ${name}`);
      const files = findMatchingFiles(group.input, this.options.rootDir, this.options.recursive ?? false);
      if (files.length === 0) {
        this.log.warn(`No matching file(s) found for: ${group.input}`);
        continue;
      }
      for (const source of files) this.processFile(source, group, result);
    }
    return result;
  }

  private processFile(source: string, group: TextureGroup, result: TextureRunResult): void {
    if (!this.options.allowReprocess && this.processed.has(source)) {
      this.log.info(`Skipping ${path.basename(source)}: already processed`);
      return;
    }

    const output = resolveTextureOutput(source, group, this.options.rootDir);
    if (!this.options.forceUpdate && isUpToDate(source, output)) {
      this.log.info(`Skipping ${path.basename(source)} (up to date)`);
      this.processed.add(source);
      result.upToDate.push(source);
      return;
    }

    this.log.info(`Converting: ${path.basename(source)} -> ${path.basename(output)}`);
    try {
      mkdirSync(path.dirname(output), { recursive: true });
      this.encoder.encode(source, output, { flags: group.vtf?.flags, extraArgs: group.vtf?.encoder_args });
      const stat = statSync(source);
      utimesSync(output, stat.atime, stat.mtime);
      this.log.debug(`Finished VTF: ${output} (mtime synced to source)`);
      this.processed.add(source);
      result.encoded.push({ source, output });
    } catch (err) {
      this.log.error(`Failed to export ${source} -> ${output}: ${err instanceof Error ? err.message : String(err)}`);
      result.failed.push(source);
    }
  }
}
