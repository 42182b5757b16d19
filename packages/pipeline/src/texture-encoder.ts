/**
 * vtfcmd wrapper: image → VTF.
 */

import { copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'node:fs';
import path from 'node:path';

import { ExternalToolError } from './errors.js';
import { nodeProcessRunner, type ProcessRunner } from './process-runner.js';

export interface NormalMapOptions {
  kernel?: string;
  height?: string;
  alpha?: string;
  scale?: number;
}

export interface VtfEncodeOptions {
  /** Pixel format, DXT5 unless given. */
  format?: string;
  /** Alpha pixel format; defaults to `format`. */
  alphaFormat?: string;
  version?: string;
  /** VTF flags such as NOMIP or CLAMPS; NOMIP also disables mipmaps. */
  flags?: readonly string[];
  resize?: { width: number; height: number };
  resizeMethod?: string;
  resizeFilter?: string;
  sharpenFilter?: string;
  noMipmaps?: boolean;
  normalMap?: boolean | NormalMapOptions;
  gammaCorrection?: number;
  /** Appended verbatim. */
  extraArgs?: readonly string[];
  silent?: boolean;
}

export const DEFAULT_VTF_FORMAT = 'DXT5';
export const DEFAULT_VTF_VERSION = '7.4';

export function buildVtfCmdArgs(source: string, outputDir: string, options: VtfEncodeOptions = {}): string[] {
  const format = options.format ?? DEFAULT_VTF_FORMAT;
  const args = [
    '-file', source,
    '-output', outputDir,
    '-format', format,
    '-version', options.version ?? DEFAULT_VTF_VERSION,
    '-resize',
  ];

  if (options.resize) {
    args.push('-rwidth', String(options.resize.width), '-rheight', String(options.resize.height));
  }
  if (options.resizeMethod) args.push('-rmethod', options.resizeMethod.toUpperCase());
  if (options.resizeFilter) args.push('-rfilter', options.resizeFilter.toUpperCase());
  if (options.sharpenFilter) args.push('-rsharpen', options.sharpenFilter.toUpperCase());

  args.push('-alphaformat', options.alphaFormat ?? format);
  if (options.silent ?? true) args.push('-silent');

  let noMipmaps = options.noMipmaps ?? false;
  for (const flag of options.flags ?? []) {
    const clean = flag.trim().toUpperCase();
    if (clean === '') continue;
    args.push('-flag', clean);
    if (clean === 'NOMIP') noMipmaps = true;
  }
  if (noMipmaps) args.push('-nomipmaps');

  if (options.normalMap) {
    args.push('-normal');
    if (typeof options.normalMap === 'object') {
      const normal = options.normalMap;
      if (normal.kernel !== undefined) args.push('-nkernel', normal.kernel);
      if (normal.height !== undefined) args.push('-nheight', normal.height);
      if (normal.alpha !== undefined) args.push('-nalpha', normal.alpha);
      if (normal.scale !== undefined) args.push('-nscale', String(normal.scale));
    }
  }

  if (options.gammaCorrection !== undefined) {
    args.push('-gamma', '-gcorrection', String(options.gammaCorrection));
  }

  args.push(...(options.extraArgs ?? []));
  return args;
}

export class TextureEncoder {
  constructor(
    private readonly executable: string,
    private readonly runner: ProcessRunner = nodeProcessRunner,
  ) {}

  /**
   * Encode `source` into `destination`. A `.vtf` source is copied as is.
   * vtfcmd names its output after the source stem; that file is moved
   * onto `destination`.
   */
  encode(source: string, destination: string, options: VtfEncodeOptions = {}): string {
    const src = path.resolve(source);
    const dst = path.resolve(destination);
    mkdirSync(path.dirname(dst), { recursive: true });

    if (path.extname(src).toLowerCase() === '.vtf') {
      copyFileSync(src, dst);
      return dst;
    }

    const result = this.runner.run(this.executable, buildVtfCmdArgs(src, path.dirname(dst), options));
    if (result.status !== 0) {
      throw new ExternalToolError('vtfcmd', result.status, result.stderr || result.stdout);
    }

    const converted = path.join(path.dirname(dst), `${path.basename(src, path.extname(src))}.vtf`);
    if (converted !== dst) {
      if (existsSync(dst)) unlinkSync(dst);
      renameSync(converted, dst);
    }
    return dst;
  }
}
