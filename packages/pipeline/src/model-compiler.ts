/**
 * studiomdl wrapper.
 *
 * Runs the model compiler on one QC, moves the compiled files it reports
 * into the build output (keeping their path from the `models` folder on),
 * and collects the material names it dumps.
 */

import { existsSync, mkdirSync, readdirSync, renameSync, rmdirSync, unlinkSync, copyFileSync } from 'node:fs';
import path from 'node:path';

import type { BuildLogger } from './build-logger.js';
import { ExternalToolError } from './errors.js';
import { nodeProcessRunner, type ProcessRunner } from './process-runner.js';

export interface ModelCompileRequest {
  qcFile: string;
  /** Where compiled files go; null leaves them where the compiler wrote them. */
  outputDir: string | null;
  /** Passed as `-game`. */
  gameDir: string | null;
}

export interface ModelCompileResult {
  movedFiles: string[];
  /** Material names from the compiler's dump, sorted and unique. */
  materials: string[];
}

const MDL_WRITTEN = /writing\s+([^\n\r]+\.mdl)/gi;
const COMPANION_EXTENSIONS = ['.vvd', '.ani', '.phy'];

export function buildStudiomdlArgs(qcFile: string, gameDir: string | null): string[] {
  const args = ['-nop4', '-verbose', '-dumpmaterials'];
  if (gameDir) args.push('-game', path.resolve(gameDir));
  args.push(path.resolve(qcFile));
  return args;
}

export function parseWrittenModels(stdout: string): string[] {
  return [...stdout.matchAll(MDL_WRITTEN)].map((match) => match[1]!.trim());
}

/** `material 0 0 models\hero\cloth1` → `models/hero/cloth1`. */
export function parseDumpedMaterials(stdout: string): string[] {
  const materials = new Set<string>();
  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line.toLowerCase().startsWith('material')) continue;
    const fields = line.split(/\s+/);
    if (fields.length < 4) continue;
    materials.add(fields.slice(3).join(' ').replace(/\\/g, '/'));
  }
  return [...materials].sort();
}

/** The `.mdl` and its existing companions: `.vvd`, `.ani`, `.phy` and every `<stem>*.vtx`. */
export function collectModelArtifacts(mdlPath: string): string[] {
  const folder = path.dirname(mdlPath);
  const stem = path.basename(mdlPath, path.extname(mdlPath));
  const candidates = [mdlPath, ...COMPANION_EXTENSIONS.map((ext) => path.join(folder, `${stem}${ext}`))];
  if (existsSync(folder)) {
    for (const name of readdirSync(folder).sort()) {
      if (name.startsWith(stem) && name.toLowerCase().endsWith('.vtx')) candidates.push(path.join(folder, name));
    }
  }
  return candidates.filter((candidate) => existsSync(candidate));
}

/** Destination under `outputDir`, from the first `models` path segment on; the bare name otherwise. */
export function modelOutputPath(artifact: string, outputDir: string): string {
  const parts = path.resolve(artifact).split(path.sep);
  const index = parts.indexOf('models');
  const relative = index === -1 ? [path.basename(artifact)] : parts.slice(index);
  return path.join(outputDir, ...relative);
}

function moveFile(source: string, destination: string): void {
  mkdirSync(path.dirname(destination), { recursive: true });
  if (existsSync(destination)) unlinkSync(destination);
  try {
    renameSync(source, destination);
  } catch (err) {
    // Cross-device moves need a copy.
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    copyFileSync(source, destination);
    unlinkSync(source);
  }
}

/** Remove each folder and then its parents while they are empty, deepest first. */
export function removeEmptyFolders(folders: Iterable<string>): string[] {
  const removed: string[] = [];
  const ordered = [...new Set(folders)].sort((a, b) => b.split(path.sep).length - a.split(path.sep).length);
  for (const start of ordered) {
    let folder = start;
    while (existsSync(folder) && readdirSync(folder).length === 0) {
      rmdirSync(folder);
      removed.push(folder);
      const parent = path.dirname(folder);
      if (parent === folder) break;
      folder = parent;
    }
  }
  return removed;
}

export class ModelCompiler {
  constructor(
    private readonly executable: string,
    private readonly logger: BuildLogger,
    private readonly runner: ProcessRunner = nodeProcessRunner,
  ) {}

  /** Throws ExternalToolError when the compiler exits unsuccessfully. */
  compile(request: ModelCompileRequest): ModelCompileResult {
    if (path.extname(request.qcFile).toLowerCase() !== '.qc') {
      throw new ExternalToolError('studiomdl', null, `not a .qc file: ${request.qcFile}`);
    }

    const result = this.runner.run(this.executable, buildStudiomdlArgs(request.qcFile, request.gameDir), {
      cwd: path.dirname(path.resolve(request.qcFile)),
    });
    if (this.logger.verbose) this.logger.debug(result.stdout);
    if (result.status !== 0) {
      throw new ExternalToolError('studiomdl', result.status, result.stderr || result.stdout);
    }

    const movedFiles: string[] = [];
    const vacated = new Set<string>();
    for (const mdl of parseWrittenModels(result.stdout)) {
      if (!existsSync(mdl)) {
        this.logger.warn(`Expected output file missing: ${mdl}`);
        continue;
      }
      if (!request.outputDir) continue;
      for (const artifact of collectModelArtifacts(mdl)) {
        const destination = modelOutputPath(artifact, request.outputDir);
        moveFile(artifact, destination);
        movedFiles.push(destination);
        vacated.add(path.dirname(artifact));
        this.logger.debug(`Moved: ${artifact} -> ${destination}`);
      }
    }

    for (const folder of removeEmptyFolders(vacated)) {
      this.logger.debug(`Removed empty folder: ${folder}`);
    }

    const materials = parseDumpedMaterials(result.stdout);
    this.logger.debug(`Found ${materials.length} unique materials.`);
    return { movedFiles, materials };
  }
}
