/**
 * Model build driver.
 *
 * Steps:
 *   1. Compile every model (main QC, then submodels), each with its own
 *      variable set, and copy the materials it uses
 *   2. Copy standalone material sets
 *   3. Process data sections
 *   4. Package each output folder (optional)
 *
 * A failing model is logged and counted; the build continues with the next.
 * In game mode models compile straight into the game folder and steps 2-4
 * are skipped.
 */

import { existsSync, unlinkSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import {
  VariableEnvironment,
  addBuildEntry,
  createBuildManifest,
  fileHashHex,
  flattenQc,
  formatDiagnostic,
  readQcMaterials,
  serializeBuildManifest,
  type BuildManifest,
  type BuildStep,
} from '@assetsmith/core';
import { readGameInfoSearchPaths, resolveAndCopy, type CopiedFile } from '@assetsmith/materials';

import type { BuildLogger } from './build-logger.js';
import { prepareCompileFolder, type CompileFolderMode } from './compile-folder.js';
import type { DefineValue, LoadedConfig, ModelEntry, ValveModelConfig } from './config.js';
import { DataProcessor, SHARED_ASSET_FOLDER, type DataItemResult } from './data-processor.js';
import { PipelineError } from './errors.js';
import { ModelCompiler } from './model-compiler.js';
import { Packager } from './packager.js';
import { nodeProcessRunner, type ProcessRunner } from './process-runner.js';
import { TextureEncoder } from './texture-encoder.js';

export const BUILD_MANIFEST_FILE = 'build-manifest.json';
export const TOOL_VERSION = '1.0.0';

/** 1: compile the QC as written. 2: compile a flattened copy. */
export type QcMode = 1 | 2;
/** 0: skip. 1: copy beside the model, unlocalized. 2: copy to the shared folder. */
export type MaterialMode = 0 | 1 | 2;

export interface BuildOptions {
  compileRoot: string;
  qcMode?: QcMode;
  materialMode?: MaterialMode;
  noMaterialLocalization?: boolean;
  keepFlatQc?: boolean;
  /** Compile into the game folder. A string names a folder holding gameinfo.txt. */
  game?: boolean | string;
  packageFiles?: boolean;
  /** How an existing output folder is cleared. */
  compileFolderMode?: CompileFolderMode;
}

export type ModelBuildStatus = 'compiled' | 'skipped' | 'failed';

export interface ModelBuildReport {
  name: string;
  status: ModelBuildStatus;
  /** Materials the compiler reported across the main QC and its submodels. */
  dumpedMaterials: string[];
  copiedMaterialFiles: string[];
}

export interface BuildReport {
  models: ModelBuildReport[];
  materialSets: Record<string, string[]>;
  data: DataItemResult[];
  packaged: string[];
  manifestPath: string | null;
}

// ---------------------------------------------------------------------------
// Variable sets
// ---------------------------------------------------------------------------

export interface ModelDefines {
  /** Apply to every QC of the model. */
  regular: Record<string, string>;
  /** Target (`qc` or a submodel name) → variables for that QC only. */
  targeted: Map<string, Record<string, string>>;
}

export function splitModelDefines(defines: Readonly<Record<string, DefineValue>>): ModelDefines {
  const regular: Record<string, string> = {};
  const targeted = new Map<string, Record<string, string>>();

  for (const [name, define] of Object.entries(defines)) {
    if (typeof define === 'string') {
      regular[name] = define;
    } else if (define.targets === undefined) {
      regular[name] = define.value;
    } else {
      for (const target of define.targets) {
        const forTarget = targeted.get(target) ?? {};
        forTarget[name] = define.value;
        targeted.set(target, forTarget);
      }
    }
  }
  return { regular, targeted };
}

/** Global, then model-wide, then target-specific values; later wins. */
export function definesForTarget(
  target: string,
  model: ModelDefines,
  global: Readonly<Record<string, string>>,
): Record<string, string> {
  return { ...global, ...model.regular, ...(model.targeted.get(target) ?? {}) };
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class BuildOrchestrator {
  private readonly config: ValveModelConfig;
  private readonly compileRoot: string;
  private readonly manifest: BuildManifest = createBuildManifest();
  private readonly timestamp = new Date().toISOString();
  private gameinfo: string | null;
  private searchRoots: string[] = [];

  constructor(
    private readonly loaded: LoadedConfig<ValveModelConfig>,
    private readonly options: BuildOptions,
    private readonly logger: BuildLogger,
    private readonly runner: ProcessRunner = nodeProcessRunner,
  ) {
    this.config = loaded.config;
    this.compileRoot = path.resolve(options.compileRoot);
    this.gameinfo = this.config.gameinfo ?? null;
  }

  private get gameMode(): boolean {
    return this.options.game !== undefined && this.options.game !== false;
  }

  run(): BuildReport {
    const report: BuildReport = { models: [], materialSets: {}, data: [], packaged: [], manifestPath: null };

    this.applyGameOverride();
    if (this.gameMode && !this.gameinfo) {
      throw new PipelineError('game mode requires a gameinfo path from the config or the game option');
    }

    if (this.gameinfo && existsSync(this.gameinfo)) {
      this.searchRoots = readGameInfoSearchPaths(this.gameinfo);
      this.logger.info('Game search paths:');
      for (const root of this.searchRoots) this.logger.info(`\t${root}`);
    } else {
      this.logger.warn('No gameinfo provided; material lookup is limited.');
    }

    const total = this.gameMode ? 1 : this.options.packageFiles ? 4 : 3;
    if (!this.gameMode) prepareCompileFolder(this.compileRoot, this.options.compileFolderMode ?? 'clean', this.logger);

    this.logger.banner(1, total, 'Compiling models');
    for (const [name, entry] of Object.entries(this.config.model)) {
      report.models.push(this.buildModel(name, entry));
    }
    if (this.gameMode) return report;

    this.logger.banner(2, total, 'Copying material sets');
    for (const [name, set] of Object.entries(this.config.material)) {
      report.materialSets[name] = this.copyMaterialSet(name, set.materials);
    }

    this.logger.banner(3, total, 'Processing data');
    const processor = this.dataProcessor();
    for (const [folder, items] of Object.entries(this.config.data)) {
      const results = processor.processItems(items, path.join(this.compileRoot, folder));
      this.recordData(results);
      report.data.push(...results);
    }

    if (this.options.packageFiles) {
      this.logger.banner(4, total, 'Packaging');
      report.packaged = this.packageOutput();
    }

    report.manifestPath = this.writeManifest();
    return report;
  }

  private applyGameOverride(): void {
    if (typeof this.options.game !== 'string') return;
    const candidate = path.join(path.resolve(this.options.game), 'gameinfo.txt');
    if (existsSync(candidate)) {
      this.gameinfo = candidate;
      this.logger.info(`Game override: using ${candidate}`);
    } else {
      this.logger.warn(`No gameinfo.txt in ${this.options.game}; ignoring the game path.`);
    }
  }

  private gameDir(): string | null {
    return this.gameinfo ? path.dirname(this.gameinfo) : null;
  }

  // -------------------------------------------------------------------------
  // Models
  // -------------------------------------------------------------------------

  private buildModel(name: string, entry: ModelEntry): ModelBuildReport {
    const log = this.logger.child('MODEL');
    const report: ModelBuildReport = { name, status: 'skipped', dumpedMaterials: [], copiedMaterialFiles: [] };

    if (!entry.compile) {
      log.warn(`Skipping model ${name} (compile=false)`);
      return report;
    }
    if (!existsSync(entry.qc)) {
      log.error(`QC file not found: ${entry.qc}`);
      return { ...report, status: 'failed' };
    }

    const outputDir = this.gameMode ? null : path.join(this.compileRoot, name);
    log.info(`Compiling model ${name}: ${path.basename(entry.qc)}`);

    const defines = splitModelDefines(entry.definevariable);
    const dumped = new Set<string>();

    try {
      const main = this.compileQc(entry.qc, name, definesForTarget('qc', defines, this.config.definevariable), outputDir);
      for (const material of main) dumped.add(material);
      log.info(`Compiled ${path.basename(entry.qc)} (${main.length} materials)`);
    } catch (err) {
      log.error(`Main QC compilation failed for ${name}: ${errorMessage(err)}`);
      return { ...report, status: 'failed' };
    }

    for (const [subName, subQc] of Object.entries(entry.submodels)) {
      const subPath = path.resolve(path.dirname(entry.qc), subQc);
      if (!existsSync(subPath)) {
        log.error(`Sub-QC not found: ${subPath}`);
        continue;
      }
      log.info(`Compiling sub-QC ${path.basename(subPath)} for submodel '${subName}'`);
      try {
        const variables = definesForTarget(subName, defines, this.config.definevariable);
        const materials = this.compileQc(subPath, `${name}_${subName}`, variables, outputDir);
        for (const material of materials) dumped.add(material);
        log.info(`Compiled ${path.basename(subPath)} (${materials.length} materials)`);
      } catch (err) {
        log.error(`Sub-QC ${path.basename(subPath)} failed: ${errorMessage(err)}`);
      }
    }

    report.status = 'compiled';
    report.dumpedMaterials = [...dumped].sort();
    if (!outputDir) return report;

    try {
      report.copiedMaterialFiles = this.copyModelMaterials(entry.qc, report.dumpedMaterials, outputDir);
      if (entry.subdata.length > 0) {
        this.recordData(this.dataProcessor().processItems(entry.subdata, outputDir));
      }
    } catch (err) {
      log.error(`Post-compile steps failed for ${name}: ${errorMessage(err)}`);
      return { ...report, status: 'failed' };
    }
    return report;
  }

  /** Compile one QC, flattening it first in QC mode 2. Returns the dumped material names. */
  private compileQc(
    qcFile: string,
    baseName: string,
    variables: Record<string, string>,
    outputDir: string | null,
  ): string[] {
    const log = this.logger.child('MODEL');
    let compiled = qcFile;

    if ((this.options.qcMode ?? 2) === 2) {
      const flat = flattenQc(qcFile, {
        variables: VariableEnvironment.fromRecord(variables),
        searchDirs: this.config.includedirs,
      });
      for (const diagnostic of flat.diagnostics) {
        if (diagnostic.severity === 'error') log.error(formatDiagnostic(diagnostic));
        else log.warn(formatDiagnostic(diagnostic));
      }
      compiled = path.join(path.dirname(qcFile), `temp_${baseName}.qc`);
      writeFileSync(compiled, flat.text);
      log.info(`QC mode 2: flattened ${path.basename(qcFile)} to ${path.basename(compiled)}`);
    } else {
      log.info('QC mode 1: using the QC file as written.');
    }

    try {
      const compiler = new ModelCompiler(this.config.studiomdl, log, this.runner);
      const result = compiler.compile({ qcFile: compiled, outputDir, gameDir: this.gameDir() });
      for (const file of result.movedFiles) this.record('model', qcFile, file);
      return result.materials;
    } finally {
      if (compiled !== qcFile && !this.options.keepFlatQc && existsSync(compiled)) unlinkSync(compiled);
    }
  }

  // -------------------------------------------------------------------------
  // Materials
  // -------------------------------------------------------------------------

  private copyModelMaterials(qcFile: string, dumped: readonly string[], outputDir: string): string[] {
    const log = this.logger.child('MATERIAL');
    const mode = this.options.materialMode ?? 2;
    if (mode === 0) {
      log.warn('Skipping model material copying (material mode 0)');
      return [];
    }

    const localize = mode === 2 && !this.options.noMaterialLocalization;
    const destinationRoot = mode === 1 ? outputDir : path.join(this.compileRoot, SHARED_ASSET_FOLDER);
    const names = readQcMaterials(qcFile, dumped, { searchDirs: this.config.includedirs });
    log.info(`Copying ${names.length} materials to ${destinationRoot} (localization: ${localize ? 'on' : 'off'})`);
    for (const name of names) log.debug(name);

    return this.copyMaterials(names, destinationRoot, localize);
  }

  private copyMaterialSet(name: string, materials: readonly string[]): string[] {
    const log = this.logger.child('MATERIAL');
    if (materials.length === 0) {
      log.warn(`[${name}] No materials listed; skipping.`);
      return [];
    }
    log.info(`[${name}] Copying material set...`);
    return this.copyMaterials(materials, path.join(this.compileRoot, name), true);
  }

  private copyMaterials(names: readonly string[], destinationRoot: string, localize: boolean): string[] {
    const log = this.logger.child('MATERIAL');
    const result = resolveAndCopy(names, { searchRoots: this.searchRoots, destinationRoot, localize });
    for (const warning of result.warnings) log.warn(warning.message);
    this.recordCopies(result.copies);
    log.info(`Material copy complete (${result.copiedFiles.length} files).`);
    return result.copiedFiles;
  }

  // -------------------------------------------------------------------------
  // Data, packaging, manifest
  // -------------------------------------------------------------------------

  private dataProcessor(): DataProcessor {
    const encoder = this.config.vtfcmd ? new TextureEncoder(this.config.vtfcmd, this.runner) : null;
    return new DataProcessor({ compileRoot: this.compileRoot, encoder, logger: this.logger.child('DATA') });
  }

  private packageOutput(): string[] {
    const log = this.logger.child('VPK');
    if (!this.config.vpk) {
      log.warn('No vpk executable in config; skipping packaging');
      return [];
    }
    return new Packager(this.config.vpk, log, this.runner).packAll(this.compileRoot);
  }

  private record(step: BuildStep, source: string, output: string): void {
    if (!existsSync(source) || !existsSync(output)) return;
    addBuildEntry(this.manifest, {
      sourcePath: toPosix(path.relative(this.loaded.baseDir, source)),
      sourceHash: fileHashHex(source),
      outputPath: toPosix(path.relative(this.compileRoot, output)),
      outputHash: fileHashHex(output),
      step,
      toolVersion: TOOL_VERSION,
      timestamp: this.timestamp,
    });
  }

  private recordCopies(copies: readonly CopiedFile[]): void {
    for (const copy of copies) this.record('material', copy.source, copy.destination);
  }

  private recordData(results: readonly DataItemResult[]): void {
    for (const result of results) {
      for (const file of result.written) this.record('data', result.input, file);
    }
  }

  private writeManifest(): string {
    const manifestPath = path.join(this.compileRoot, BUILD_MANIFEST_FILE);
    writeFileSync(manifestPath, serializeBuildManifest(this.manifest));
    return manifestPath;
  }
}
