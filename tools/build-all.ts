#!/usr/bin/env tsx
/**
 * Asset build pipeline.
 *
 * Reads a JSON build config and runs the build its header selects.
 *
 * Usage:
 *   npm run build:assets -- <config.json> [options]
 *
 * ValveModel steps:
 *   1. Compile models (QC flatten → studiomdl) and copy their materials
 *   2. Copy material sets
 *   3. Process data items
 *   4. Package output folders (with --package-files)
 *
 * ValveTexture builds encode each configured texture group to VTF.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  BuildLogger,
  ConfigError,
  loadBuildConfig,
  runBuild,
  type LoadedConfig,
  type MaterialMode,
  type QcMode,
  type RunBuildOptions,
} from '@assetsmith/pipeline';

const DEFAULT_EXPORT_FOLDER = 'compile';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  configPath: string;
  exportDir: string | null;
  baseDir: string | null;
  verbose: boolean;
  logFile: string | null;
  options: Omit<RunBuildOptions, 'compileRoot'>;
}

function parseMode<T extends number>(flag: string, value: string | undefined, allowed: readonly T[]): T {
  const mode = allowed.find((candidate) => String(candidate) === value);
  if (mode === undefined) {
    console.error(`Error: ${flag} expects one of ${allowed.join(', ')}, got "${value ?? ''}"`);
    process.exit(1);
  }
  return mode;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  let configPath = '';
  let exportDir: string | null = null;
  let baseDir: string | null = null;
  let verbose = false;
  let logFile: string | null = null;
  const options: Omit<RunBuildOptions, 'compileRoot'> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--exportdir':
        exportDir = args[++i] ?? '';
        break;
      case '--basedir':
        baseDir = args[++i] ?? '';
        break;
      case '--game': {
        const next = args[i + 1];
        // A folder argument only follows once the config path has been read.
        if (next !== undefined && !next.startsWith('--') && configPath !== '') {
          options.game = path.resolve(next);
          i++;
        } else {
          options.game = true;
        }
        break;
      }
      case '--qc-mode':
        options.qcMode = parseMode<QcMode>(arg, args[++i], [1, 2]);
        break;
      case '--keep-flat-qc':
        options.keepFlatQc = true;
        break;
      case '--mat-mode':
        options.materialMode = parseMode<MaterialMode>(arg, args[++i], [0, 1, 2]);
        break;
      case '--no-mat-local':
        options.noMaterialLocalization = true;
        break;
      case '--package-files':
        options.packageFiles = true;
        break;
      case '--archive-old-ver':
        options.compileFolderMode = 'archive';
        break;
      case '--forceupdate':
        options.forceUpdate = true;
        break;
      case '--allow-reprocess':
        options.allowReprocess = true;
        break;
      case '--recursive':
        options.recursive = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--log':
        logFile = path.resolve(args[++i] ?? 'build.log');
        break;
      case '--help':
        printUsage();
        process.exit(0);
        break;
      default:
        if (arg.startsWith('--') || configPath !== '') {
          console.error(`Error: Unexpected argument: ${arg}\n`);
          printUsage();
          process.exit(1);
        }
        configPath = arg;
    }
  }

  if (!configPath) {
    console.error('Error: a config file is required.\n');
    printUsage();
    process.exit(1);
  }

  if (!fs.existsSync(configPath)) {
    console.error(`Error: Config file not found: ${configPath}`);
    process.exit(1);
  }

  return {
    configPath: path.resolve(configPath),
    exportDir: exportDir ? path.resolve(exportDir) : null,
    baseDir: baseDir ? path.resolve(baseDir) : null,
    verbose,
    logFile,
    options,
  };
}

function printUsage(): void {
  console.log(`
Usage: npm run build:assets -- <config.json> [options]

Options:
  --exportdir <dir>   Output root (default: <config folder>/${DEFAULT_EXPORT_FOLDER})
  --basedir <dir>     Folder relative config paths resolve against (default: config folder)
  --game [dir]        Compile models into the game folder; [dir] holds gameinfo.txt
                      (give it after the config path)
  --qc-mode <1|2>     1: compile QC files as written, 2: flatten first (default: 2)
  --keep-flat-qc      Keep the temp_*.qc files written in qc mode 2
  --mat-mode <0|1|2>  0: skip model materials, 1: beside the model, 2: shared folder (default: 2)
  --no-mat-local      Keep shared materials at their original paths
  --package-files     Package each output folder with vpk
  --archive-old-ver   Archive the previous output instead of deleting it
  --forceupdate       Re-encode textures that are up to date
  --allow-reprocess   Encode a texture once per group that matches it
  --recursive         Match texture patterns in sub-folders
  --verbose           Print debug output
  --log <file>        Append every line to a log file
  --help              Show this help message
`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function loadConfig(configPath: string, baseDir: string | null): LoadedConfig {
  try {
    return loadBuildConfig(configPath, baseDir ?? undefined);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[ERROR] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const { configPath, exportDir, baseDir, verbose, logFile, options } = parseArgs();

  console.log('╔══════════════════════════════════════════╗');
  console.log('║  Source Asset Build Pipeline             ║');
  console.log('╚══════════════════════════════════════════╝');

  const loaded = loadConfig(configPath, baseDir);

  const compileRoot = exportDir ?? path.join(path.dirname(configPath), DEFAULT_EXPORT_FOLDER);
  console.log(`\nConfig: ${configPath} (${loaded.config.header})`);
  console.log(`Base directory: ${loaded.baseDir}`);
  if (loaded.config.header === 'ValveModel') console.log(`Output directory: ${compileRoot}`);
  console.log('');

  const logger = BuildLogger.create({ verbose, logFile: logFile ?? undefined });
  const startTime = Date.now();

  const result = runBuild(loaded, { ...options, compileRoot }, logger);
  if (result.kind === 'model' && result.report.manifestPath) {
    logger.info(`Build manifest written to ${result.report.manifestPath}`);
  }
  if (result.kind === 'texture') {
    logger.info(`${result.result.encoded.length} texture(s) encoded, ${result.result.upToDate.length} up to date`);
  }

  logger.printSummary((Date.now() - startTime) / 1000);

  if (logger.summary().errors > 0) {
    process.exit(1);
  }
}

main();
