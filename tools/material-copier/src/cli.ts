#!/usr/bin/env node
/**
 * Material copier CLI.
 *
 * Locates materials under the game's search roots and copies each shader
 * with its include chain and textures into an output folder.
 *
 * Usage:
 *   material-copier --output <dir> (--gameinfo <file> | --root <dir>...) [--qc <file>] [--no-localize] [material...]
 */

import fs from 'node:fs';
import path from 'node:path';
import { readQcMaterials } from '@assetsmith/core';
import { readGameInfoSearchPaths, resolveAndCopy } from '@assetsmith/materials';
import { BuildLogger } from '@assetsmith/pipeline';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  output: string;
  gameinfo: string | null;
  roots: string[];
  qcFiles: string[];
  materials: string[];
  localize: boolean;
  verbose: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  let output: string | undefined;
  let gameinfo: string | null = null;
  const roots: string[] = [];
  const qcFiles: string[] = [];
  const materials: string[] = [];
  let localize = true;
  let verbose = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--output':
        output = argv[++i];
        break;
      case '--gameinfo':
        gameinfo = path.resolve(argv[++i] ?? '');
        break;
      case '--root':
        roots.push(path.resolve(argv[++i] ?? '.'));
        break;
      case '--qc':
        qcFiles.push(path.resolve(argv[++i] ?? ''));
        break;
      case '--no-localize':
        localize = false;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        if (arg.startsWith('--')) {
          console.error(`Error: Unknown argument: ${arg}\n`);
          printUsage();
          process.exit(1);
        }
        materials.push(arg);
    }
  }

  if (!output) {
    console.error('Error: --output is required.\n');
    printUsage();
    process.exit(1);
  }
  if (!gameinfo && roots.length === 0) {
    console.error('Error: one of --gameinfo or --root is required.\n');
    printUsage();
    process.exit(1);
  }

  return { output: path.resolve(output), gameinfo, roots, qcFiles, materials, localize, verbose };
}

function printUsage(): void {
  console.log(`Usage: material-copier --output <dir> (--gameinfo <file> | --root <dir>...) [options] [material...]

Options:
  --output <dir>      Destination root; files land under <dir>/materials (required)
  --gameinfo <file>   Read search roots from this gameinfo.txt
  --root <dir>        Content root to search, tried in the order given (repeatable)
  --qc <file>         Also copy every material the QC references (repeatable)
  --no-localize       Mirror files at their original relative paths
  --verbose           Print every copied file
  --help              Show this help message`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  const args = parseArgs(process.argv);
  const logger = BuildLogger.create({ verbose: args.verbose });
  const log = logger.child('MATERIAL');

  if (args.gameinfo && !fs.existsSync(args.gameinfo)) {
    console.error(`Error: gameinfo not found: ${args.gameinfo}`);
    process.exit(1);
  }
  const searchRoots = [...args.roots, ...(args.gameinfo ? readGameInfoSearchPaths(args.gameinfo) : [])];

  const materials = [...args.materials];
  for (const qcFile of args.qcFiles) {
    if (!fs.existsSync(qcFile)) {
      log.error(`QC file not found: ${qcFile}`);
      continue;
    }
    materials.push(...readQcMaterials(qcFile, []));
  }

  if (materials.length === 0) {
    console.log('No materials requested.');
    return;
  }

  log.debug(`Search roots: ${searchRoots.join(', ')}`);
  const result = resolveAndCopy(materials, {
    searchRoots,
    destinationRoot: args.output,
    localize: args.localize,
  });

  for (const warning of result.warnings) log.warn(warning.message);
  for (const copy of result.copies) log.debug(`${copy.source} -> ${copy.destination}`);

  console.log(`\nDone. ${result.materials.length} material(s) resolved, ${result.copiedFiles.length} file(s) copied.`);

  if (logger.summary().errors > 0) {
    process.exit(1);
  }
}

main();
