#!/usr/bin/env node
/**
 * QC flattener CLI.
 *
 * Expands `$include`, variables, conditionals and macros in one QC file
 * and writes the flat result to stdout or a file. Diagnostics go to
 * stderr as `file:line: severity: message`.
 *
 * Usage:
 *   qc-flattener --input <file.qc> [--output <file>] [--define name=value]... [--include-dir <dir>]...
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  QcError,
  VariableEnvironment,
  flattenQc,
  formatDiagnostic,
  type FlattenResult,
} from '@assetsmith/core';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  input: string;
  output: string | null;
  defines: Record<string, string>;
  includeDirs: string[];
}

function parseArgs(argv: string[]): CliArgs {
  let input: string | undefined;
  let output: string | null = null;
  const defines: Record<string, string> = {};
  const includeDirs: string[] = [];

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
        input = argv[++i];
        break;
      case '--output':
        output = argv[++i] ?? null;
        break;
      case '--define': {
        const pair = argv[++i] ?? '';
        const eq = pair.indexOf('=');
        if (eq <= 0) {
          console.error(`Error: --define expects name=value, got "${pair}"`);
          process.exit(1);
        }
        defines[pair.slice(0, eq)] = pair.slice(eq + 1);
        break;
      }
      case '--include-dir':
        includeDirs.push(path.resolve(argv[++i] ?? '.'));
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Error: Unknown argument: ${arg}\n`);
        printUsage();
        process.exit(1);
    }
  }

  if (!input) {
    console.error('Error: --input is required.\n');
    printUsage();
    process.exit(1);
  }

  return { input: path.resolve(input), output: output ? path.resolve(output) : null, defines, includeDirs };
}

function printUsage(): void {
  console.log(`Usage: qc-flattener --input <file.qc> [options]

Options:
  --input <file>        QC file to flatten (required)
  --output <file>       Write the result here instead of stdout
  --define name=value   Seed a variable (repeatable)
  --include-dir <dir>   Extra folder searched for $include targets (repeatable)
  --help                Show this help message`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function flatten(args: CliArgs): FlattenResult {
  try {
    return flattenQc(args.input, {
      variables: VariableEnvironment.fromRecord(args.defines),
      searchDirs: args.includeDirs,
    });
  } catch (err) {
    if (err instanceof QcError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const args = parseArgs(process.argv);
  const result = flatten(args);

  for (const diagnostic of result.diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }

  if (args.output) {
    fs.mkdirSync(path.dirname(args.output), { recursive: true });
    fs.writeFileSync(args.output, result.text);
    console.error(`Wrote ${args.output} (${result.includedFiles.length} include(s) inlined)`);
  } else {
    process.stdout.write(result.text);
  }

  if (result.diagnostics.some((diagnostic) => diagnostic.severity === 'error')) {
    process.exit(1);
  }
}

main();
