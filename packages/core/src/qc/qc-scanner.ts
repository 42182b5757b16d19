/**
 * Static QC reader: follows `$include` and collects material references
 * the model compiler's dump may not report.
 */

import { readFileSync, statSync } from 'node:fs';
import path from 'node:path';

import { splitArguments, stripTrailingComment } from './qc-flattener.js';

export interface QcMaterialScan {
  /** Lower-cased original name → replacement. */
  renames: Map<string, string>;
  cdmaterials: string[];
  /** Names listed inside `$texturegroup skinfamilies` blocks. */
  skinFamilyMaterials: string[];
}

/** Include lookup anchors, tried in the same order the flattener uses. */
export interface QcScanOptions {
  /** First anchor. Defaults to the root QC's folder. */
  rootDir?: string;
  /** Tried after rootDir and the including file's folder. */
  searchDirs?: readonly string[];
}

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function readLines(filePath: string): string[] {
  return readFileSync(filePath, 'utf8').split(/\r?\n/);
}

function directiveOf(line: string): { word: string; args: string[] } | null {
  const trimmed = stripTrailingComment(line).trim();
  const match = /^\$([A-Za-z_][A-Za-z0-9_]*)(.*)$/.exec(trimmed);
  if (!match) return null;
  return { word: match[1]!.toLowerCase(), args: splitArguments(match[2]!) };
}

function normalizeMaterialPath(value: string): string {
  return value.replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/^\/+|\/+$/g, '');
}

/**
 * Every file reachable through `$include`, resolved against `rootDir`, the
 * including file's folder, then `searchDirs`. Unresolved targets are
 * skipped. The root file is not listed.
 */
export function readQcIncludes(qcFile: string, options: QcScanOptions = {}): string[] {
  const found: string[] = [];
  const visited = new Set<string>([path.resolve(qcFile)]);
  const rootDir = path.resolve(options.rootDir ?? path.dirname(qcFile));
  const searchDirs = options.searchDirs ?? [];

  const resolveTarget = (target: string, from: string): string | null => {
    const normalized = target.replace(/\\/g, '/');
    const anchors = path.isAbsolute(normalized) ? [''] : [rootDir, path.dirname(from), ...searchDirs];
    for (const anchor of anchors) {
      const candidate = path.resolve(anchor, normalized);
      if (isFile(candidate)) return candidate;
    }
    return null;
  };

  const visit = (file: string): void => {
    for (const line of readLines(file)) {
      const directive = directiveOf(line);
      if (!directive || directive.word !== 'include') continue;
      const target = directive.args[0];
      if (!target) continue;
      const resolved = resolveTarget(target, file);
      if (resolved === null || visited.has(resolved)) continue;
      visited.add(resolved);
      found.push(resolved);
      visit(resolved);
    }
  };

  visit(path.resolve(qcFile));
  return found;
}

/** Collect material directives from a QC file and its includes. */
export function scanQcMaterials(qcFile: string, options: QcScanOptions = {}): QcMaterialScan {
  const scan: QcMaterialScan = { renames: new Map(), cdmaterials: [], skinFamilyMaterials: [] };

  for (const file of [path.resolve(qcFile), ...readQcIncludes(qcFile, options)]) {
    const lines = readLines(file);
    for (let i = 0; i < lines.length; i++) {
      const directive = directiveOf(lines[i]!);
      if (!directive) continue;

      if (directive.word === 'renamematerial') {
        const [from, to] = directive.args;
        if (from && to) scan.renames.set(normalizeMaterialPath(from).toLowerCase(), normalizeMaterialPath(to));
      } else if (directive.word === 'cdmaterials') {
        for (const base of directive.args) {
          const normalized = normalizeMaterialPath(base);
          if (!scan.cdmaterials.includes(normalized)) scan.cdmaterials.push(normalized);
        }
      } else if (directive.word === 'texturegroup') {
        if (!directive.args.some((arg) => arg.toLowerCase() === 'skinfamilies')) continue;
        i = readSkinFamilies(lines, i, scan.skinFamilyMaterials);
      }
    }
  }

  return scan;
}

/** Consume a brace block starting at `start`; returns the index of its last line. */
function readSkinFamilies(lines: readonly string[], start: number, names: string[]): number {
  let depth = 0;
  let opened = false;

  for (let i = start; i < lines.length; i++) {
    let text = stripTrailingComment(lines[i]!);
    if (i === start) text = text.slice(text.indexOf('{') === -1 ? text.length : text.indexOf('{'));

    for (const token of text.matchAll(/"([^"]*)"|([{}])|([^\s{}"]+)/g)) {
      if (token[2] === '{') {
        depth++;
        opened = true;
      } else if (token[2] === '}') {
        depth--;
      } else if (opened && depth > 0) {
        const name = normalizeMaterialPath(token[1] ?? token[3] ?? '');
        if (name !== '' && !names.includes(name)) names.push(name);
      }
    }

    if (opened && depth <= 0) return i;
  }
  return lines.length - 1;
}

/**
 * Combine compiler-reported materials with the QC's own references.
 *
 * The result starts with the renamed `dumped` names. When the QC declares
 * `$cdmaterials` folders, every folder/name pair follows; otherwise the
 * skin-family names are appended as they are.
 */
export function readQcMaterials(
  qcFile: string,
  dumped: readonly string[],
  options: QcScanOptions = {},
): string[] {
  const scan = scanQcMaterials(qcFile, options);
  const rename = (name: string): string => {
    const normalized = normalizeMaterialPath(name);
    return scan.renames.get(normalized.toLowerCase()) ?? normalized;
  };

  const renamedDumps = dumped.map(rename);
  const names = [...renamedDumps, ...scan.skinFamilyMaterials.map(rename)];
  const combined = scan.cdmaterials.length > 0
    ? scan.cdmaterials.flatMap((base) => names.map((name) => normalizeMaterialPath(`${base}/${name}`)))
    : names;

  return [...new Set([...renamedDumps, ...combined])];
}
