/**
 * Locating material files across ordered search roots.
 *
 * Every root may hold a `materials/` tree; the first root containing a
 * path wins. Misses are tagged outcomes, not exceptions.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';

import { findBlock, parseKeyValues } from './keyvalues.js';

export const MATERIALS_DIR = 'materials';

export interface LocatedFile {
  /** Search root the file was found under. */
  root: string;
  absolutePath: string;
  /** Forward-slash path relative to `root`, starting with `materials/`. */
  relativePath: string;
}

export type LocateResult =
  | { found: true; file: LocatedFile }
  | { found: false; relativePath: string; tried: string[] };

function isFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}

function isDirectory(dirPath: string): boolean {
  return existsSync(dirPath) && statSync(dirPath).isDirectory();
}

function cleanPath(value: string): string {
  return value.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/').replace(/^\/+|\/+$/g, '');
}

function stripMaterialsPrefix(value: string): string {
  return value.toLowerCase().startsWith(`${MATERIALS_DIR}/`) ? value.slice(MATERIALS_DIR.length + 1) : value;
}

/** `materials\models\Hero\cloth1.vmt` → `models/Hero/cloth1`. */
export function normalizeMaterialName(name: string): string {
  return stripMaterialsPrefix(cleanPath(name)).replace(/\.vmt$/i, '');
}

/** Texture reference as written in a VMT → path under `materials/`, without extension. */
export function normalizeTextureReference(value: string): string {
  return stripMaterialsPrefix(cleanPath(value)).replace(/\.vtf$/i, '');
}

export function locateInRoots(relativePath: string, roots: readonly string[]): LocateResult {
  const tried: string[] = [];
  for (const root of roots) {
    const absolutePath = path.join(root, ...relativePath.split('/'));
    tried.push(absolutePath);
    if (isFile(absolutePath)) {
      return { found: true, file: { root, absolutePath, relativePath } };
    }
  }
  return { found: false, relativePath, tried };
}

export function locateShader(materialName: string, roots: readonly string[]): LocateResult {
  return locateInRoots(`${MATERIALS_DIR}/${normalizeMaterialName(materialName)}.vmt`, roots);
}

/** Patch includes name a VMT relative to a search root, usually with the `materials/` prefix. */
export function locateIncludedShader(includeTarget: string, roots: readonly string[]): LocateResult {
  return locateShader(includeTarget, roots);
}

export function locateTexture(reference: string, roots: readonly string[]): LocateResult {
  return locateInRoots(`${MATERIALS_DIR}/${normalizeTextureReference(reference)}.vtf`, roots);
}

/**
 * Content roots listed in a gameinfo.txt `SearchPaths` block.
 *
 * `|gameinfo_path|.` is the folder holding gameinfo.txt; other `game`
 * entries resolve against its parent and are kept only when they exist
 * as folders. Without a SearchPaths block, the parent folder alone is used.
 */
export function readGameInfoSearchPaths(gameinfoFile: string): string[] {
  const gameDir = path.dirname(path.resolve(gameinfoFile));
  const baseDir = path.dirname(gameDir);
  const searchPaths = findBlock(parseKeyValues(readFileSync(gameinfoFile, 'utf8')), 'SearchPaths');
  if (!searchPaths) return [baseDir];

  const roots: string[] = [];
  const add = (dir: string): void => {
    if (!roots.includes(dir)) roots.push(dir);
  };

  for (const entry of searchPaths) {
    if (typeof entry.value !== 'string') continue;
    if (!entry.key.toLowerCase().split('+').includes('game')) continue;

    const value = entry.value.trim();
    if (value.toLowerCase() === '|gameinfo_path|.') {
      add(gameDir);
      continue;
    }
    const relative = value.replace(/^\|all_source_engine_paths\|/i, '');
    const candidate = path.resolve(baseDir, relative);
    if (isDirectory(candidate)) add(candidate);
  }

  return roots;
}
