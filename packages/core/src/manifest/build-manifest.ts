/**
 * Build manifest: records every file a build produced.
 *
 * Written next to the build output so a later run (or a packaging step)
 * can tell which step produced each file, from which source, and whether
 * either side changed since.
 */

import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';

export type BuildStep = 'model' | 'material' | 'data' | 'texture';

const BUILD_STEPS: readonly BuildStep[] = ['model', 'material', 'data', 'texture'];

export interface BuildManifestEntry {
  /** Source file, relative to the config folder. */
  sourcePath: string;
  /** SHA-256 hex hash of the source file. */
  sourceHash: string;
  /** Produced file, relative to the build output root. */
  outputPath: string;
  /** SHA-256 hex hash of the produced file. */
  outputHash: string;
  step: BuildStep;
  toolVersion: string;
  /** ISO timestamp of the build. */
  timestamp: string;
}

export interface BuildManifest {
  version: 1;
  generatedAt: string;
  entryCount: number;
  entries: BuildManifestEntry[];
}

export function createBuildManifest(): BuildManifest {
  return {
    version: 1,
    generatedAt: new Date().toISOString(),
    entryCount: 0,
    entries: [],
  };
}

/**
 * Add an entry. Replaces any existing entry with the same outputPath, since
 * one output has exactly one producer.
 */
export function addBuildEntry(manifest: BuildManifest, entry: BuildManifestEntry): void {
  const idx = manifest.entries.findIndex((e) => e.outputPath === entry.outputPath);
  if (idx !== -1) {
    manifest.entries[idx] = entry;
  } else {
    manifest.entries.push(entry);
  }
  manifest.entryCount = manifest.entries.length;
}

export function fileHashHex(filePath: string): string {
  return createHash('sha256').update(readFileSync(filePath)).digest('hex');
}

/** Deterministic JSON: entries sorted by outputPath, 2-space indent. */
export function serializeBuildManifest(manifest: BuildManifest): string {
  const sorted: BuildManifest = {
    ...manifest,
    entries: [...manifest.entries].sort((a, b) => a.outputPath.localeCompare(b.outputPath)),
  };
  return JSON.stringify(sorted, null, 2) + '\n';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBuildStep(value: unknown): value is BuildStep {
  return BUILD_STEPS.some((step) => step === value);
}

function toEntry(value: unknown): BuildManifestEntry | null {
  if (!isRecord(value)) return null;
  const { sourcePath, sourceHash, outputPath, outputHash, step, toolVersion, timestamp } = value;
  if (
    typeof sourcePath !== 'string'
    || typeof sourceHash !== 'string'
    || typeof outputPath !== 'string'
    || typeof outputHash !== 'string'
    || !isBuildStep(step)
    || typeof toolVersion !== 'string'
    || typeof timestamp !== 'string'
  ) {
    return null;
  }
  return { sourcePath, sourceHash, outputPath, outputHash, step, toolVersion, timestamp };
}

/**
 * Parse a manifest from JSON. Returns null if invalid.
 */
export function parseBuildManifest(json: string): BuildManifest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed['version'] !== 1 || !Array.isArray(parsed['entries'])) return null;

  const entries: BuildManifestEntry[] = [];
  for (const raw of parsed['entries']) {
    const entry = toEntry(raw);
    if (!entry) return null;
    entries.push(entry);
  }

  const generatedAt = typeof parsed['generatedAt'] === 'string' ? parsed['generatedAt'] : new Date().toISOString();
  return { version: 1, generatedAt, entryCount: entries.length, entries };
}
