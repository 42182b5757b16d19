/**
 * Build config loading.
 *
 * A build is one JSON file whose `header` picks the pipeline:
 *
 *   { "header": "ValveModel", "studiomdl": "bin/studiomdl", "gameinfo": "game/mod/gameinfo.txt",
 *     "model": { "hero": { "qc": "src/hero.qc" } } }
 *
 *   { "header": "ValveTexture", "vtfcmd": "bin/vtfcmd",
 *     "vtf": { "icons": { "input": "^icon_.*\\.png$", "output": "out/icons" } } }
 *
 * File paths resolve against the config file's folder (or a base-dir
 * override); executables given as a bare name are left for PATH lookup.
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { ConfigError } from './errors.js';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const DefineValueSchema = z.union([
  ScalarSchema,
  z.object({
    value: ScalarSchema,
    targets: z.array(z.string().min(1)).optional(),
  }),
]);

const VtfSettingsSchema = z.object({
  flags: z.array(z.string()).default([]),
  encoder_args: z.array(z.string()).default([]),
  /** VMT template written beside the exported VTF. */
  vmt: z.string().min(1).optional(),
});

const DataItemSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
  replace: z.record(z.string()).optional(),
  vtf: VtfSettingsSchema.optional(),
});

const ModelEntrySchema = z.object({
  qc: z.string().min(1),
  compile: z.boolean().default(true),
  submodels: z.record(z.string().min(1)).default({}),
  definevariable: z.record(DefineValueSchema).default({}),
  subdata: z.array(DataItemSchema).default([]),
});

const MaterialSetSchema = z.object({
  materials: z.array(z.string()).default([]),
});

const ValveModelConfigSchema = z.object({
  header: z.literal('ValveModel'),
  studiomdl: z.string().min(1),
  gameinfo: z.string().min(1).optional(),
  vtfcmd: z.string().min(1).optional(),
  vpk: z.string().min(1).optional(),
  definevariable: z.record(ScalarSchema).default({}),
  includedirs: z.array(z.string().min(1)).default([]),
  model: z.record(ModelEntrySchema).default({}),
  material: z.record(MaterialSetSchema).default({}),
  data: z.record(z.array(DataItemSchema)).default({}),
});

const TextureGroupSchema = z.object({
  /** A file name, or a regular expression over file names. */
  input: z.string().min(1),
  /** Folder (no extension) or file; defaults to `<root>/<stem>.vtf`. */
  output: z.string().min(1).optional(),
  vtf: VtfSettingsSchema.optional(),
});

const ValveTextureConfigSchema = z.object({
  header: z.literal('ValveTexture'),
  vtfcmd: z.string().min(1),
  vtf: z.record(TextureGroupSchema).default({}),
});

export const BuildConfigSchema = z.discriminatedUnion('header', [ValveModelConfigSchema, ValveTextureConfigSchema]);

export type VtfSettings = z.infer<typeof VtfSettingsSchema>;
export type DataItem = z.infer<typeof DataItemSchema>;
export type DefineValue = z.infer<typeof DefineValueSchema>;
export type ModelEntry = z.infer<typeof ModelEntrySchema>;
export type TextureGroup = z.infer<typeof TextureGroupSchema>;
export type ValveModelConfig = z.infer<typeof ValveModelConfigSchema>;
export type ValveTextureConfig = z.infer<typeof ValveTextureConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;

export interface LoadedConfig<T extends BuildConfig = BuildConfig> {
  config: T;
  configPath: string;
  /** Folder relative config paths were resolved against. */
  baseDir: string;
}

/** Resolve a config path value; absolute values are kept. */
export function resolveConfigPath(value: string, baseDir: string): string {
  return path.isAbsolute(value) ? path.normalize(value) : path.resolve(baseDir, value);
}

/** Bare command names stay as given so the OS can find them on PATH. */
export function resolveExecutable(value: string, baseDir: string): string {
  return /[\\/]/.test(value) ? resolveConfigPath(value, baseDir) : value;
}

function resolveDataItem(item: DataItem, baseDir: string): DataItem {
  const vtf = item.vtf
    ? { ...item.vtf, vmt: item.vtf.vmt === undefined ? undefined : resolveConfigPath(item.vtf.vmt, baseDir) }
    : undefined;
  return { ...item, input: resolveConfigPath(item.input, baseDir), vtf };
}

function mapRecord<T, U>(record: Record<string, T>, fn: (value: T) => U): Record<string, U> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fn(value)]));
}

function resolveModelConfig(config: ValveModelConfig, baseDir: string): ValveModelConfig {
  return {
    ...config,
    studiomdl: resolveExecutable(config.studiomdl, baseDir),
    gameinfo: config.gameinfo === undefined ? undefined : resolveConfigPath(config.gameinfo, baseDir),
    vtfcmd: config.vtfcmd === undefined ? undefined : resolveExecutable(config.vtfcmd, baseDir),
    vpk: config.vpk === undefined ? undefined : resolveExecutable(config.vpk, baseDir),
    includedirs: config.includedirs.map((dir) => resolveConfigPath(dir, baseDir)),
    model: mapRecord(config.model, (entry) => ({
      ...entry,
      qc: resolveConfigPath(entry.qc, baseDir),
      subdata: entry.subdata.map((item) => resolveDataItem(item, baseDir)),
    })),
    data: mapRecord(config.data, (items) => items.map((item) => resolveDataItem(item, baseDir))),
  };
}

function resolveTextureConfig(config: ValveTextureConfig, baseDir: string): ValveTextureConfig {
  return { ...config, vtfcmd: resolveExecutable(config.vtfcmd, baseDir) };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

/** Validate parsed JSON and resolve its paths against `baseDir`. */
export function parseBuildConfig(raw: unknown, configPath: string, baseDir: string): BuildConfig {
  const parsed = BuildConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(configPath, formatIssues(parsed.error));

  const config = parsed.data;
  return config.header === 'ValveModel'
    ? resolveModelConfig(config, baseDir)
    : resolveTextureConfig(config, baseDir);
}

/** Read, validate and resolve a config file. `baseDir` defaults to the file's folder. */
export function loadBuildConfig(configPath: string, baseDir?: string): LoadedConfig {
  const absolute = path.resolve(configPath);
  if (!existsSync(absolute)) throw new ConfigError(absolute, ['config file not found']);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf8'));
  } catch (err) {
    throw new ConfigError(absolute, [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }

  const root = path.resolve(baseDir ?? path.dirname(absolute));
  return { config: parseBuildConfig(raw, absolute, root), configPath: absolute, baseDir: root };
}
