/**
 * Material copier: resolves shader/texture dependencies and copies them
 * into a destination tree.
 *
 * Per material:
 *   1. locate `materials/<name>.vmt` across the search roots (first root wins)
 *   2. parse it; for a patch, locate and process the included shader first
 *   3. merge textures: included, then insert, then replace (or own entries)
 *   4. locate each texture (cached) and copy it
 *   5. write the shader, rewriting references when localizing
 *
 * When localizing, a texture from the shader's own source folder lands
 * beside the copied shader; any other texture, and any included shader,
 * lands in a `shared/` folder beneath it (never `shared/shared/`).
 * Without localization every file keeps its path under `materials/`.
 */

import { copyFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { ownTextures, parseShaderDescriptor, type ShaderDescriptor } from './shader-descriptor.js';
import { rewriteShaderText, textureReferenceKey, type RewritePlan } from './shader-rewriter.js';
import {
  MATERIALS_DIR,
  locateIncludedShader,
  locateShader,
  locateTexture,
  normalizeMaterialName,
  type LocateResult,
  type LocatedFile,
} from './search-roots.js';
import type { TextureRole } from './texture-roles.js';

export type ResolverWarningKind = 'missing-shader' | 'missing-include' | 'missing-texture' | 'destination-conflict';

export interface ResolverWarning {
  kind: ResolverWarningKind;
  material: string;
  reference: string;
  message: string;
}

export interface ResolvedMaterial {
  name: string;
  shaderPath: string;
  descriptor: ShaderDescriptor;
  /** Included shaders, nearest first. */
  includeChain: string[];
  destination: string;
  /** Effective role → absolute source texture. */
  textures: ReadonlyMap<TextureRole, string>;
}

export interface ResolveOptions {
  /** Ordered content roots, each possibly holding a `materials/` tree. */
  searchRoots: readonly string[];
  /** Output root; shaders land under `<destinationRoot>/materials/`. */
  destinationRoot: string;
  localize: boolean;
}

export interface CopiedFile {
  source: string;
  destination: string;
}

export interface ResolveResult {
  /** Destinations, in copy order. */
  copiedFiles: string[];
  copies: CopiedFile[];
  materials: ResolvedMaterial[];
  warnings: ResolverWarning[];
}

interface ProcessedShader {
  destination: string;
  descriptor: ShaderDescriptor;
  includeChain: string[];
  textures: Map<TextureRole, string>;
}

/** State for one resolver run. */
export class CopyLedger {
  /** Shader source path → processing result; set before its include is followed. */
  readonly processed = new Map<string, ProcessedShader>();
  /** Lower-cased texture reference → location outcome. */
  readonly textureCache = new Map<string, LocateResult>();
  readonly copies: CopiedFile[] = [];
  /** Lower-cased destination → source written there. */
  private readonly writtenFrom = new Map<string, string>();
  /** Lower-cased destination → shader bound to it, written or not. */
  private readonly claims = new Map<string, string>();

  sourceAt(destination: string): string | undefined {
    return this.writtenFrom.get(destination.toLowerCase());
  }

  claim(source: string, destination: string): void {
    const key = destination.toLowerCase();
    if (!this.claims.has(key)) this.claims.set(key, source);
  }

  claimedBy(destination: string): string | undefined {
    return this.claims.get(destination.toLowerCase()) ?? this.sourceAt(destination);
  }

  record(source: string, destination: string): void {
    this.writtenFrom.set(destination.toLowerCase(), source);
    this.copies.push({ source, destination });
  }
}

function toPosix(value: string): string {
  return value.split(path.sep).join('/');
}

function sharedFolderFor(dir: string): string {
  return path.basename(dir).toLowerCase() === 'shared' ? dir : path.join(dir, 'shared');
}

export class ShaderGraphResolver {
  private readonly ledger = new CopyLedger();
  private readonly warnings: ResolverWarning[] = [];
  /** Directly requested shaders keep their mirrored destination even when reached as an include. */
  private readonly requested = new Map<string, string>();

  constructor(private readonly options: ResolveOptions) {}

  resolveAndCopy(materialNames: readonly string[]): ResolveResult {
    const located: { name: string; file: LocatedFile }[] = [];
    const seen = new Set<string>();

    for (const raw of materialNames) {
      const name = normalizeMaterialName(raw);
      const key = name.toLowerCase();
      if (name === '' || seen.has(key)) continue;
      seen.add(key);

      const result = locateShader(name, this.options.searchRoots);
      if (!result.found) {
        this.warn('missing-shader', name, name, `Material "${name}" not found in any search root`);
        continue;
      }
      located.push({ name, file: result.file });
      if (!this.requested.has(result.file.absolutePath)) {
        const destination = this.mirrorDestination(result.file);
        this.requested.set(result.file.absolutePath, destination);
        this.ledger.claim(result.file.absolutePath, destination);
      }
    }

    const materials: ResolvedMaterial[] = [];
    for (const { name, file } of located) {
      const destination = this.requested.get(file.absolutePath) ?? this.mirrorDestination(file);
      const processed = this.processShader(file, destination, name);
      materials.push({
        name,
        shaderPath: file.absolutePath,
        descriptor: processed.descriptor,
        includeChain: [...processed.includeChain],
        destination: processed.destination,
        textures: processed.textures,
      });
    }

    return {
      copiedFiles: this.ledger.copies.map((copy) => copy.destination),
      copies: [...this.ledger.copies],
      materials,
      warnings: [...this.warnings],
    };
  }

  private warn(kind: ResolverWarningKind, material: string, reference: string, message: string): void {
    this.warnings.push({ kind, material, reference, message });
  }

  private mirrorDestination(file: LocatedFile): string {
    return path.join(this.options.destinationRoot, ...file.relativePath.split('/'));
  }

  private locateTextureCached(reference: string): LocateResult {
    const key = textureReferenceKey(reference);
    const cached = this.ledger.textureCache.get(key);
    if (cached) return cached;
    const result = locateTexture(reference, this.options.searchRoots);
    this.ledger.textureCache.set(key, result);
    return result;
  }

  private textureDestination(texture: LocatedFile, shader: LocatedFile, shaderDestination: string): string {
    const mirrored = this.mirrorDestination(texture);
    if (!this.options.localize) return mirrored;

    const shaderDir = path.dirname(shaderDestination);
    const sameFolder = path.dirname(texture.absolutePath) === path.dirname(shader.absolutePath);
    const localized = path.join(sameFolder ? shaderDir : sharedFolderFor(shaderDir), path.basename(texture.absolutePath));

    // Two different textures with one file name cannot share a folder.
    const occupant = this.ledger.sourceAt(localized);
    return occupant === undefined || occupant === texture.absolutePath ? localized : mirrored;
  }

  private includeDestination(included: LocatedFile, patchDestination: string): string {
    const mirrored = this.mirrorDestination(included);
    if (!this.options.localize) return mirrored;

    const localized = path.join(sharedFolderFor(path.dirname(patchDestination)), path.basename(included.absolutePath));
    const occupant = this.ledger.claimedBy(localized);
    return occupant === undefined || occupant === included.absolutePath ? localized : mirrored;
  }

  private copyOnce(source: string, destination: string): void {
    if (this.ledger.sourceAt(destination) === source) return;
    mkdirSync(path.dirname(destination), { recursive: true });
    copyFileSync(source, destination);
    this.ledger.record(source, destination);
  }

  private processShader(file: LocatedFile, destination: string, material: string): ProcessedShader {
    const known = this.ledger.processed.get(file.absolutePath);
    if (known) return known;

    const text = readFileSync(file.absolutePath, 'utf8');
    const descriptor = parseShaderDescriptor(text, file.absolutePath);
    const entry: ProcessedShader = { destination, descriptor, includeChain: [], textures: new Map() };
    this.ledger.processed.set(file.absolutePath, entry);
    this.ledger.claim(file.absolutePath, destination);

    const plan: { includeReference?: string; textureReferences: Map<string, string> } = {
      textureReferences: new Map(),
    };
    const effective = new Map<TextureRole, string>();

    if (descriptor.kind === 'patch' && descriptor.includeTarget !== null) {
      const included = locateIncludedShader(descriptor.includeTarget, this.options.searchRoots);
      if (!included.found) {
        this.warn(
          'missing-include',
          material,
          descriptor.includeTarget,
          `Included shader "${descriptor.includeTarget}" of ${file.relativePath} not found`,
        );
      } else {
        const includeDestination = this.requested.get(included.file.absolutePath)
          ?? this.includeDestination(included.file, destination);
        const base = this.processShader(included.file, includeDestination, material);
        for (const [role, source] of base.textures) effective.set(role, source);
        entry.includeChain = [included.file.absolutePath, ...base.includeChain];
        plan.includeReference = toPosix(path.relative(this.options.destinationRoot, base.destination));
      }
    }

    const materialsRoot = path.join(this.options.destinationRoot, MATERIALS_DIR);
    for (const [role, reference] of ownTextures(descriptor)) {
      const texture = this.locateTextureCached(reference);
      if (!texture.found) {
        this.warn(
          'missing-texture',
          material,
          reference,
          `Texture "${reference}" (${role}) of ${file.relativePath} not found`,
        );
        continue;
      }
      const textureDestination = this.textureDestination(texture.file, file, destination);
      this.copyOnce(texture.file.absolutePath, textureDestination);
      effective.set(role, texture.file.absolutePath);
      plan.textureReferences.set(
        textureReferenceKey(reference),
        toPosix(path.relative(materialsRoot, textureDestination)).replace(/\.vtf$/i, ''),
      );
    }
    entry.textures = effective;

    const occupant = this.ledger.sourceAt(destination);
    if (occupant !== undefined && occupant !== file.absolutePath) {
      this.warn(
        'destination-conflict',
        material,
        file.relativePath,
        `Not writing ${file.relativePath} over ${destination}, already copied from ${occupant}`,
      );
    } else if (occupant === undefined) {
      mkdirSync(path.dirname(destination), { recursive: true });
      if (this.options.localize) {
        const rewritePlan: RewritePlan = plan;
        writeFileSync(destination, rewriteShaderText(text, rewritePlan));
      } else {
        copyFileSync(file.absolutePath, destination);
      }
      this.ledger.record(file.absolutePath, destination);
    }

    return entry;
  }
}

/** Resolve and copy `materialNames` with a fresh ledger. */
export function resolveAndCopy(materialNames: readonly string[], options: ResolveOptions): ResolveResult {
  return new ShaderGraphResolver(options).resolveAndCopy(materialNames);
}
