/**
 * VMT (shader description) parser.
 *
 * VMT files are KeyValues text:
 *
 *   "VertexLitGeneric"
 *   {
 *     "$basetexture" "models/hero/cloth1_d"
 *     $bumpmap models/hero/cloth1_n
 *   }
 *
 * A patch shader inherits another file and overrides parts of it:
 *
 *   patch
 *   {
 *     include "materials/models/hero/base.vmt"
 *     insert  { $detail "models/shared/noise" }
 *     replace { $basetexture "models/hero/cloth2_d" }
 *   }
 *
 * Only keys on the texture-role allow-list are extracted.
 */

import { readFileSync } from 'node:fs';

import { parseKeyValues, type KeyValueNode } from './keyvalues.js';
import { toTextureRole, type TextureMap, type TextureRole } from './texture-roles.js';

export interface FlatShaderDescriptor {
  kind: 'flat';
  sourcePath: string;
  /** Shader name, e.g. VertexLitGeneric. */
  shader: string;
  textures: TextureMap;
}

export interface PatchShaderDescriptor {
  kind: 'patch';
  sourcePath: string;
  /** Included VMT as written, relative to a search root. */
  includeTarget: string | null;
  insertTextures: TextureMap;
  replaceTextures: TextureMap;
}

export type ShaderDescriptor = FlatShaderDescriptor | PatchShaderDescriptor;

function collectTextures(nodes: readonly KeyValueNode[], into: Map<TextureRole, string>): void {
  for (const node of nodes) {
    if (typeof node.value === 'string') {
      const role = toTextureRole(node.key);
      if (role && node.value.trim() !== '') into.set(role, node.value.trim());
    } else if (node.key.toLowerCase() !== 'proxies') {
      collectTextures(node.value, into);
    }
  }
}

function blockChildren(nodes: readonly KeyValueNode[], key: string): KeyValueNode[] {
  const children: KeyValueNode[] = [];
  for (const node of nodes) {
    if (node.key.toLowerCase() === key && typeof node.value !== 'string') children.push(...node.value);
  }
  return children;
}

export function parseShaderDescriptor(text: string, sourcePath: string): ShaderDescriptor {
  const nodes = parseKeyValues(text);
  const root = nodes[0];
  const body = root && typeof root.value !== 'string' ? root.value : [];

  if (root?.key.toLowerCase() === 'patch') {
    const include = body.find((node) => node.key.toLowerCase() === 'include');
    const includeTarget = include && typeof include.value === 'string' ? include.value.trim() : '';
    const insertTextures = new Map<TextureRole, string>();
    const replaceTextures = new Map<TextureRole, string>();
    collectTextures(blockChildren(body, 'insert'), insertTextures);
    collectTextures(blockChildren(body, 'replace'), replaceTextures);
    return {
      kind: 'patch',
      sourcePath,
      includeTarget: includeTarget !== '' ? includeTarget : null,
      insertTextures,
      replaceTextures,
    };
  }

  const textures = new Map<TextureRole, string>();
  collectTextures(body, textures);
  return { kind: 'flat', sourcePath, shader: root?.key ?? '', textures };
}

export function readShaderDescriptor(filePath: string): ShaderDescriptor {
  return parseShaderDescriptor(readFileSync(filePath, 'utf8'), filePath);
}

/**
 * Textures a shader names itself: insert entries overlaid by replace
 * entries for a patch, or its own entries otherwise.
 */
export function ownTextures(descriptor: ShaderDescriptor): TextureMap {
  if (descriptor.kind === 'flat') return descriptor.textures;
  return new Map([...descriptor.insertTextures, ...descriptor.replaceTextures]);
}
