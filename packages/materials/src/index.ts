export { TEXTURE_ROLES, toTextureRole } from './texture-roles.js';
export type { TextureRole, TextureMap } from './texture-roles.js';
export { parseKeyValues, findBlock } from './keyvalues.js';
export type { KeyValueNode } from './keyvalues.js';
export { parseShaderDescriptor, readShaderDescriptor, ownTextures } from './shader-descriptor.js';
export type { ShaderDescriptor, FlatShaderDescriptor, PatchShaderDescriptor } from './shader-descriptor.js';
export {
  MATERIALS_DIR,
  locateInRoots,
  locateShader,
  locateIncludedShader,
  locateTexture,
  normalizeMaterialName,
  normalizeTextureReference,
  readGameInfoSearchPaths,
} from './search-roots.js';
export type { LocateResult, LocatedFile } from './search-roots.js';
export { rewriteShaderText, textureReferenceKey } from './shader-rewriter.js';
export type { RewritePlan } from './shader-rewriter.js';
export { CopyLedger, ShaderGraphResolver, resolveAndCopy } from './shader-graph-resolver.js';
export type {
  CopiedFile,
  ResolveOptions,
  ResolveResult,
  ResolvedMaterial,
  ResolverWarning,
  ResolverWarningKind,
} from './shader-graph-resolver.js';
export { renderVmtTemplate, textureReferenceFor, writeVmtFromTemplate } from './vmt-template.js';
