export * from './qc/index.js';
export {
  createBuildManifest,
  addBuildEntry,
  fileHashHex,
  serializeBuildManifest,
  parseBuildManifest,
} from './manifest/build-manifest.js';
export type { BuildManifest, BuildManifestEntry, BuildStep } from './manifest/build-manifest.js';
