export { BuildLogger } from './build-logger.js';
export type { BuildLoggerOptions, LogContext, LogSink, LogSummary } from './build-logger.js';
export { PipelineError, ConfigError, ExternalToolError } from './errors.js';
export { nodeProcessRunner } from './process-runner.js';
export type { ProcessResult, ProcessRunner } from './process-runner.js';
export {
  BuildConfigSchema,
  loadBuildConfig,
  parseBuildConfig,
  resolveConfigPath,
  resolveExecutable,
} from './config.js';
export type {
  BuildConfig,
  DataItem,
  DefineValue,
  LoadedConfig,
  ModelEntry,
  TextureGroup,
  ValveModelConfig,
  ValveTextureConfig,
  VtfSettings,
} from './config.js';
export {
  ModelCompiler,
  buildStudiomdlArgs,
  collectModelArtifacts,
  modelOutputPath,
  parseDumpedMaterials,
  parseWrittenModels,
  removeEmptyFolders,
} from './model-compiler.js';
export type { ModelCompileRequest, ModelCompileResult } from './model-compiler.js';
export { TextureEncoder, buildVtfCmdArgs, DEFAULT_VTF_FORMAT, DEFAULT_VTF_VERSION } from './texture-encoder.js';
export type { NormalMapOptions, VtfEncodeOptions } from './texture-encoder.js';
export { Packager } from './packager.js';
export {
  DataProcessor,
  SHARED_ASSET_FOLDER,
  applyReplacements,
  isImageFile,
  isTextFile,
} from './data-processor.js';
export type { DataItemOutcome, DataItemResult, DataProcessorOptions } from './data-processor.js';
export { prepareCompileFolder, formatArchiveTimestamp, ARCHIVE_FOLDER } from './compile-folder.js';
export type { CompileFolderMode } from './compile-folder.js';
export {
  TexturePipeline,
  findMatchingFiles,
  isUpToDate,
  resolveTextureOutput,
} from './texture-pipeline.js';
export type { TexturePipelineOptions, TextureRunResult } from './texture-pipeline.js';
export {
  BuildOrchestrator,
  BUILD_MANIFEST_FILE,
  TOOL_VERSION,
  definesForTarget,
  splitModelDefines,
} from './build-orchestrator.js';
export type {
  BuildOptions,
  BuildReport,
  MaterialMode,
  ModelBuildReport,
  ModelBuildStatus,
  ModelDefines,
  QcMode,
} from './build-orchestrator.js';
export { runBuild } from './run-build.js';
export type { RunBuildOptions, RunBuildResult } from './run-build.js';
