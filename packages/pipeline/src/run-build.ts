import path from 'node:path';

import type { BuildLogger } from './build-logger.js';
import { BuildOrchestrator, type BuildOptions, type BuildReport } from './build-orchestrator.js';
import type { LoadedConfig } from './config.js';
import { nodeProcessRunner, type ProcessRunner } from './process-runner.js';
import { TextureEncoder } from './texture-encoder.js';
import { TexturePipeline, type TexturePipelineOptions, type TextureRunResult } from './texture-pipeline.js';

export interface RunBuildOptions extends BuildOptions, Omit<TexturePipelineOptions, 'rootDir'> {}

export type RunBuildResult =
  | { kind: 'model'; report: BuildReport }
  | { kind: 'texture'; result: TextureRunResult };

/** Run the pipeline the config's header selects. */
export function runBuild(
  loaded: LoadedConfig,
  options: RunBuildOptions,
  logger: BuildLogger,
  runner: ProcessRunner = nodeProcessRunner,
): RunBuildResult {
  const { config } = loaded;
  if (config.header === 'ValveModel') {
    const orchestrator = new BuildOrchestrator({ ...loaded, config }, options, logger, runner);
    return { kind: 'model', report: orchestrator.run() };
  }

  const pipeline = new TexturePipeline(config, new TextureEncoder(config.vtfcmd, runner), logger, {
    rootDir: path.resolve(loaded.baseDir),
    forceUpdate: options.forceUpdate,
    allowReprocess: options.allowReprocess,
    recursive: options.recursive,
  });
  return { kind: 'texture', result: pipeline.run() };
}
