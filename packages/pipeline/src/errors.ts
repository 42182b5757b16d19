export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** The build config failed to load or validate. */
export class ConfigError extends PipelineError {
  constructor(
    public readonly configPath: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid build config ${configPath}:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/** An external executable could not be started or exited unsuccessfully. */
export class ExternalToolError extends PipelineError {
  constructor(
    public readonly tool: string,
    public readonly status: number | null,
    public readonly stderr: string,
  ) {
    const detail = stderr.trim() === '' ? '' : `: ${stderr.trim().split(/\r?\n/)[0]}`;
    super(`${tool} failed (${status === null ? 'not started' : `exit ${status}`})${detail}`);
    this.name = 'ExternalToolError';
  }
}
