/**
 * Console logger for build runs.
 *
 * Lines go through console.log / console.warn / console.error with the
 * `[WARN]` / `[ERROR]` / `[DEBUG]` prefixes the CLIs print, optionally
 * tagged with a step context such as `[MODEL]`. Children share the
 * warning/error counters and the log file of their parent.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';

export type LogContext = 'MODEL' | 'MATERIAL' | 'DATA' | 'VPK' | 'TEXTURE' | 'OS';

export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface BuildLoggerOptions {
  verbose?: boolean;
  /** Plain-text file every line is appended to. */
  logFile?: string;
  /** Defaults to the global console. */
  sink?: LogSink;
}

export interface LogSummary {
  warnings: number;
  errors: number;
}

interface SharedLogState {
  verbose: boolean;
  logFile: string | null;
  sink: LogSink;
  counts: LogSummary;
}

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LEVEL_PREFIX: Record<LogLevel, string> = {
  info: '',
  warn: '[WARN] ',
  error: '[ERROR] ',
  debug: '[DEBUG] ',
};

export class BuildLogger {
  private constructor(
    private readonly shared: SharedLogState,
    private readonly context: LogContext | null,
  ) {}

  static create(options: BuildLoggerOptions = {}): BuildLogger {
    if (options.logFile) mkdirSync(path.dirname(options.logFile), { recursive: true });
    return new BuildLogger(
      {
        verbose: options.verbose ?? false,
        logFile: options.logFile ?? null,
        sink: options.sink ?? console,
        counts: { warnings: 0, errors: 0 },
      },
      null,
    );
  }

  get verbose(): boolean {
    return this.shared.verbose;
  }

  child(context: LogContext): BuildLogger {
    return new BuildLogger(this.shared, context);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.shared.counts.warnings++;
    this.write('warn', message);
  }

  error(message: string): void {
    this.shared.counts.errors++;
    this.write('error', message);
  }

  debug(message: string): void {
    if (!this.shared.verbose) return;
    this.write('debug', message);
  }

  /** `═══ Step 2/4: Copying materials ═══` between blank lines. */
  banner(step: number, total: number, title: string): void {
    this.write('info', `\n═══ Step ${step}/${total}: ${title} ═══\n`);
  }

  summary(): LogSummary {
    return { ...this.shared.counts };
  }

  printSummary(elapsedSeconds: number): void {
    const { warnings, errors } = this.shared.counts;
    const mark = errors > 0 ? '✗' : '✓';
    this.write('info', `\n${mark} Build finished in ${elapsedSeconds.toFixed(1)}s`);
    this.write('info', `  Warnings: ${warnings}`);
    this.write('info', `  Errors: ${errors}`);
  }

  private write(level: LogLevel, message: string): void {
    const context = this.context ? `[${this.context}] ` : '';
    const line = `${LEVEL_PREFIX[level]}${context}${message}`;

    if (level === 'error') this.shared.sink.error(line);
    else if (level === 'warn') this.shared.sink.warn(line);
    else this.shared.sink.log(line);

    if (this.shared.logFile) {
      appendFileSync(this.shared.logFile, `${new Date().toISOString()} ${line}\n`);
    }
  }
}
