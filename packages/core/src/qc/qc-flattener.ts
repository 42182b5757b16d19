/**
 * QC flattener: expands a model description into one self-contained stream.
 *
 * Handles, line by line:
 *   - $if / $ifdef / $ifndef / $elif / $else / $endif
 *   - $definevariable / $redefinevariable and `$name$` substitution
 *   - $definemacro bodies (backslash-continued or closed by $endmacro)
 *     and `$macroname args...` invocations
 *   - $include, inlined with the including line's indentation
 *   - $echo, passed through as a comment
 *
 * All mutable parser state lives in a FlattenState threaded through the
 * calls; nothing is kept at module level.
 */

import { readFileSync, realpathSync, statSync } from 'node:fs';
import path from 'node:path';

import { evaluateCondition } from './condition.js';
import { QcFileNotFoundError, QcIncludeNotFoundError } from './errors.js';
import { evaluateValueExpression } from './value-expression.js';
import { VariableEnvironment, type DefineOutcome } from './variable-environment.js';

export type QcDirectiveKeyword =
  | 'if'
  | 'ifdef'
  | 'ifndef'
  | 'elif'
  | 'else'
  | 'endif'
  | 'definevariable'
  | 'redefinevariable'
  | 'definemacro'
  | 'endmacro'
  | 'include'
  | 'echo';

const DIRECTIVE_KEYWORDS: ReadonlySet<string> = new Set<QcDirectiveKeyword>([
  'if', 'ifdef', 'ifndef', 'elif', 'else', 'endif',
  'definevariable', 'redefinevariable', 'definemacro', 'endmacro',
  'include', 'echo',
]);

/** One or more trailing backslashes continue a macro body onto the next line. */
const LINE_CONTINUATION = /\\+$/;

function isDirectiveKeyword(word: string): word is QcDirectiveKeyword {
  return DIRECTIVE_KEYWORDS.has(word);
}

export interface QcDiagnostic {
  severity: 'warning' | 'error';
  file: string;
  line: number;
  message: string;
}

export interface MacroDefinition {
  readonly name: string;
  readonly parameters: readonly string[];
  readonly body: readonly string[];
  readonly file: string;
  readonly line: number;
}

/** Macros keyed by lower-cased name. */
export type MacroTable = Map<string, MacroDefinition>;

/** Canonical paths of the files currently being expanded. */
export class IncludeStack {
  private readonly entries: string[] = [];

  has(filePath: string): boolean {
    return this.entries.includes(filePath);
  }

  push(filePath: string): void {
    this.entries.push(filePath);
  }

  pop(): void {
    this.entries.pop();
  }

  toArray(): string[] {
    return [...this.entries];
  }
}

export interface FlattenOptions {
  /** Seed variables; mutated in place by directives outside macro bodies. */
  variables?: VariableEnvironment;
  /** Seed macros; mutated in place. */
  macros?: MacroTable;
  includeStack?: IncludeStack;
  /** Fallback include directories, tried after rootDir and the including file's folder. */
  searchDirs?: readonly string[];
  /** First include anchor. Defaults to the root file's folder. */
  rootDir?: string;
}

export interface FlattenResult {
  text: string;
  diagnostics: QcDiagnostic[];
  /** Canonical paths of every file inlined, in first-seen order. */
  includedFiles: string[];
}

export interface FlattenState {
  variables: VariableEnvironment;
  macros: MacroTable;
  includeStack: IncludeStack;
  macroStack: string[];
  searchDirs: readonly string[];
  rootDir: string;
  diagnostics: QcDiagnostic[];
  includedFiles: string[];
}

interface SourceUnit {
  label: string;
  directory: string;
  lines: readonly string[];
  firstLine: number;
}

interface ConditionalFrame {
  active: boolean;
  taken: boolean;
  parentActive: boolean;
  sawElse: boolean;
  line: number;
}

interface MacroCapture {
  name: string;
  parameters: string[];
  body: string[];
  mode: 'continuation' | 'end-marker';
  keep: boolean;
  line: number;
}

type ClassifiedLine =
  | { kind: 'text' }
  | { kind: 'directive'; keyword: QcDirectiveKeyword; rest: string }
  | { kind: 'invocation'; word: string; rest: string };

// ---------------------------------------------------------------------------
// Line helpers
// ---------------------------------------------------------------------------

function leadingWhitespace(line: string): string {
  return /^\s*/.exec(line)?.[0] ?? '';
}

/** Drop a trailing `//` comment that sits outside double quotes. */
export function stripTrailingComment(text: string): string {
  let inQuote = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') inQuote = !inQuote;
    else if (!inQuote && ch === '/' && text[i + 1] === '/') return text.slice(0, i);
  }
  return text;
}

/** Whitespace-separated arguments; double quotes group and are removed. */
export function splitArguments(text: string): string[] {
  const args: string[] = [];
  for (const match of text.matchAll(/"([^"]*)"|(\S+)/g)) {
    args.push(match[1] ?? match[2] ?? '');
  }
  return args;
}

function unquote(text: string): string {
  const quoted = /^"(.*)"$/.exec(text);
  return quoted ? quoted[1]! : text;
}

function classifyLine(raw: string): ClassifiedLine {
  const trimmed = raw.trim();
  if (trimmed.startsWith('//')) return { kind: 'text' };
  const match = /^\$([A-Za-z_][A-Za-z0-9_]*)(.*)$/.exec(trimmed);
  if (!match) return { kind: 'text' };
  const word = match[1]!.toLowerCase();
  const rest = stripTrailingComment(match[2]!).trim();
  if (isDirectiveKeyword(word)) return { kind: 'directive', keyword: word, rest };
  return { kind: 'invocation', word, rest };
}

function indentLines(lines: readonly string[], indent: string): string[] {
  if (indent === '') return [...lines];
  return lines.map((line) => (line.length > 0 ? indent + line : line));
}

function formatMissing(names: readonly string[]): string {
  return names.map((name) => `$${name}$`).join(', ');
}

function describeRejection(outcome: DefineOutcome): string | null {
  switch (outcome.kind) {
    case 'defined':
      return null;
    case 'already-defined':
      return `variable "${outcome.name}" is already defined as "${outcome.existing}"; use $redefinevariable`;
    case 'shadowed-by-argument':
      return `variable "${outcome.name}" is a macro argument and cannot be redefined`;
    case 'not-defined':
      return `variable "${outcome.name}" is not defined; use $definevariable`;
    case 'invalid-name':
      return `invalid variable name "${outcome.name}"`;
  }
}

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function readSourceLines(filePath: string): string[] {
  const lines = readFileSync(filePath, 'utf8').split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

// ---------------------------------------------------------------------------
// Flattening
// ---------------------------------------------------------------------------

function displayPath(state: FlattenState, filePath: string): string {
  return path.relative(state.rootDir, filePath).replace(/\\/g, '/');
}

function resolveIncludeTarget(
  target: string,
  unit: SourceUnit,
  line: number,
  state: FlattenState,
): string {
  const anchors = path.isAbsolute(target)
    ? [target]
    : [state.rootDir, unit.directory, ...state.searchDirs].map((dir) => path.resolve(dir, target));
  const candidates = [...new Set(anchors)];

  for (const candidate of candidates) {
    if (isFile(candidate)) return realpathSync(candidate);
  }
  throw new QcIncludeNotFoundError(target, unit.label, line, candidates);
}

function flattenFile(filePath: string, state: FlattenState): string[] {
  return flattenUnit(
    {
      label: filePath,
      directory: path.dirname(filePath),
      lines: readSourceLines(filePath),
      firstLine: 1,
    },
    state,
  );
}

function flattenUnit(unit: SourceUnit, state: FlattenState): string[] {
  const out: string[] = [];
  const frames: ConditionalFrame[] = [];
  let capture: MacroCapture | null = null;

  const isActive = (): boolean => frames.length === 0 || frames[frames.length - 1]!.active;

  const report = (
    line: number,
    severity: QcDiagnostic['severity'],
    message: string,
    indent: string,
  ): void => {
    state.diagnostics.push({ severity, file: unit.label, line, message });
    out.push(`${indent}// [qc] ${message}`);
  };

  const finishCapture = (finished: MacroCapture, line: number, indent: string): void => {
    if (!finished.keep) return;
    const key = finished.name.toLowerCase();
    if (state.macros.has(key)) {
      report(line, 'warning', `macro "${finished.name}" is already defined; keeping the first definition`, indent);
      return;
    }
    state.macros.set(key, {
      name: finished.name,
      parameters: finished.parameters,
      body: finished.body,
      file: unit.label,
      line: finished.line,
    });
  };

  for (let i = 0; i < unit.lines.length; i++) {
    const raw = unit.lines[i]!;
    const line = unit.firstLine + i;
    const indent = leadingWhitespace(raw);

    // Macro bodies are captured verbatim, directives included.
    if (capture) {
      if (capture.mode === 'continuation') {
        const body = raw.trimEnd();
        if (LINE_CONTINUATION.test(body)) {
          capture.body.push(body.replace(LINE_CONTINUATION, '').trimEnd());
          continue;
        }
        capture.body.push(raw);
      } else if (raw.trim().split(/\s+/)[0]?.toLowerCase() !== '$endmacro') {
        capture.body.push(raw);
        continue;
      }
      finishCapture(capture, line, indent);
      capture = null;
      continue;
    }

    const classified = classifyLine(raw);

    if (classified.kind === 'directive') {
      const { keyword, rest } = classified;
      const top = frames[frames.length - 1];

      switch (keyword) {
        case 'if': {
          const parentActive = isActive();
          let taken = false;
          if (parentActive) {
            const result = evaluateCondition(rest, state.variables);
            if (result.error) report(line, 'error', `$if: ${result.error}`, indent);
            taken = result.value;
          }
          frames.push({ active: taken, taken, parentActive, sawElse: false, line });
          continue;
        }

        case 'ifdef':
        case 'ifndef': {
          const parentActive = isActive();
          const name = (splitArguments(rest)[0] ?? '').replace(/^\$|\$$/g, '');
          let taken = false;
          if (parentActive) {
            if (name === '') {
              report(line, 'error', `$${keyword} requires a variable name`, indent);
            } else {
              const defined = state.variables.has(name);
              taken = keyword === 'ifdef' ? defined : !defined;
            }
          }
          frames.push({ active: taken, taken, parentActive, sawElse: false, line });
          continue;
        }

        case 'elif': {
          if (!top) {
            report(line, 'error', '$elif without $if', indent);
            continue;
          }
          if (top.sawElse) {
            if (top.parentActive) report(line, 'error', '$elif after $else', indent);
            top.active = false;
            continue;
          }
          if (!top.parentActive || top.taken) {
            top.active = false;
            continue;
          }
          const result = evaluateCondition(rest, state.variables);
          if (result.error) report(line, 'error', `$elif: ${result.error}`, indent);
          top.active = result.value;
          top.taken = result.value;
          continue;
        }

        case 'else': {
          if (!top) {
            report(line, 'error', '$else without $if', indent);
            continue;
          }
          if (top.sawElse) {
            if (top.parentActive) report(line, 'error', 'duplicate $else', indent);
            top.active = false;
            continue;
          }
          top.active = top.parentActive && !top.taken;
          top.taken = true;
          top.sawElse = true;
          continue;
        }

        case 'endif': {
          if (!top) {
            report(line, 'error', '$endif without $if', indent);
            continue;
          }
          frames.pop();
          continue;
        }

        case 'definemacro': {
          const active = isActive();
          let header = rest;
          let mode: MacroCapture['mode'] = 'end-marker';
          if (LINE_CONTINUATION.test(header)) {
            header = header.replace(LINE_CONTINUATION, '');
            mode = 'continuation';
          }
          const [name, ...parameters] = splitArguments(header);
          if (name === undefined && active) {
            report(line, 'error', '$definemacro requires a macro name', indent);
          }
          // Inactive or nameless definitions are still consumed so their bodies stay inert.
          capture = {
            name: name ?? '',
            parameters,
            body: [],
            mode,
            keep: active && name !== undefined,
            line,
          };
          continue;
        }

        default:
          break;
      }

      if (!isActive()) continue;

      switch (keyword) {
        case 'definevariable':
        case 'redefinevariable': {
          const match = /^(\S+)\s*(.*)$/.exec(rest);
          if (!match) {
            report(line, 'error', `$${keyword} requires a variable name`, indent);
            continue;
          }
          const name = match[1]!;
          const substituted = state.variables.substitute(match[2]!);
          if (!substituted.ok) {
            report(
              line,
              'warning',
              `undefined variable(s) ${formatMissing(substituted.missing)} in $${keyword} ${name}; directive skipped`,
              indent,
            );
            continue;
          }
          const value = evaluateValueExpression(substituted.text, state.variables);
          const outcome = keyword === 'definevariable'
            ? state.variables.define(name, value)
            : state.variables.redefine(name, value);
          const rejection = describeRejection(outcome);
          if (rejection) report(line, 'warning', rejection, indent);
          continue;
        }

        case 'include': {
          const substituted = state.variables.substitute(rest);
          if (!substituted.ok) {
            report(
              line,
              'warning',
              `undefined variable(s) ${formatMissing(substituted.missing)} in $include; directive skipped`,
              indent,
            );
            continue;
          }
          const target = unquote(substituted.text.trim()).replace(/\\/g, '/');
          if (target === '') {
            report(line, 'error', '$include requires a path', indent);
            continue;
          }

          const resolved = resolveIncludeTarget(target, unit, line, state);
          if (state.includeStack.has(resolved)) {
            const chain = [...state.includeStack.toArray(), resolved].map((p) => displayPath(state, p));
            report(line, 'error', `include cycle: ${chain.join(' -> ')}`, indent);
            continue;
          }

          if (!state.includedFiles.includes(resolved)) state.includedFiles.push(resolved);
          state.includeStack.push(resolved);
          try {
            out.push(...indentLines(flattenFile(resolved, state), indent));
          } finally {
            state.includeStack.pop();
          }
          continue;
        }

        case 'echo': {
          const substituted = state.variables.substitute(rest);
          if (!substituted.ok) {
            report(line, 'warning', `undefined variable(s) ${formatMissing(substituted.missing)} in $echo`, indent);
            continue;
          }
          out.push(`${indent}// $echo ${substituted.text}`.trimEnd());
          continue;
        }

        case 'endmacro':
          report(line, 'warning', '$endmacro without $definemacro', indent);
          continue;

        default:
          continue;
      }
    }

    if (!isActive()) continue;

    if (classified.kind === 'invocation') {
      const macro = state.macros.get(classified.word);
      if (macro) {
        expandMacro(macro, classified.rest, unit, line, indent, state, out, report);
        continue;
      }
    }

    if (raw.trim().startsWith('//')) {
      out.push(raw);
      continue;
    }

    // Only the code part is substituted; a trailing comment is kept as written.
    const code = stripTrailingComment(raw);
    const substituted = state.variables.substitute(code);
    if (substituted.ok) {
      out.push(substituted.text + raw.slice(code.length));
    } else {
      report(line, 'warning', `undefined variable(s) ${formatMissing(substituted.missing)}: ${raw.trim()}`, indent);
    }
  }

  const endLine = unit.firstLine + unit.lines.length - 1;
  if (capture) {
    if (capture.keep) {
      report(capture.line, 'error', `unterminated $definemacro "${capture.name}"`, '');
    }
  }
  for (const frame of frames) {
    if (frame.parentActive) report(frame.line, 'error', `unterminated $if (reached line ${endLine})`, '');
  }

  return out;
}

function expandMacro(
  macro: MacroDefinition,
  argumentText: string,
  unit: SourceUnit,
  line: number,
  indent: string,
  state: FlattenState,
  out: string[],
  report: (line: number, severity: QcDiagnostic['severity'], message: string, indent: string) => void,
): void {
  const key = macro.name.toLowerCase();
  const substituted = state.variables.substitute(argumentText);
  if (!substituted.ok) {
    report(
      line,
      'warning',
      `undefined variable(s) ${formatMissing(substituted.missing)} in call to macro "${macro.name}"; call skipped`,
      indent,
    );
    return;
  }
  if (state.macroStack.includes(key)) {
    report(line, 'error', `recursive call to macro "${macro.name}"`, indent);
    return;
  }

  const args = splitArguments(substituted.text);
  const bound = new Map<string, string>();
  macro.parameters.forEach((parameter, index) => {
    const value = args[index];
    if (value !== undefined) bound.set(parameter, value);
  });

  const missing = macro.parameters.slice(args.length);
  if (missing.length > 0) {
    report(line, 'warning', `macro "${macro.name}" is missing argument(s): ${missing.join(', ')}`, indent);
  } else if (args.length > macro.parameters.length) {
    report(
      line,
      'warning',
      `macro "${macro.name}" takes ${macro.parameters.length} argument(s), got ${args.length}`,
      indent,
    );
  }

  const nested: FlattenState = { ...state, variables: state.variables.withArguments(bound) };
  state.macroStack.push(key);
  try {
    const expanded = flattenUnit(
      {
        label: `${unit.label} > $${macro.name}`,
        directory: unit.directory,
        lines: macro.body,
        firstLine: macro.line + 1,
      },
      nested,
    );
    out.push(...indentLines(expanded, indent));
  } finally {
    state.macroStack.pop();
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

function createState(options: FlattenOptions, defaultRootDir: string): FlattenState {
  const rootDir = path.resolve(options.rootDir ?? defaultRootDir);
  return {
    variables: options.variables ?? new VariableEnvironment(),
    macros: options.macros ?? new Map(),
    includeStack: options.includeStack ?? new IncludeStack(),
    macroStack: [],
    searchDirs: (options.searchDirs ?? []).map((dir) => path.resolve(dir)),
    rootDir: isDirectory(rootDir) ? realpathSync(rootDir) : rootDir,
    diagnostics: [],
    includedFiles: [],
  };
}

function isDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

function toResult(lines: readonly string[], state: FlattenState): FlattenResult {
  return {
    text: lines.length > 0 ? `${lines.join('\n')}\n` : '',
    diagnostics: state.diagnostics,
    includedFiles: state.includedFiles,
  };
}

/**
 * Flatten a QC file and everything it includes.
 *
 * @throws QcFileNotFoundError when `rootFile` does not exist
 * @throws QcIncludeNotFoundError when an `$include` cannot be resolved
 */
export function flattenQc(rootFile: string, options: FlattenOptions = {}): FlattenResult {
  if (!isFile(rootFile)) throw new QcFileNotFoundError(rootFile);
  const canonical = realpathSync(rootFile);
  const state = createState(options, path.dirname(canonical));

  if (state.includeStack.has(canonical)) {
    state.diagnostics.push({
      severity: 'error',
      file: canonical,
      line: 0,
      message: `include cycle: ${displayPath(state, canonical)} is already being expanded`,
    });
    return toResult([], state);
  }

  state.includeStack.push(canonical);
  try {
    return toResult(flattenFile(canonical, state), state);
  } finally {
    state.includeStack.pop();
  }
}

/** Flatten QC text held in memory; includes resolve from `directory`. */
export function flattenQcText(
  source: string,
  options: FlattenOptions & { label?: string; directory?: string } = {},
): FlattenResult {
  const directory = path.resolve(options.directory ?? process.cwd());
  const state = createState(options, directory);
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  const unit: SourceUnit = { label: options.label ?? '<qc>', directory, lines, firstLine: 1 };
  return toResult(flattenUnit(unit, state), state);
}

export function formatDiagnostic(diagnostic: QcDiagnostic): string {
  return `${diagnostic.file}:${diagnostic.line}: ${diagnostic.severity}: ${diagnostic.message}`;
}
