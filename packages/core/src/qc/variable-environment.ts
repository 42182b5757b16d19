/**
 * Layered variable table for QC preprocessing.
 *
 * Two tiers:
 *   - defined variables, which persist across includes within one flatten tree
 *   - macro-argument overrides, which shadow defined variables inside one
 *     macro expansion only
 *
 * Substitution replaces every `$name$` reference, overrides first.
 */

export const VARIABLE_REFERENCE = /\$([A-Za-z_][A-Za-z0-9_]*)\$/g;
const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type DefineOutcome =
  | { kind: 'defined'; name: string; value: string }
  | { kind: 'already-defined'; name: string; existing: string }
  | { kind: 'shadowed-by-argument'; name: string }
  | { kind: 'not-defined'; name: string }
  | { kind: 'invalid-name'; name: string };

export type SubstitutionResult =
  | { ok: true; text: string }
  | { ok: false; missing: string[] };

export function isValidVariableName(name: string): boolean {
  return VARIABLE_NAME.test(name);
}

export class VariableEnvironment {
  private readonly defined: Map<string, string>;
  private readonly overrides: Map<string, string>;

  constructor(
    initial: Iterable<readonly [string, string]> = [],
    overrides: Iterable<readonly [string, string]> = [],
  ) {
    this.defined = new Map(initial);
    this.overrides = new Map(overrides);
  }

  static fromRecord(record: Readonly<Record<string, string>>): VariableEnvironment {
    return new VariableEnvironment(Object.entries(record));
  }

  /** Value of `name`, macro arguments taking precedence. */
  lookup(name: string): string | undefined {
    return this.overrides.get(name) ?? this.defined.get(name);
  }

  has(name: string): boolean {
    return this.overrides.has(name) || this.defined.has(name);
  }

  isArgument(name: string): boolean {
    return this.overrides.has(name);
  }

  define(name: string, value: string): DefineOutcome {
    if (!isValidVariableName(name)) return { kind: 'invalid-name', name };
    if (this.overrides.has(name)) return { kind: 'shadowed-by-argument', name };
    const existing = this.defined.get(name);
    if (existing !== undefined) return { kind: 'already-defined', name, existing };
    this.defined.set(name, value);
    return { kind: 'defined', name, value };
  }

  redefine(name: string, value: string): DefineOutcome {
    if (!isValidVariableName(name)) return { kind: 'invalid-name', name };
    if (this.overrides.has(name)) return { kind: 'shadowed-by-argument', name };
    if (!this.defined.has(name)) return { kind: 'not-defined', name };
    this.defined.set(name, value);
    return { kind: 'defined', name, value };
  }

  /**
   * Copy of this environment with `args` layered over the existing overrides.
   * Definitions made in the copy never reach this environment.
   */
  withArguments(args: ReadonlyMap<string, string>): VariableEnvironment {
    return new VariableEnvironment(this.defined, [...this.overrides, ...args]);
  }

  /** Copy of the defined tier, dropping any macro arguments. */
  clone(): VariableEnvironment {
    return new VariableEnvironment(this.defined);
  }

  substitute(text: string): SubstitutionResult {
    const missing: string[] = [];
    const replaced = text.replace(VARIABLE_REFERENCE, (match, name: string) => {
      const value = this.lookup(name);
      if (value === undefined) {
        if (!missing.includes(name)) missing.push(name);
        return match;
      }
      return value;
    });
    return missing.length > 0 ? { ok: false, missing } : { ok: true, text: replaced };
  }

  /** Defined variables only, sorted by name. */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const name of [...this.defined.keys()].sort()) {
      record[name] = this.defined.get(name) ?? '';
    }
    return record;
  }
}
