/**
 * Typed error classes for QC preprocessing.
 */

/** Base class for all QC preprocessing errors. */
export class QcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QcError';
  }
}

/** The QC file handed to the flattener does not exist. */
export class QcFileNotFoundError extends QcError {
  constructor(public readonly path: string) {
    super(`QC file not found: ${path}`);
    this.name = 'QcFileNotFoundError';
  }
}

/** An `$include` target resolved against none of the include locations. */
export class QcIncludeNotFoundError extends QcError {
  constructor(
    public readonly target: string,
    public readonly file: string,
    public readonly line: number,
    public readonly tried: readonly string[],
  ) {
    super(`Cannot resolve $include "${target}" (${file}:${line}); tried ${tried.join(', ')}`);
    this.name = 'QcIncludeNotFoundError';
  }
}
