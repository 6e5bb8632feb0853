/**
 * Error types surfaced by argvine.
 */

/** Why a typed flag lookup failed */
export type FlagErrorKind =
  | 'Undefined'
  | 'TypeError'
  | 'NotFound'
  | 'ArgumentError'
  | 'ValueTypeError';

const FLAG_ERROR_DESCRIPTIONS: Record<FlagErrorKind, string> = {
  Undefined: 'Flag undefined',
  TypeError: 'Flag type mismatch',
  NotFound: 'Flag not found',
  ArgumentError: 'Illegal argument',
  ValueTypeError: 'Value type mismatch',
};

export class FlagError extends Error {
  constructor(
    public readonly kind: FlagErrorKind,
    public readonly flag: string,
  ) {
    super(`${FLAG_ERROR_DESCRIPTIONS[kind]}: ${flag}`);
    this.name = 'FlagError';
  }
}

/** Failure reported by a result-returning action */
export class ActionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ActionError';
  }
}

/**
 * Thrown when a command or flag definition breaks a tree invariant
 * (empty name, duplicate sibling name or alias, ...).
 */
export class DefinitionError extends Error {
  constructor(
    public readonly target: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid definition for "${target}":\n  ${issues.join('\n  ')}`);
    this.name = 'DefinitionError';
  }
}
