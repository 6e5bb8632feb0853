/**
 * Shared types for argvine.
 */

import type { Context } from './core/context';
import type { ActionError } from './core/errors';
import type { Result } from './core/result';

/** How a flag's textual value is coerced. Bool flags never need a value token. */
export type FlagType = 'bool' | 'string' | 'int' | 'float';

/** A declared, typed command-line option */
export interface FlagDescriptor {
  /** Canonical name, matched as `--name` or `-name` */
  readonly name: string;
  readonly aliases: readonly string[];
  readonly type: FlagType;
  readonly description?: string;
}

/** One flag token as written on the command line */
export interface RawFlagOccurrence {
  /** Name or alias as typed, without leading dashes */
  readonly key: string;
  /** Undefined when no value token was consumed */
  readonly value?: string;
}

/** Output of the tokenizer */
export interface ExtractedTokens {
  readonly positionals: readonly string[];
  readonly flags: readonly RawFlagOccurrence[];
}

export type Action = (context: Context) => void;

/** An action that reports failure as a value instead of throwing */
export type ResultAction = (context: Context) => Result<void, ActionError>;

/** A node of the command tree. Parents own their flags and children. */
export interface CommandDescriptor {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly description?: string;
  readonly usage?: string;
  readonly flags: readonly FlagDescriptor[];
  readonly children: readonly CommandDescriptor[];
  readonly action?: Action;
  readonly resultAction?: ResultAction;
}

/** Root of the command tree, carrying program-wide metadata */
export interface AppDescriptor extends CommandDescriptor {
  readonly version?: string;
  readonly author?: string;
  /** Shown in help instead of `name` (e.g. a colorized name) */
  readonly displayName?: string;
  /** Replaces the generated root help text verbatim */
  readonly customHelp?: string;
}

/** Result of walking the command tree */
export interface Resolution {
  /** Most specific matched command */
  readonly command: CommandDescriptor;
  /** Chain from the root to `command`, inclusive */
  readonly path: readonly CommandDescriptor[];
  /** Positionals left after the matched command names */
  readonly remainingArgs: readonly string[];
}
