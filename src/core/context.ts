/**
 * Per-invocation view of the parsed command line.
 */

import type { FlagDescriptor, FlagType, RawFlagOccurrence } from '../types';
import { FlagError } from './errors';
import { flagMatches, parseFloatValue, parseIntValue } from './flag';
import { err, ok, type Result } from './result';

/**
 * Flags visible to the last command of `path`, nearest declaration first.
 * A flag redeclared lower in the tree shadows the ancestor's descriptor.
 */
export function flagScope(
  path: readonly { readonly flags: readonly FlagDescriptor[] }[],
): FlagDescriptor[] {
  const scope: FlagDescriptor[] = [];
  const seen = new Set<string>();
  for (let i = path.length - 1; i >= 0; i--) {
    for (const flag of path[i]?.flags ?? []) {
      if (!seen.has(flag.name)) {
        seen.add(flag.name);
        scope.push(flag);
      }
    }
  }
  return scope;
}

/** Find the nearest flag in scope named `key` by name or alias */
export function findFlag(
  scope: readonly FlagDescriptor[],
  key: string,
): FlagDescriptor | undefined {
  return scope.find((flag) => flagMatches(flag, key));
}

/**
 * Map occurrences to the declared flag they name, keyed by the flag's
 * canonical name. Later occurrences replace earlier ones; keys that name
 * no flag in scope are dropped.
 */
export function collectOccurrences(
  scope: readonly FlagDescriptor[],
  occurrences: readonly RawFlagOccurrence[],
): Map<string, RawFlagOccurrence> {
  const collected = new Map<string, RawFlagOccurrence>();
  for (const occurrence of occurrences) {
    const flag = findFlag(scope, occurrence.key);
    if (flag) {
      collected.set(flag.name, occurrence);
    }
  }
  return collected;
}

export interface ContextInit {
  args: readonly string[];
  scope: readonly FlagDescriptor[];
  occurrences: readonly RawFlagOccurrence[];
  /** Names from the root to the matched command */
  commandPath?: readonly string[];
  helpText?: string;
}

/**
 * Read-only bundle handed to an action: the matched command's positional
 * args plus typed access to the flags in scope.
 */
export class Context {
  readonly args: readonly string[];
  readonly commandPath: readonly string[];
  readonly flags: ReadonlyMap<string, RawFlagOccurrence>;
  private readonly scope: readonly FlagDescriptor[];
  private readonly helpText: string;

  constructor(init: ContextInit) {
    this.args = Object.freeze([...init.args]);
    this.commandPath = Object.freeze([...(init.commandPath ?? [])]);
    this.scope = Object.freeze([...init.scope]);
    this.flags = collectOccurrences(this.scope, init.occurrences);
    this.helpText = init.helpText ?? '';
  }

  /**
   * Whether a bool flag was given. Never fails: an absent, undeclared or
   * non-bool flag reads as false. Any value token after it is ignored.
   */
  boolFlag(name: string): boolean {
    const flag = findFlag(this.scope, name);
    return flag?.type === 'bool' && this.flags.has(flag.name);
  }

  stringFlag(name: string): Result<string, FlagError> {
    return this.typedFlag(name, 'string', (raw) => raw);
  }

  intFlag(name: string): Result<number, FlagError> {
    return this.typedFlag(name, 'int', parseIntValue);
  }

  floatFlag(name: string): Result<number, FlagError> {
    return this.typedFlag(name, 'float', parseFloatValue);
  }

  /** Print the help text of the matched command */
  help(): void {
    console.log(this.helpText);
  }

  private typedFlag<T>(
    name: string,
    type: Exclude<FlagType, 'bool'>,
    parse: (raw: string) => T | undefined,
  ): Result<T, FlagError> {
    const flag = findFlag(this.scope, name);
    if (!flag) {
      return err(new FlagError('Undefined', name));
    }
    if (flag.type !== type) {
      return err(new FlagError('TypeError', name));
    }

    const occurrence = this.flags.get(flag.name);
    if (!occurrence) {
      return err(new FlagError('NotFound', name));
    }
    if (occurrence.value === undefined) {
      return err(new FlagError('ArgumentError', name));
    }

    const value = parse(occurrence.value);
    if (value === undefined) {
      return err(new FlagError('ValueTypeError', name));
    }
    return ok(value);
  }
}
