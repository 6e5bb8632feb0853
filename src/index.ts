export { commandMatches, defineApp, defineCommand } from './core/command';
export type { AppInput, CommandInput } from './core/command';
export { Context, collectOccurrences, flagScope } from './core/context';
export type { ContextInit } from './core/context';
export { prepareInvocation, run, runWithResult } from './core/dispatch';
export type { Invocation } from './core/dispatch';
export { ActionError, DefinitionError, FlagError } from './core/errors';
export type { FlagErrorKind } from './core/errors';
export { defineFlag, flagMatches, parseFloatValue, parseIntValue } from './core/flag';
export type { FlagInput } from './core/flag';
export { resolveRunOptions } from './core/options';
export type { ResolvedRunOptions, RunOptions } from './core/options';
export { resolveCommand } from './core/resolve';
export { err, isErr, isOk, ok, unwrapOr } from './core/result';
export type { Result } from './core/result';
export { extractTokens } from './core/tokenize';
export { renderHelp } from './help';
export type { HelpHints } from './help';
export type {
  Action,
  AppDescriptor,
  CommandDescriptor,
  ExtractedTokens,
  FlagDescriptor,
  FlagType,
  RawFlagOccurrence,
  Resolution,
  ResultAction,
} from './types';
export { colors } from './utils/colors';
