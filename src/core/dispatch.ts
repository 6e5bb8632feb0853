/**
 * Top-level orchestration: tokens in, action invoked.
 */

import { renderHelp } from '../help';
import type { AppDescriptor, CommandDescriptor } from '../types';
import { Context, findFlag, flagScope } from './context';
import type { ActionError } from './errors';
import { type RunOptions, resolveRunOptions } from './options';
import { resolveCommand } from './resolve';
import { ok, type Result } from './result';
import { extractTokens } from './tokenize';

export type Invocation =
  | {
      kind: 'help';
      /** Root to the command whose help is shown */
      path: readonly CommandDescriptor[];
      text: string;
    }
  | { kind: 'version'; version: string }
  | {
      kind: 'action';
      /** Most specific matched command */
      command: CommandDescriptor;
      /** Command whose action runs: the matched one, or the app as fallback */
      target: CommandDescriptor;
      context: Context;
    }
  | { kind: 'none'; command: CommandDescriptor; context: Context };

function hasAction(command: CommandDescriptor): boolean {
  return command.action !== undefined || command.resultAction !== undefined;
}

/**
 * Work out what `argv` asks for without running anything.
 * `argv[0]` is the program's own name and is discarded.
 */
export function prepareInvocation(
  app: AppDescriptor,
  argv: readonly string[],
  options?: RunOptions,
): Invocation {
  const { helpFlags, helpCommand, versionFlags } = resolveRunOptions(options);
  const hints = { helpCommand, helpFlag: helpFlags[0] ?? null };

  const { positionals, flags } = extractTokens(argv.slice(1));
  const resolution = resolveCommand(app, positionals);
  const scope = flagScope(resolution.path);

  // Reserved keys only count when no flag in scope claims them
  const hasReserved = (keys: readonly string[]) =>
    flags.some(({ key }) => keys.includes(key) && !findFlag(scope, key));

  if (helpCommand !== null && resolution.remainingArgs[0] === helpCommand) {
    const nested = resolveCommand(resolution.command, resolution.remainingArgs.slice(1));
    const path = [...resolution.path, ...nested.path.slice(1)];
    return { kind: 'help', path, text: renderHelp(app, path, hints) };
  }

  if (hasReserved(helpFlags)) {
    return {
      kind: 'help',
      path: resolution.path,
      text: renderHelp(app, resolution.path, hints),
    };
  }

  if (resolution.command === app && app.version !== undefined && hasReserved(versionFlags)) {
    return { kind: 'version', version: app.version };
  }

  const context = new Context({
    args: resolution.remainingArgs,
    scope,
    occurrences: flags,
    commandPath: resolution.path.map((command) => command.name),
    helpText: renderHelp(app, resolution.path, hints),
  });

  const target = hasAction(resolution.command) ? resolution.command : app;
  if (!hasAction(target)) {
    return { kind: 'none', command: resolution.command, context };
  }
  return { kind: 'action', command: resolution.command, target, context };
}

function invoke(target: CommandDescriptor, context: Context): Result<void, ActionError> {
  if (target.resultAction) {
    return target.resultAction(context);
  }
  target.action?.(context);
  return ok(undefined);
}

/**
 * Dispatch `argv` and return the action's failure, if it reported one.
 * Help and version output go to stdout. A command tree with nothing to
 * run for `argv` is not an error: nothing happens.
 */
export function runWithResult(
  app: AppDescriptor,
  argv: readonly string[],
  options?: RunOptions,
): Result<void, ActionError> {
  const invocation = prepareInvocation(app, argv, options);
  switch (invocation.kind) {
    case 'help':
      console.log(invocation.text);
      return ok(undefined);
    case 'version':
      console.log(invocation.version);
      return ok(undefined);
    case 'none':
      return ok(undefined);
    case 'action':
      return invoke(invocation.target, invocation.context);
  }
}

/**
 * Dispatch `argv`, reporting a failed result action on stderr.
 * Never exits the process; exit codes belong to the host program.
 */
export function run(app: AppDescriptor, argv: readonly string[], options?: RunOptions): void {
  const result = runWithResult(app, argv, options);
  if (!result.ok) {
    console.error(`${app.name}: ${result.error.message}`);
  }
}
