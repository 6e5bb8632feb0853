/**
 * Command and app definitions.
 *
 * Definitions are plain aggregates validated once, when they are built:
 * duplicate names and aliases are rejected here, never at dispatch time.
 * The returned descriptors are frozen.
 */

import * as z from 'zod';
import type {
  Action,
  AppDescriptor,
  CommandDescriptor,
  FlagDescriptor,
  ResultAction,
} from '../types';
import { AliasListSchema, KeySchema, findCollisions, parseDefinition } from './schema';

export interface CommandInput {
  name: string;
  /** List of aliases, or one comma-joined string ("a, ad") */
  aliases?: string | readonly string[];
  description?: string;
  usage?: string;
  /** Built with defineFlag */
  flags?: readonly FlagDescriptor[];
  /** Built with defineCommand */
  commands?: readonly CommandDescriptor[];
  action?: Action;
  /** Like action, but reports failure as an ActionError result */
  resultAction?: ResultAction;
}

export interface AppInput extends CommandInput {
  version?: string;
  author?: string;
  displayName?: string;
  customHelp?: string;
}

const isFunction = (value: unknown) => typeof value === 'function';

const FlagDescriptorSchema = z.custom<FlagDescriptor>(
  (value) => typeof value === 'object' && value !== null && 'name' in value && 'type' in value,
  'must be a flag built with defineFlag',
);

const CommandDescriptorSchema = z.custom<CommandDescriptor>(
  (value) =>
    typeof value === 'object' && value !== null && 'name' in value && 'children' in value,
  'must be a command built with defineCommand',
);

const commandShape = {
  name: KeySchema,
  aliases: AliasListSchema.pipe(z.array(KeySchema)),
  description: z.string().optional(),
  usage: z.string().optional(),
  flags: z.array(FlagDescriptorSchema).readonly().default([]),
  commands: z.array(CommandDescriptorSchema).readonly().default([]),
  action: z.custom<Action>(isFunction, 'must be a function').optional(),
  resultAction: z.custom<ResultAction>(isFunction, 'must be a function').optional(),
};

type ParsedCommand = {
  name: string;
  aliases: string[];
  flags: readonly FlagDescriptor[];
  commands: readonly CommandDescriptor[];
  action?: Action;
  resultAction?: ResultAction;
};

interface TreeIssue {
  path: string;
  message: string;
}

function findTreeIssues(command: ParsedCommand): TreeIssue[] {
  const issues: TreeIssue[] = [
    ...findCollisions([command]).map((message) => ({ path: 'aliases', message })),
    ...findCollisions(command.flags).map((message) => ({ path: 'flags', message })),
    ...findCollisions(command.commands).map((message) => ({ path: 'commands', message })),
  ];
  if (command.action && command.resultAction) {
    issues.push({ path: 'resultAction', message: 'action and resultAction are mutually exclusive' });
  }
  return issues;
}

const checkTreeInvariants = (
  command: ParsedCommand,
  ctx: { addIssue: (issue: { code: 'custom'; path: string[]; message: string }) => void },
) => {
  for (const issue of findTreeIssues(command)) {
    ctx.addIssue({ code: 'custom', path: [issue.path], message: issue.message });
  }
};

const CommandInputSchema = z.strictObject(commandShape).superRefine(checkTreeInvariants);

const AppInputSchema = z
  .strictObject({
    ...commandShape,
    version: z.string().optional(),
    author: z.string().optional(),
    displayName: z.string().optional(),
    customHelp: z.string().optional(),
  })
  .superRefine(checkTreeInvariants);

function toDescriptor(parsed: z.output<typeof CommandInputSchema>): CommandDescriptor {
  return {
    name: parsed.name,
    aliases: Object.freeze(parsed.aliases),
    description: parsed.description,
    usage: parsed.usage,
    flags: Object.freeze([...parsed.flags]),
    children: Object.freeze([...parsed.commands]),
    action: parsed.action,
    resultAction: parsed.resultAction,
  };
}

export function defineCommand(input: CommandInput): CommandDescriptor {
  const parsed = parseDefinition(CommandInputSchema, input, input.name);
  return Object.freeze(toDescriptor(parsed));
}

/**
 * Define the root of the command tree. Its action runs when no child
 * command matches (or the matched one has no action).
 */
export function defineApp(input: AppInput): AppDescriptor {
  const parsed = parseDefinition(AppInputSchema, input, input.name);
  const app: AppDescriptor = {
    ...toDescriptor(parsed),
    version: parsed.version,
    author: parsed.author,
    displayName: parsed.displayName,
    customHelp: parsed.customHelp,
  };
  return Object.freeze(app);
}

/**
 * Check whether a positional token names this command (exact, case-sensitive).
 */
export function commandMatches(command: CommandDescriptor, token: string): boolean {
  return command.name === token || command.aliases.includes(token);
}
