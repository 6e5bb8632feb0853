/**
 * Zod schemas shared by the flag and command definitions.
 */

import * as z from 'zod';
import { DefinitionError } from './errors';

/**
 * Split comma-joined alias declarations and drop blanks.
 * e.g. "a, ag" or ["a", "ag"] both become ["a", "ag"].
 */
export function normalizeAliases(aliases: string | readonly string[] | undefined): string[] {
  if (aliases === undefined) {
    return [];
  }
  const entries = typeof aliases === 'string' ? [aliases] : aliases;
  return entries
    .flatMap((entry) => entry.split(','))
    .map((alias) => alias.trim())
    .filter((alias) => alias.length > 0);
}

/** A name or alias as it is matched against a command-line token */
export const KeySchema = z
  .string()
  .min(1, 'must not be empty')
  .refine((key) => !key.startsWith('-'), "must not start with '-'")
  .refine((key) => !/\s/.test(key), 'must not contain whitespace');

export const FlagKeySchema = KeySchema.refine((key) => !key.includes('='), "must not contain '='");

export const AliasListSchema = z
  .union([z.string(), z.array(z.string()).readonly()])
  .optional()
  .transform(normalizeAliases);

/** Report names/aliases claimed by more than one entry */
export function findCollisions(entries: readonly { name: string; aliases: readonly string[] }[]) {
  const owners = new Map<string, string>();
  const collisions: string[] = [];
  for (const entry of entries) {
    for (const key of [entry.name, ...entry.aliases]) {
      const owner = owners.get(key);
      if (owner !== undefined) {
        collisions.push(`"${key}" of "${entry.name}" is already used by "${owner}"`);
      } else {
        owners.set(key, entry.name);
      }
    }
  }
  return collisions;
}

function formatIssue(issue: z.ZodError['issues'][number]): string {
  const path = issue.path.map(String).join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Parse with a schema, throwing DefinitionError with every issue on failure.
 */
export function parseDefinition<S extends z.ZodType>(
  schema: S,
  input: unknown,
  target: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new DefinitionError(target, result.error.issues.map(formatIssue));
  }
  return result.data;
}
