/**
 * Dispatch conventions layered on top of command resolution.
 */

import * as z from 'zod';
import { FlagKeySchema, KeySchema, parseDefinition } from './schema';

const RunOptionsSchema = z.strictObject({
  /** Undeclared flag keys that render help instead of running the action */
  helpFlags: z.array(FlagKeySchema).readonly().default(['help', 'h']),
  /** Positional that renders help for the command path after it; null disables */
  helpCommand: KeySchema.nullable().default('help'),
  /** Undeclared root flag keys that print the app version */
  versionFlags: z.array(FlagKeySchema).readonly().default(['version', 'V']),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;
export type ResolvedRunOptions = z.output<typeof RunOptionsSchema>;

export function resolveRunOptions(options: RunOptions = {}): ResolvedRunOptions {
  return parseDefinition(RunOptionsSchema, options, 'run options');
}
