/**
 * Flag definitions and value coercion.
 */

import * as z from 'zod';
import type { FlagDescriptor, FlagType } from '../types';
import { AliasListSchema, FlagKeySchema, findCollisions, parseDefinition } from './schema';

export interface FlagInput {
  name: string;
  type: FlagType;
  /** List of aliases, or one comma-joined string ("a, ag") */
  aliases?: string | readonly string[];
  description?: string;
}

const FlagInputSchema = z
  .strictObject({
    name: FlagKeySchema,
    type: z.enum(['bool', 'string', 'int', 'float']),
    aliases: AliasListSchema.pipe(z.array(FlagKeySchema)),
    description: z.string().optional(),
  })
  .superRefine((flag, ctx) => {
    for (const collision of findCollisions([flag])) {
      ctx.addIssue({ code: 'custom', path: ['aliases'], message: collision });
    }
  });

export function defineFlag(input: FlagInput): FlagDescriptor {
  const parsed = parseDefinition(FlagInputSchema, input, `--${input.name}`);
  const flag: FlagDescriptor = {
    name: parsed.name,
    aliases: Object.freeze(parsed.aliases),
    type: parsed.type,
    description: parsed.description,
  };
  return Object.freeze(flag);
}

/**
 * Check whether a flag key (as typed, without dashes) names this flag.
 */
export function flagMatches(flag: FlagDescriptor, key: string): boolean {
  return flag.name === key || flag.aliases.includes(key);
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/** Parse a decimal integer; undefined when malformed or not a safe integer */
export function parseIntValue(raw: string): number | undefined {
  if (!INT_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

/** Parse a decimal or exponent float, also accepting inf/infinity/nan */
export function parseFloatValue(raw: string): number | undefined {
  const special = FLOAT_SPECIAL_PATTERN.exec(raw);
  if (special) {
    if (special[2]?.toLowerCase() === 'nan') {
      return Number.NaN;
    }
    return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return FLOAT_PATTERN.test(raw) ? Number(raw) : undefined;
}
