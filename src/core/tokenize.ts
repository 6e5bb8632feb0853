/**
 * Split command-line tokens into positionals and raw flag occurrences.
 *
 * The tokenizer knows nothing about declared flags: `--key value` always
 * consumes `value` when it does not start with '-', even if `key` later turns
 * out to be a bool flag. Coercion and type checks happen in the Context.
 */

import type { ExtractedTokens, RawFlagOccurrence } from '../types';

function isFlagToken(token: string): boolean {
  return token.startsWith('-');
}

/** Strip one (short) or two (long) leading dashes */
function stripDashes(token: string): string {
  return token.startsWith('--') ? token.slice(2) : token.slice(1);
}

export function extractTokens(tokens: readonly string[]): ExtractedTokens {
  const positionals: string[] = [];
  const flags: RawFlagOccurrence[] = [];

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];
    i++;
    if (token === undefined) {
      continue;
    }

    if (!isFlagToken(token)) {
      positionals.push(token);
      continue;
    }

    const body = stripDashes(token);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      flags.push({ key: body.slice(0, eq), value: body.slice(eq + 1) });
      continue;
    }

    // Lookahead: the next token is this flag's value unless it is a flag itself
    const next = tokens[i];
    if (next !== undefined && !isFlagToken(next)) {
      flags.push({ key: body, value: next });
      i++;
    } else {
      flags.push({ key: body });
    }
  }

  return { positionals, flags };
}
