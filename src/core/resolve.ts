import type { CommandDescriptor, Resolution } from '../types';
import { commandMatches } from './command';

/**
 * Walk the command tree against the positionals.
 *
 * Greedy and leftmost: each positional that names a child of the current
 * command descends into it; the first one that does not ends the walk and,
 * with everything after it, becomes the matched command's args. There is no
 * backtracking, and resolution never fails (worst case the root matches).
 */
export function resolveCommand(
  root: CommandDescriptor,
  positionals: readonly string[],
): Resolution {
  const path: CommandDescriptor[] = [root];
  let current = root;
  let cursor = 0;

  while (cursor < positionals.length) {
    const token = positionals[cursor];
    const child =
      token === undefined
        ? undefined
        : current.children.find((candidate) => commandMatches(candidate, token));
    if (!child) {
      break;
    }
    current = child;
    path.push(child);
    cursor++;
  }

  return {
    command: current,
    path,
    remainingArgs: positionals.slice(cursor),
  };
}
