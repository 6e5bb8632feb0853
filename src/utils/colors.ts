/**
 * ANSI color helpers with TTY detection.
 * Colors are disabled when not writing to a TTY or when NO_COLOR is set.
 */

/**
 * Determines if color output should be used.
 * Evaluated lazily to allow tests to control via environment variables.
 * @internal Exported for testing
 */
export function shouldUseColor(): boolean {
  return Boolean(process.stdout.isTTY && !process.env.NO_COLOR);
}

const paint = (code: number) => (s: string) =>
  shouldUseColor() ? `\x1b[${code}m${s}\x1b[0m` : s;

export const green = paint(32);
export const yellow = paint(33);
export const blue = paint(34);
export const magenta = paint(35);
export const cyan = paint(36);
export const red = paint(31);
export const dim = paint(2);
export const bold = paint(1);

/**
 * Color object for convenient grouped access.
 */
export const colors = {
  green,
  yellow,
  blue,
  magenta,
  cyan,
  red,
  dim,
  bold,
};
