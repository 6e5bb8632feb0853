import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { colors, shouldUseColor } from '@/utils/colors';

function setTTY(value: boolean | undefined): void {
  Object.defineProperty(process.stdout, 'isTTY', {
    value,
    writable: true,
    configurable: true,
  });
}

describe('colors', () => {
  let originalIsTTY: boolean | undefined;
  let originalNoColor: string | undefined;

  beforeEach(() => {
    originalIsTTY = process.stdout.isTTY;
    originalNoColor = process.env.NO_COLOR;
  });

  afterEach(() => {
    setTTY(originalIsTTY);
    if (originalNoColor === undefined) {
      delete process.env.NO_COLOR;
    } else {
      process.env.NO_COLOR = originalNoColor;
    }
  });

  describe('shouldUseColor', () => {
    test('returns true when TTY and NO_COLOR not set', () => {
      setTTY(true);
      delete process.env.NO_COLOR;
      expect(shouldUseColor()).toBe(true);
    });

    test('returns false when not a TTY', () => {
      setTTY(false);
      delete process.env.NO_COLOR;
      expect(shouldUseColor()).toBe(false);
    });

    test('returns false when NO_COLOR is set', () => {
      setTTY(true);
      process.env.NO_COLOR = '1';
      expect(shouldUseColor()).toBe(false);
    });
  });

  describe('with colors enabled', () => {
    beforeEach(() => {
      setTTY(true);
      delete process.env.NO_COLOR;
    });

    test('wraps text in ANSI codes', () => {
      expect(colors.red('x')).toBe('\x1b[31mx\x1b[0m');
      expect(colors.yellow('app')).toBe('\x1b[33mapp\x1b[0m');
      expect(colors.bold('USAGE:')).toBe('\x1b[1mUSAGE:\x1b[0m');
    });
  });

  describe('with colors disabled', () => {
    beforeEach(() => {
      setTTY(false);
    });

    test('returns text unchanged', () => {
      expect(colors.green('ok')).toBe('ok');
      expect(colors.dim('faint')).toBe('faint');
    });
  });
});
