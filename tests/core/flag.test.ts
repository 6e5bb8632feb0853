import { describe, expect, test } from 'vitest';
import { DefinitionError } from '@/core/errors';
import { defineFlag, flagMatches, parseFloatValue, parseIntValue } from '@/core/flag';

function definitionIssues(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof DefinitionError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a DefinitionError');
}

describe('defineFlag', () => {
  test('builds a frozen descriptor', () => {
    const flag = defineFlag({ name: 'age', type: 'int', aliases: ['a'], description: 'Age' });
    expect(flag).toEqual({ name: 'age', type: 'int', aliases: ['a'], description: 'Age' });
    expect(Object.isFrozen(flag)).toBe(true);
    expect(Object.isFrozen(flag.aliases)).toBe(true);
  });

  test('defaults to no aliases', () => {
    expect(defineFlag({ name: 'bye', type: 'bool' }).aliases).toEqual([]);
  });

  test('splits comma-joined aliases and trims them', () => {
    const flag = defineFlag({ name: 'age', type: 'int', aliases: 'a, ag ,' });
    expect(flag.aliases).toEqual(['a', 'ag']);
  });

  test('rejects an empty name', () => {
    expect(definitionIssues(() => defineFlag({ name: '', type: 'bool' }))).toContain(
      'name: must not be empty',
    );
  });

  test('rejects dashes in front of an alias', () => {
    expect(
      definitionIssues(() => defineFlag({ name: 'bye', type: 'bool', aliases: ['-b'] })),
    ).toContain("aliases.0: must not start with '-'");
  });

  test('rejects = inside a name', () => {
    expect(definitionIssues(() => defineFlag({ name: 'a=b', type: 'string' }))).toContain(
      "name: must not contain '='",
    );
  });

  test('rejects an alias equal to its own name', () => {
    expect(
      definitionIssues(() => defineFlag({ name: 'v', type: 'bool', aliases: ['v'] })),
    ).toContain('aliases: "v" of "v" is already used by "v"');
  });

  test('DefinitionError message names the flag', () => {
    expect(() => defineFlag({ name: 'x y', type: 'bool' })).toThrow(
      'Invalid definition for "--x y"',
    );
  });
});

describe('flagMatches', () => {
  const flag = defineFlag({ name: 'age', type: 'int', aliases: ['a', 'ag'] });

  test('matches name and aliases exactly', () => {
    expect(flagMatches(flag, 'age')).toBe(true);
    expect(flagMatches(flag, 'a')).toBe(true);
    expect(flagMatches(flag, 'ag')).toBe(true);
  });

  test('is case-sensitive', () => {
    expect(flagMatches(flag, 'AGE')).toBe(false);
    expect(flagMatches(flag, 'A')).toBe(false);
  });
});

describe('parseIntValue', () => {
  test('parses signed decimal integers', () => {
    expect(parseIntValue('10')).toBe(10);
    expect(parseIntValue('+7')).toBe(7);
    expect(parseIntValue('-3')).toBe(-3);
  });

  test('rejects anything else', () => {
    expect(parseIntValue('abc')).toBeUndefined();
    expect(parseIntValue('1.5')).toBeUndefined();
    expect(parseIntValue('')).toBeUndefined();
    expect(parseIntValue(' 1')).toBeUndefined();
    expect(parseIntValue('0x10')).toBeUndefined();
  });

  test('rejects integers beyond the safe range', () => {
    expect(parseIntValue('9007199254740993')).toBeUndefined();
  });
});

describe('parseFloatValue', () => {
  test('parses decimal and exponent notation', () => {
    expect(parseFloatValue('1.23')).toBe(1.23);
    expect(parseFloatValue('.5')).toBe(0.5);
    expect(parseFloatValue('5.')).toBe(5);
    expect(parseFloatValue('1e3')).toBe(1000);
    expect(parseFloatValue('-2.5E-1')).toBe(-0.25);
  });

  test('parses infinities and NaN', () => {
    expect(parseFloatValue('inf')).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloatValue('-Infinity')).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloatValue('NaN')).toBeNaN();
  });

  test('rejects malformed values', () => {
    expect(parseFloatValue('abc')).toBeUndefined();
    expect(parseFloatValue('')).toBeUndefined();
    expect(parseFloatValue('1.2.3')).toBeUndefined();
    expect(parseFloatValue('1e')).toBeUndefined();
  });
});
