import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { parseIndex, resolveRange } from '../src/utils/range.js';

describe('parseIndex', () => {
  it('accepts positive integers', () => {
    expect(parseIndex('1')).toBe(1);
    expect(parseIndex('0042')).toBe(42);
  });

  it('rejects anything else', () => {
    for (const value of ['0', '-3', '1.5', 'two', '']) {
      expect(() => parseIndex(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe('resolveRange', () => {
  it('defaults to the whole cluster', () => {
    expect(resolveRange({}, 8)).toEqual({ from: 1, to: 8 });
  });

  it('keeps explicit bounds past the host count', () => {
    expect(resolveRange({ from: 3, to: 9 }, 8)).toEqual({ from: 3, to: 9 });
  });

  it('rejects an empty range', () => {
    expect(() => resolveRange({ from: 5 }, 4)).toThrow('Empty host range 5..4');
  });
});
