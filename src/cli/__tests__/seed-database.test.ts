import { describe, it, expect } from 'vitest';
import { parseCount } from '../seed-database.js';

describe('parseCount', () => {
  it('accepts positive integers given as numbers or text', () => {
    expect(parseCount(1500, '--orders')).toBe(1500);
    expect(parseCount('250', '--orders')).toBe(250);
  });

  it.each(['abc', '0', '-5', '2.5', ''])('rejects %j', (value) => {
    expect(() => parseCount(value, '--orders')).toThrow(
      `--orders must be a positive integer (got "${value}")`
    );
  });
});
