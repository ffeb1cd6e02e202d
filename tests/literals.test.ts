import { describe, it, expect } from 'vitest';
import { lit, toLiteral } from '../src/core/ast/literals.js';
import { ConfigError } from '../src/core/errors.js';

describe('literal constructors', () => {
  it('builds typed literal nodes', () => {
    expect(lit.int(42)).toEqual({ type: 'Literal', literalType: 'integer', value: 42 });
    expect(lit.long(7)).toEqual({ type: 'Literal', literalType: 'long', value: 7n });
    expect(lit.double(2)).toEqual({ type: 'Literal', literalType: 'double', value: 2 });
    expect(lit.string('x')).toEqual({ type: 'Literal', literalType: 'string', value: 'x' });
    expect(lit.bool(false)).toEqual({ type: 'Literal', literalType: 'boolean', value: false });
  });

  it('rejects integers outside 32 bits', () => {
    expect(() => lit.int(2147483648)).toThrow(ConfigError);
    expect(() => lit.int(1.5)).toThrow(ConfigError);
  });

  it('rejects unsafe long numbers and non-finite doubles', () => {
    expect(() => lit.long(Number.MAX_SAFE_INTEGER + 1)).toThrow(ConfigError);
    expect(() => lit.double(Number.POSITIVE_INFINITY)).toThrow(ConfigError);
  });

  it('rejects bigints outside 64 bits', () => {
    expect(lit.long(2n ** 63n - 1n).value).toBe(9223372036854775807n);
    expect(() => lit.long(2n ** 63n)).toThrow('long literals must fit in 64 bits');
    expect(() => lit.long(-(2n ** 63n) - 1n)).toThrow(ConfigError);
  });

  it('accepts dates in the first century', () => {
    expect(lit.date('0050-01-01').value).toBe('0050-01-01');
    expect(() => lit.date('0050-02-29')).toThrow('not a calendar date');
  });

  it('validates calendar dates', () => {
    expect(lit.date('2024-02-29').value).toBe('2024-02-29');
    expect(() => lit.date('2023-02-29')).toThrow('not a calendar date');
    expect(() => lit.date('29/02/2024')).toThrow('dates must be written as YYYY-MM-DD');
  });

  it('takes the UTC day of a Date', () => {
    expect(lit.date(new Date(Date.UTC(2021, 0, 5, 23, 30))).value).toBe('2021-01-05');
  });
});

describe('toLiteral', () => {
  it('lifts plain values to the narrowest literal', () => {
    expect(toLiteral(30).literalType).toBe('integer');
    expect(toLiteral(3_000_000_000).literalType).toBe('long');
    expect(toLiteral(12n).literalType).toBe('long');
    expect(toLiteral(0.5).literalType).toBe('double');
    expect(toLiteral(1e20)).toEqual({ type: 'Literal', literalType: 'double', value: 1e20 });
    expect(toLiteral(Number.MAX_SAFE_INTEGER).literalType).toBe('long');
    expect(toLiteral('Senior').literalType).toBe('string');
    expect(toLiteral(true).literalType).toBe('boolean');
    expect(toLiteral(new Date(Date.UTC(2020, 11, 31)))).toEqual({
      type: 'Literal',
      literalType: 'date',
      value: '2020-12-31'
    });
  });
});
