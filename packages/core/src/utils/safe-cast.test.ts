import { describe, it, expect } from 'vitest';
import {
  isRecord,
  optionalDate,
  optionalString,
  safeBoolean,
  safeNumber,
  safeString,
  safeStringUnion,
} from './safe-cast.js';

describe('isRecord', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord([])).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

describe('safeString', () => {
  it('should return the value when it is a string', () => {
    expect(safeString('doc-1')).toBe('doc-1');
  });

  it('should return fallback when value is not a string', () => {
    expect(safeString(42, 'fallback')).toBe('fallback');
    expect(safeString(undefined, 'default')).toBe('default');
  });

  it('should throw TypeError when value is not a string and no fallback', () => {
    expect(() => safeString(42)).toThrow('Expected string, got number');
  });
});

describe('optionalString', () => {
  it('should drop empty and non-string values', () => {
    expect(optionalString('W3C')).toBe('W3C');
    expect(optionalString('   ')).toBeUndefined();
    expect(optionalString(7)).toBeUndefined();
  });
});

describe('safeNumber', () => {
  it('should reject non-finite numbers', () => {
    expect(safeNumber(0.5)).toBe(0.5);
    expect(safeNumber(Number.NaN, 0)).toBe(0);
    expect(() => safeNumber('1')).toThrow('Expected number, got string');
  });
});

describe('safeBoolean', () => {
  it('should read booleans and boolean strings', () => {
    expect(safeBoolean(true)).toBe(true);
    expect(safeBoolean('false', true)).toBe(false);
    expect(safeBoolean('true')).toBe(true);
    expect(safeBoolean(1)).toBe(false);
  });
});

describe('optionalDate', () => {
  it('should parse ISO strings and epoch milliseconds', () => {
    expect(optionalDate('2024-03-01T00:00:00.000Z')?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(optionalDate(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
  });

  it('should return undefined for invalid input', () => {
    expect(optionalDate('not a date')).toBeUndefined();
    expect(optionalDate(null)).toBeUndefined();
  });
});

describe('safeStringUnion', () => {
  const partitions = ['academic', 'standards', 'blogs'] as const;

  it('should return a matching value', () => {
    expect(safeStringUnion('blogs', partitions)).toBe('blogs');
  });

  it('should use the fallback for unknown values', () => {
    expect(safeStringUnion('newsletters', partitions, 'academic')).toBe('academic');
  });

  it('should throw without a fallback', () => {
    expect(() => safeStringUnion(3, partitions)).toThrow(
      'Expected one of [academic, standards, blogs], got number',
    );
  });
});
