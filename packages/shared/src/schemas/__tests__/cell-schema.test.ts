import { describe, it, expect } from 'vitest';
import { cellTypeSchema, cellDurationSchema, cellValueSchema } from '../cell-schema';

describe('cellTypeSchema', () => {
  it('accepts every ODS value type', () => {
    for (const type of ['string', 'float', 'boolean', 'date', 'time', 'currency', 'percentage', 'void']) {
      expect(cellTypeSchema.safeParse(type).success).toBe(true);
    }
  });

  it('is case-sensitive', () => {
    expect(cellTypeSchema.safeParse('Float').success).toBe(false);
  });

  it('rejects unknown and empty types', () => {
    expect(cellTypeSchema.safeParse('formula').success).toBe(false);
    expect(cellTypeSchema.safeParse('').success).toBe(false);
  });
});

describe('cellDurationSchema', () => {
  const duration = { years: 0, months: 0, days: 1, hours: 2, minutes: 3, seconds: 4.5, negative: false };

  it('accepts a valid duration', () => {
    expect(cellDurationSchema.safeParse(duration).success).toBe(true);
  });

  it('rejects fractional non-second components', () => {
    expect(cellDurationSchema.safeParse({ ...duration, hours: 1.5 }).success).toBe(false);
  });

  it('rejects negative components', () => {
    expect(cellDurationSchema.safeParse({ ...duration, days: -1 }).success).toBe(false);
  });
});

describe('cellValueSchema', () => {
  it('accepts each variant', () => {
    expect(cellValueSchema.safeParse({ kind: 'text', value: 'a' }).success).toBe(true);
    expect(cellValueSchema.safeParse({ kind: 'integer', value: 3 }).success).toBe(true);
    expect(cellValueSchema.safeParse({ kind: 'real', value: 3.5 }).success).toBe(true);
    expect(cellValueSchema.safeParse({ kind: 'boolean', value: false }).success).toBe(true);
    expect(cellValueSchema.safeParse({ kind: 'instant', value: new Date(0) }).success).toBe(true);
    expect(cellValueSchema.safeParse({ kind: 'emptyText' }).success).toBe(true);
  });

  it('accepts bigint integers', () => {
    expect(cellValueSchema.safeParse({ kind: 'integer', value: 9007199254740993n }).success).toBe(true);
  });

  it('rejects integers with a fractional part', () => {
    expect(cellValueSchema.safeParse({ kind: 'integer', value: 3.5 }).success).toBe(false);
  });

  it('rejects mismatched values', () => {
    expect(cellValueSchema.safeParse({ kind: 'text', value: 3 }).success).toBe(false);
    expect(cellValueSchema.safeParse({ kind: 'instant', value: '2016-05-19' }).success).toBe(false);
  });

  it('rejects unknown kinds', () => {
    expect(cellValueSchema.safeParse({ kind: 'formula', value: '=A1' }).success).toBe(false);
  });
});
