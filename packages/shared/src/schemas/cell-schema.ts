import { z } from 'zod';
import { CELL_TYPES } from '../types/cell-types';

export const cellTypeSchema = z.enum(CELL_TYPES);

export const cellDurationSchema = z.object({
  years: z.number().int().min(0),
  months: z.number().int().min(0),
  days: z.number().int().min(0),
  hours: z.number().int().min(0),
  minutes: z.number().int().min(0),
  seconds: z.number().min(0),
  negative: z.boolean(),
});

export const cellValueSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), value: z.string() }),
  z.object({ kind: z.literal('integer'), value: z.union([z.number().int(), z.bigint()]) }),
  z.object({ kind: z.literal('real'), value: z.number() }),
  z.object({ kind: z.literal('boolean'), value: z.boolean() }),
  z.object({ kind: z.literal('instant'), value: z.date() }),
  z.object({ kind: z.literal('duration'), value: cellDurationSchema }),
  z.object({ kind: z.literal('emptyText') }),
]);
