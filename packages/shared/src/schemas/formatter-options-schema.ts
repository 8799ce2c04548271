import { z } from 'zod';

export const formatterOptionsSchema = z
  .object({
    /** Return date/time cells as the text LibreOffice rendered instead of parsed values */
    shouldFormatDates: z.boolean().default(false),
  })
  .strict();

export type FormatterOptionsInput = z.input<typeof formatterOptionsSchema>;
export type FormatterOptions = z.output<typeof formatterOptionsSchema>;
