import { formatterOptionsSchema } from '@odsflow/shared';
import type { FormatterOptionsInput } from '@odsflow/shared';
import { OdsEscaper, type Unescaper } from '../escaper/ods-escaper';
import { CellValueFormatter } from './cell-value-formatter';

/**
 * Validate the options and build a formatter.
 * Defaults to raw date/time values and the pass-through ODS escaper.
 */
export function createCellValueFormatter(
  options: FormatterOptionsInput = {},
  escaper: Unescaper = new OdsEscaper(),
): CellValueFormatter {
  const result = formatterOptionsSchema.safeParse(options);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Formatter options validation failed:\n${formatted}`);
  }
  return new CellValueFormatter(Object.freeze(result.data), escaper);
}
