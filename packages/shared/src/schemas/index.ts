export { cellTypeSchema, cellDurationSchema, cellValueSchema } from './cell-schema';

export {
  formatterOptionsSchema,
  type FormatterOptionsInput,
  type FormatterOptions,
} from './formatter-options-schema';
