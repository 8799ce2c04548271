export type {
  CellType,
  WhitespaceKind,
  CellDuration,
  TextCellValue,
  IntegerCellValue,
  RealCellValue,
  BooleanCellValue,
  InstantCellValue,
  DurationCellValue,
  EmptyTextCellValue,
  CellValue,
  CellPrimitive,
} from './cell-types';
export { CELL_TYPES, WHITESPACE_KINDS } from './cell-types';

export type { OdsTextNode, OdsElement, OdsNode } from './node-types';
