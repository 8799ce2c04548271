/** Cell types an ODS cell can declare through `office:value-type` */
export const CELL_TYPES = [
  'string',
  'float',
  'boolean',
  'date',
  'time',
  'currency',
  'percentage',
  'void',
] as const;
export type CellType = (typeof CELL_TYPES)[number];

/** Whitespace kinds that ODS markup stores as dedicated elements */
export const WHITESPACE_KINDS = ['space', 'tab', 'lineBreak'] as const;
export type WhitespaceKind = (typeof WHITESPACE_KINDS)[number];

/** ISO-8601 duration broken into its components (weeks folded into days) */
export interface CellDuration {
  years: number;
  months: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
  negative: boolean;
}

export interface TextCellValue {
  kind: 'text';
  value: string;
}

/** A bigint only when the value lies outside the safe integer range */
export interface IntegerCellValue {
  kind: 'integer';
  value: number | bigint;
}

export interface RealCellValue {
  kind: 'real';
  value: number;
}

export interface BooleanCellValue {
  kind: 'boolean';
  value: boolean;
}

export interface InstantCellValue {
  kind: 'instant';
  value: Date;
}

export interface DurationCellValue {
  kind: 'duration';
  value: CellDuration;
}

/** Produced for void or unknown cell types */
export interface EmptyTextCellValue {
  kind: 'emptyText';
}

/** Typed value of a single ODS cell */
export type CellValue =
  | TextCellValue
  | IntegerCellValue
  | RealCellValue
  | BooleanCellValue
  | InstantCellValue
  | DurationCellValue
  | EmptyTextCellValue;

/** Plain value a row consumer stores for a cell */
export type CellPrimitive = string | number | bigint | boolean | Date | CellDuration;
