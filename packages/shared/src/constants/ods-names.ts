import type { WhitespaceKind } from '../types/cell-types';

/**
 * Attribute and element names read from `table:table-cell` markup.
 * @see https://docs.oasis-open.org/office/v1.2/os/OpenDocument-v1.2-os-part1.html#refTable13
 */
export const ODS_ATTRIBUTES = {
  VALUE_TYPE: 'office:value-type',
  VALUE: 'office:value',
  BOOLEAN_VALUE: 'office:boolean-value',
  DATE_VALUE: 'office:date-value',
  TIME_VALUE: 'office:time-value',
  CURRENCY: 'office:currency',
  SPACE_COUNT: 'text:c',
} as const;

export const ODS_ELEMENTS = {
  /** Matched by local name, like a DOM `getElementsByTagName('p')` */
  PARAGRAPH: 'p',
  LINK: 'text:a',
  SPAN: 'text:span',
  SPACE: 'text:s',
  TAB: 'text:tab',
  LINE_BREAK: 'text:line-break',
} as const;

/** Inline elements whose children are visited like the paragraph's own */
export const TEXT_CONTAINER_ELEMENTS: readonly string[] = [ODS_ELEMENTS.LINK, ODS_ELEMENTS.SPAN];

/** Whitespace elements and the kind each one stands for */
export const WHITESPACE_ELEMENTS: ReadonlyMap<string, WhitespaceKind> = new Map<string, WhitespaceKind>([
  [ODS_ELEMENTS.SPACE, 'space'],
  [ODS_ELEMENTS.TAB, 'tab'],
  [ODS_ELEMENTS.LINE_BREAK, 'lineBreak'],
]);

export const WHITESPACE_CHARS: Readonly<Record<WhitespaceKind, string>> = {
  space: ' ',
  tab: '\t',
  lineBreak: '\n',
};
