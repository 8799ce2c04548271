import { Logger } from '@nestjs/common';
import type { CellType, CellValue, FormatterOptions, OdsElement, OdsNode } from '@odsflow/shared';
import {
  ODS_ATTRIBUTES,
  ODS_ELEMENTS,
  WHITESPACE_CHARS,
  cellTypeSchema,
  getAttribute,
  getDescendantsByLocalName,
  textContent,
} from '@odsflow/shared';
import type { Unescaper } from '../escaper/ods-escaper';
import { InvalidValueError } from '../errors/invalid-value.error';
import { toExactInteger, toLooseBoolean, toNumber } from '../helpers/coercion';
import { parseIsoDateTime, parseIsoDuration } from '../helpers/iso-8601';
import { classifyInlineNode } from './inline-node';

/**
 * Turns a `<table:table-cell>` element into a typed cell value.
 * @see http://docs.oasis-open.org/office/v1.2/os/OpenDocument-v1.2-os-part1.html#refTable13
 */
export class CellValueFormatter {
  private readonly logger = new Logger(CellValueFormatter.name);

  constructor(
    private readonly options: Readonly<FormatterOptions>,
    private readonly escaper: Unescaper,
  ) {}

  /**
   * Value of the given cell element; void and unknown cell types give `emptyText`.
   * Throws InvalidValueError when a date or time value cannot be parsed.
   */
  extractAndFormatNodeValue(node: OdsElement): CellValue {
    const cellType = this.decodeCellType(node);

    switch (cellType) {
      case 'string':
        return this.formatStringCellValue(node);
      case 'float':
        return this.formatFloatCellValue(node);
      case 'boolean':
        return this.formatBooleanCellValue(node);
      case 'date':
        return this.formatDateCellValue(node);
      case 'time':
        return this.formatTimeCellValue(node);
      case 'currency':
        return this.formatCurrencyCellValue(node);
      case 'percentage':
        return this.formatPercentageCellValue(node);
      case 'void':
        return { kind: 'emptyText' };
    }
  }

  private decodeCellType(node: OdsElement): CellType {
    const raw = getAttribute(node, ODS_ATTRIBUTES.VALUE_TYPE);
    const result = cellTypeSchema.safeParse(raw);
    if (result.success) return result.data;

    if (raw !== '') {
      this.logger.debug(`Unknown cell value type "${raw}", treating cell as void`);
    }
    return 'void';
  }

  /** Paragraphs joined by line feeds */
  private formatStringCellValue(node: OdsElement): CellValue {
    const paragraphs = getDescendantsByLocalName(node, ODS_ELEMENTS.PARAGRAPH);
    const escapedValue = paragraphs.map((p) => this.extractTextValue(p.children)).join('\n');

    return { kind: 'text', value: this.escaper.unescape(escapedValue) };
  }

  /** Whole values read as integers, exact even beyond the safe integer range */
  private formatFloatCellValue(node: OdsElement): CellValue {
    const raw = getAttribute(node, ODS_ATTRIBUTES.VALUE);
    const value = toNumber(raw);

    if (!Number.isInteger(value)) {
      return { kind: 'real', value };
    }
    if (Number.isSafeInteger(value)) {
      // + 0 turns -0 into 0
      return { kind: 'integer', value: value + 0 };
    }
    return { kind: 'integer', value: toExactInteger(raw) ?? BigInt(value) };
  }

  private formatBooleanCellValue(node: OdsElement): CellValue {
    const raw = getAttribute(node, ODS_ATTRIBUTES.BOOLEAN_VALUE);
    return { kind: 'boolean', value: toLooseBoolean(raw) };
  }

  private formatDateCellValue(node: OdsElement): CellValue {
    // <table:table-cell office:value-type="date" office:date-value="2016-05-19T16:39:00">
    //   <text:p>05/19/16 04:39 PM</text:p>
    // </table:table-cell>
    if (this.options.shouldFormatDates) {
      return this.formattedParagraphValue(node);
    }

    const raw = getAttribute(node, ODS_ATTRIBUTES.DATE_VALUE);
    const date = parseIsoDateTime(raw);
    if (!date) {
      this.logger.warn(`Cannot parse date value "${raw}"`);
      throw new InvalidValueError(raw);
    }
    return { kind: 'instant', value: date };
  }

  private formatTimeCellValue(node: OdsElement): CellValue {
    // <table:table-cell office:value-type="time" office:time-value="PT13H24M00S">
    //   <text:p>01:24:00 PM</text:p>
    // </table:table-cell>
    if (this.options.shouldFormatDates) {
      return this.formattedParagraphValue(node);
    }

    const raw = getAttribute(node, ODS_ATTRIBUTES.TIME_VALUE);
    const duration = parseIsoDuration(raw);
    if (!duration) {
      this.logger.warn(`Cannot parse time value "${raw}"`);
      throw new InvalidValueError(raw);
    }
    return { kind: 'duration', value: duration };
  }

  /** e.g. "100 USD" or "9.99 EUR" */
  private formatCurrencyCellValue(node: OdsElement): CellValue {
    const value = getAttribute(node, ODS_ATTRIBUTES.VALUE);
    const currency = getAttribute(node, ODS_ATTRIBUTES.CURRENCY);

    return { kind: 'text', value: `${value} ${currency}` };
  }

  /** Percentages are stored as ratios, so they read like floats */
  private formatPercentageCellValue(node: OdsElement): CellValue {
    return this.formatFloatCellValue(node);
  }

  /** Text LibreOffice already rendered into the first paragraph */
  private formattedParagraphValue(node: OdsElement): CellValue {
    const [paragraph] = getDescendantsByLocalName(node, ODS_ELEMENTS.PARAGRAPH);
    return { kind: 'text', value: paragraph ? textContent(paragraph) : '' };
  }

  /**
   * Paragraph text with whitespace elements expanded:
   * `<text:s text:c="3"/>` → "   ", `<text:tab/>` → "\t", `<text:line-break/>` → "\n".
   * Links and spans are read through; other elements contribute nothing.
   * @see https://docs.oasis-open.org/office/v1.2/os/OpenDocument-v1.2-os-part1.html#__RefHeading__1415200_253892949
   */
  private extractTextValue(children: readonly OdsNode[]): string {
    let textValue = '';

    for (const child of children) {
      const inline = classifyInlineNode(child);
      switch (inline.kind) {
        case 'text':
          textValue += inline.text;
          break;
        case 'whitespace':
          textValue += WHITESPACE_CHARS[inline.whitespace].repeat(inline.count);
          break;
        case 'container':
          textValue += this.extractTextValue(inline.children);
          break;
        case 'ignored':
          break;
      }
    }

    return textValue;
  }
}
