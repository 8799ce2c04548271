import type { CellDuration, CellPrimitive, CellValue } from '../types/cell-types';

/**
 * Collapse a typed cell value into the plain value a row stores.
 * Void cells become an empty string, like empty text cells.
 */
export function toPrimitive(cell: CellValue): CellPrimitive {
  switch (cell.kind) {
    case 'emptyText':
      return '';
    case 'text':
    case 'integer':
    case 'real':
    case 'boolean':
    case 'instant':
    case 'duration':
      return cell.value;
  }
}

/**
 * Check if a cell value holds no content
 */
export function isEmptyCellValue(cell: CellValue): boolean {
  return cell.kind === 'emptyText' || (cell.kind === 'text' && cell.value === '');
}

/**
 * Render a duration as ISO-8601: { hours: 13, minutes: 24 } → "PT13H24M"
 */
export function formatDuration(duration: CellDuration): string {
  const date = [
    duration.years ? `${duration.years}Y` : '',
    duration.months ? `${duration.months}M` : '',
    duration.days ? `${duration.days}D` : '',
  ].join('');
  const time = [
    duration.hours ? `${duration.hours}H` : '',
    duration.minutes ? `${duration.minutes}M` : '',
    duration.seconds ? `${duration.seconds}S` : '',
  ].join('');

  if (!date && !time) return 'PT0S';
  const sign = duration.negative ? '-' : '';
  return `${sign}P${date}${time ? `T${time}` : ''}`;
}

/**
 * Total length of a duration in seconds, counting a year as 365 days and a month as 30
 */
export function durationToSeconds(duration: CellDuration): number {
  const days = duration.years * 365 + duration.months * 30 + duration.days;
  const total = ((days * 24 + duration.hours) * 60 + duration.minutes) * 60 + duration.seconds;
  return duration.negative ? -total : total;
}
