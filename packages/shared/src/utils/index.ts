export { toPrimitive, isEmptyCellValue, formatDuration, durationToSeconds } from './cell-utils';

export {
  localName,
  getAttribute,
  hasAttribute,
  getDescendantsByLocalName,
  textContent,
} from './node-utils';
