export {
  ODS_ATTRIBUTES,
  ODS_ELEMENTS,
  TEXT_CONTAINER_ELEMENTS,
  WHITESPACE_ELEMENTS,
  WHITESPACE_CHARS,
} from './ods-names';
