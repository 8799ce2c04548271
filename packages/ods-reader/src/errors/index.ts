export { InvalidValueError } from './invalid-value.error';
export { XmlParseError } from './xml-parse.error';
