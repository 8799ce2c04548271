export class XmlParseError extends Error {
  readonly code = 'XML_PARSE_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'XmlParseError';
  }
}
