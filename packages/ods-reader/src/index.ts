export { CellValueFormatter } from './formatter/cell-value-formatter';
export { createCellValueFormatter } from './formatter/create-cell-value-formatter';
export { classifyInlineNode, type InlineNode } from './formatter/inline-node';
export { OdsEscaper, XmlEntityUnescaper, type Unescaper } from './escaper/ods-escaper';
export { parseXmlElement } from './xml/xml-element-parser';
export { parseIsoDateTime, parseIsoDuration } from './helpers/iso-8601';
export { toNumber, toExactInteger, toInteger, toLooseBoolean } from './helpers/coercion';
export { InvalidValueError, XmlParseError } from './errors';
