/** Turns decoded cell text into its final form */
export interface Unescaper {
  unescape(value: string): string;
}

/**
 * Unescaper for text read from a parsed element tree.
 * The XML parser has already decoded entities, so the text passes through unchanged.
 */
export class OdsEscaper implements Unescaper {
  unescape(value: string): string {
    return value;
  }
}

const ENTITY_PATTERN = /&(#x[0-9a-fA-F]+|#\d+|lt|gt|amp|quot|apos);/g;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

/**
 * Unescaper for text that still carries XML entities, e.g. when the tree
 * was built without entity decoding. Unknown entities are kept as written.
 */
export class XmlEntityUnescaper implements Unescaper {
  unescape(value: string): string {
    return value.replace(ENTITY_PATTERN, (entity: string, body: string) => {
      if (!body.startsWith('#')) return NAMED_ENTITIES[body] ?? entity;

      const codePoint = body.startsWith('#x')
        ? parseInt(body.substring(2), 16)
        : parseInt(body.substring(1), 10);
      if (codePoint > 0x10ffff) return entity;
      return String.fromCodePoint(codePoint);
    });
  }
}
