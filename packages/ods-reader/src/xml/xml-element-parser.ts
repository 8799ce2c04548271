import * as sax from 'sax';
import type { OdsElement, OdsNode } from '@odsflow/shared';
import { XmlParseError } from '../errors/xml-parse.error';

interface ElementFrame {
  name: string;
  attributes: Record<string, string>;
  children: OdsNode[];
}

function freezeFrame(frame: ElementFrame): OdsElement {
  return Object.freeze({
    type: 'element',
    name: frame.name,
    attributes: Object.freeze(frame.attributes),
    children: Object.freeze(frame.children),
  });
}

/**
 * Build an immutable element tree from a single-rooted XML fragment,
 * e.g. one `<table:table-cell>` taken out of content.xml.
 * Names keep their namespace prefix; entities and CDATA are decoded into text.
 */
export function parseXmlElement(xml: string): OdsElement {
  const stack: ElementFrame[] = [];
  let root: OdsElement | undefined;

  const parser = sax.parser(true, { trim: false, normalize: false });

  const appendText = (text: string): void => {
    const current = stack[stack.length - 1];
    // Whitespace around the root element belongs to no node
    if (!current) return;
    current.children.push(Object.freeze({ type: 'text', text }));
  };

  parser.onopentag = (tag) => {
    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(tag.attributes)) {
      attributes[name] = typeof value === 'string' ? value : value.value;
    }
    stack.push({ name: tag.name, attributes, children: [] });
  };

  parser.onclosetag = () => {
    const frame = stack.pop();
    if (!frame) return;
    const element = freezeFrame(frame);
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      root = element;
    }
  };

  parser.ontext = appendText;
  parser.oncdata = appendText;

  try {
    parser.write(xml).close();
  } catch (err) {
    throw new XmlParseError(err instanceof Error ? err.message : String(err));
  }

  if (!root) {
    throw new XmlParseError('Document has no root element');
  }
  return root;
}
