import type { OdsElement, OdsNode, WhitespaceKind } from '@odsflow/shared';
import {
  ODS_ATTRIBUTES,
  TEXT_CONTAINER_ELEMENTS,
  WHITESPACE_ELEMENTS,
  getAttribute,
} from '@odsflow/shared';
import { toInteger } from '../helpers/coercion';

/** A paragraph child, classified by how it contributes to the cell text */
export type InlineNode =
  | { kind: 'text'; text: string }
  | { kind: 'whitespace'; whitespace: WhitespaceKind; count: number }
  | { kind: 'container'; children: readonly OdsNode[] }
  | { kind: 'ignored' };

/**
 * Repeat count of a whitespace element. Only `<text:s>` carries `text:c`;
 * anything but a positive integer counts as one.
 */
function whitespaceCount(element: OdsElement): number {
  const count = toInteger(getAttribute(element, ODS_ATTRIBUTES.SPACE_COUNT));
  return count > 0 ? count : 1;
}

export function classifyInlineNode(node: OdsNode): InlineNode {
  if (node.type === 'text') {
    return { kind: 'text', text: node.text };
  }

  const whitespace = WHITESPACE_ELEMENTS.get(node.name);
  if (whitespace) {
    return { kind: 'whitespace', whitespace, count: whitespaceCount(node) };
  }

  if (TEXT_CONTAINER_ELEMENTS.includes(node.name)) {
    return { kind: 'container', children: node.children };
  }

  return { kind: 'ignored' };
}
