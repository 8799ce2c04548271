import type { OdsElement, OdsNode } from '../types/node-types';

/**
 * Strip the namespace prefix: "text:p" → "p"
 */
export function localName(name: string): string {
  const idx = name.indexOf(':');
  return idx === -1 ? name : name.substring(idx + 1);
}

/**
 * Attribute value by qualified name, empty string when absent
 */
export function getAttribute(element: OdsElement, name: string): string {
  if (!hasAttribute(element, name)) return '';
  return element.attributes[name] ?? '';
}

export function hasAttribute(element: OdsElement, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(element.attributes, name);
}

/**
 * All descendant elements with the given local name, in document order
 */
export function getDescendantsByLocalName(element: OdsElement, name: string): OdsElement[] {
  const found: OdsElement[] = [];
  const visit = (node: OdsElement): void => {
    for (const child of node.children) {
      if (child.type !== 'element') continue;
      if (localName(child.name) === name) found.push(child);
      visit(child);
    }
  };
  visit(element);
  return found;
}

/**
 * Concatenated text of the node and all its descendants
 */
export function textContent(node: OdsNode): string {
  if (node.type === 'text') return node.text;
  return node.children.map(textContent).join('');
}
