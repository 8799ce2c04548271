/** Character data inside an element (CDATA sections included) */
export interface OdsTextNode {
  readonly type: 'text';
  readonly text: string;
}

/** Element of a parsed ODS document, addressed by qualified names (`text:p`) */
export interface OdsElement {
  readonly type: 'element';
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly OdsNode[];
}

export type OdsNode = OdsTextNode | OdsElement;
