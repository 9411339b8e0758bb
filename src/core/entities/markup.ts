export type HeadingLevel = 1 | 2 | 3 | 4;

type WithChildren = {
  children: MarkupNode[];
};

export type TextNode = {
  kind: "text";
  value: string;
};

export type HeadingNode = WithChildren & {
  kind: "heading";
  level: HeadingLevel;
};

export type ParagraphNode = WithChildren & {
  kind: "paragraph";
};

/** Generic `div` block. */
export type ContainerNode = WithChildren & {
  kind: "container";
};

export type InlineWrapperNode = WithChildren & {
  kind: "inline";
  tag: "span" | "font";
};

/** Any tag with a namespace prefix, e.g. `ix:nonFraction` in inline XBRL. */
export type NamespacedNode = WithChildren & {
  kind: "namespaced";
  tag: string;
};

export type LinkNode = WithChildren & {
  kind: "link";
  href?: string;
};

export type TableNode = WithChildren & {
  kind: "table";
};

export type TableRowNode = WithChildren & {
  kind: "row";
};

export type TableCellNode = WithChildren & {
  kind: "cell";
  header: boolean;
  colSpan: number;
  rowSpan: number;
};

/** Everything without structural meaning of its own (b, i, tbody, br, ...). */
export type ElementNode = WithChildren & {
  kind: "element";
  tag: string;
};

export type MarkupNode =
  | TextNode
  | HeadingNode
  | ParagraphNode
  | ContainerNode
  | InlineWrapperNode
  | NamespacedNode
  | LinkNode
  | TableNode
  | TableRowNode
  | TableCellNode
  | ElementNode;

export type ParentNode = Exclude<MarkupNode, TextNode>;

export type MarkupDocument = WithChildren & {
  kind: "document";
};
