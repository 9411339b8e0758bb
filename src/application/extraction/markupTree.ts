import * as cheerio from "cheerio";
import { isTag, isText, type ChildNode, type Element } from "domhandler";
import type {
  HeadingLevel,
  MarkupDocument,
  MarkupNode,
  ParentNode,
} from "../../core/entities/markup";

const DROPPED_TAGS = new Set(["script", "style", "head", "title", "noscript"]);

const HEADING_LEVELS: Record<string, HeadingLevel> = {
  h1: 1,
  h2: 2,
  h3: 3,
  h4: 4,
};

const MAX_SPAN = 1_000;

const BLOCK_KINDS = new Set<MarkupNode["kind"]>([
  "heading",
  "paragraph",
  "container",
  "table",
  "row",
  "cell",
]);

export type VisitedNode = {
  node: MarkupNode;
  /** Index of the parent visit, or -1 when the parent is the walked root. */
  parentIndex: number;
};

const parseSpan = (raw: string | undefined): number => {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    return 1;
  }

  return Math.min(parsed, MAX_SPAN);
};

/**
 * Builds the typed node for `element` around `children`, which the caller fills in afterwards.
 */
const toElementNode = (
  element: Element,
  children: MarkupNode[],
): MarkupNode | null => {
  const tag = element.name.toLowerCase();
  if (DROPPED_TAGS.has(tag)) {
    return null;
  }

  if (tag.includes(":")) {
    return { kind: "namespaced", tag, children };
  }

  const headingLevel = HEADING_LEVELS[tag];
  if (headingLevel) {
    return { kind: "heading", level: headingLevel, children };
  }

  switch (tag) {
    case "p":
      return { kind: "paragraph", children };
    case "div":
      return { kind: "container", children };
    case "span":
    case "font":
      return { kind: "inline", tag, children };
    case "a":
      return { kind: "link", href: element.attribs.href, children };
    case "table":
      return { kind: "table", children };
    case "tr":
      return { kind: "row", children };
    case "td":
    case "th":
      return {
        kind: "cell",
        header: tag === "th",
        colSpan: parseSpan(element.attribs.colspan),
        rowSpan: parseSpan(element.attribs.rowspan),
        children,
      };
    default:
      return { kind: "element", tag, children };
  }
};

type PendingNode = {
  source: ChildNode;
  target: MarkupNode[];
};

const pushPending = (
  stack: PendingNode[],
  sources: ChildNode[],
  target: MarkupNode[],
): void => {
  for (let index = sources.length - 1; index >= 0; index -= 1) {
    const source = sources[index];
    if (source) {
      stack.push({ source, target });
    }
  }
};

// Iterative so that unclosed tags nested thousands deep cannot exhaust the call stack.
const toMarkupNodes = (nodes: ChildNode[]): MarkupNode[] => {
  const converted: MarkupNode[] = [];
  const stack: PendingNode[] = [];
  pushPending(stack, nodes, converted);

  for (let pending = stack.pop(); pending; pending = stack.pop()) {
    const { source, target } = pending;

    if (isText(source)) {
      target.push({ kind: "text", value: source.data });
      continue;
    }

    // Comments, CDATA and processing instructions carry no visible content.
    if (!isTag(source)) {
      continue;
    }

    const children: MarkupNode[] = [];
    const element = toElementNode(source, children);
    if (element) {
      target.push(element);
      pushPending(stack, source.children, children);
    }
  }

  return converted;
};

/**
 * Parses loosely structured filing HTML into the typed structural tree the extractors walk.
 */
export const parseMarkup = (html: string): MarkupDocument => {
  // Forgiving HTML mode: unclosed and misnested tags are repaired, never rejected.
  const $ = cheerio.load(html, { xml: false });
  const root = $.root().get(0);

  return {
    kind: "document",
    children: root ? toMarkupNodes(root.children) : [],
  };
};

/**
 * Lists every descendant of `root` in document (pre-)order with a pointer to its parent visit.
 */
export const flattenDocumentOrder = (
  root: MarkupDocument | ParentNode,
): VisitedNode[] => {
  const visits: VisitedNode[] = [];
  const stack: VisitedNode[] = [];

  const pushChildren = (children: MarkupNode[], parentIndex: number) => {
    for (let index = children.length - 1; index >= 0; index -= 1) {
      const child = children[index];
      if (child) {
        stack.push({ node: child, parentIndex });
      }
    }
  };

  pushChildren(root.children, -1);

  for (let current = stack.pop(); current; current = stack.pop()) {
    const visitIndex = visits.length;
    visits.push(current);

    if (current.node.kind !== "text") {
      pushChildren(current.node.children, visitIndex);
    }
  }

  return visits;
};

export const collectNodes = <K extends MarkupNode["kind"]>(
  root: MarkupDocument | ParentNode,
  kind: K,
): Array<Extract<MarkupNode, { kind: K }>> =>
  flattenDocumentOrder(root)
    .map((visit) => visit.node)
    .filter((node): node is Extract<MarkupNode, { kind: K }> => node.kind === kind);

/**
 * Raw concatenation of descendant text, whitespace untouched.
 */
export const textContent = (node: MarkupNode | MarkupDocument): string => {
  if (node.kind === "text") {
    return node.value;
  }

  return flattenDocumentOrder(node)
    .map((visit) => (visit.node.kind === "text" ? visit.node.value : ""))
    .join("");
};

export const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/** A node still to visit, or a separator to emit once a block's children are done. */
type VisibleTextItem = MarkupNode | MarkupDocument | " ";

const collectVisibleText = (
  root: MarkupNode | MarkupDocument,
  parts: string[],
): void => {
  const stack: VisibleTextItem[] = [root];

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    if (item === " ") {
      parts.push(item);
      continue;
    }

    if (item.kind === "text") {
      parts.push(item.value);
      continue;
    }

    if (item.kind === "element" && item.tag === "br") {
      parts.push(" ");
      continue;
    }

    if (item.kind !== "document" && BLOCK_KINDS.has(item.kind)) {
      parts.push(" ");
      stack.push(" ");
    }

    for (let index = item.children.length - 1; index >= 0; index -= 1) {
      const child = item.children[index];
      if (child) {
        stack.push(child);
      }
    }
  }
};

/**
 * Text as a reader sees it: block and line-break boundaries become spaces, whitespace runs collapse.
 */
export const visibleText = (node: MarkupNode | MarkupDocument): string => {
  const parts: string[] = [];
  collectVisibleText(node, parts);
  return collapseWhitespace(parts.join(""));
};
