import type {
  MarkupNode,
  ParentNode,
  TableNode,
} from "../../core/entities/markup";
import { textContent } from "./markupTree";

type PendingNode = {
  node: MarkupNode;
  target: MarkupNode[];
};

const pushPending = (
  stack: PendingNode[],
  nodes: readonly MarkupNode[],
  target: MarkupNode[],
): void => {
  for (let index = nodes.length - 1; index >= 0; index -= 1) {
    const node = nodes[index];
    if (node) {
      stack.push({ node, target });
    }
  }
};

/**
 * Returns a copy of `nodes` with namespaced tags flattened to their text and
 * div/span/p/font wrappers unwrapped in place. The input tree is not touched.
 */
export const normalizeMarkup = (nodes: readonly MarkupNode[]): MarkupNode[] => {
  const normalized: MarkupNode[] = [];
  const stack: PendingNode[] = [];
  pushPending(stack, nodes, normalized);

  for (let pending = stack.pop(); pending; pending = stack.pop()) {
    const { node, target } = pending;

    switch (node.kind) {
      case "text":
        target.push({ kind: "text", value: node.value });
        break;
      case "namespaced":
        target.push({ kind: "text", value: textContent(node) });
        break;
      case "paragraph":
      case "container":
      case "inline":
        // Children land in the wrapper's place, before any later sibling.
        pushPending(stack, node.children, target);
        break;
      default: {
        const copy: ParentNode = { ...node, children: [] };
        target.push(copy);
        pushPending(stack, node.children, copy.children);
      }
    }
  }

  return normalized;
};

export const normalizeTable = (table: TableNode): TableNode => ({
  kind: "table",
  children: normalizeMarkup(table.children),
});
