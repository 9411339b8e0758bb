import { err, ok, type Result } from "neverthrow";
import type { NarrativeSection } from "../../core/entities/extraction";
import type { MarkupDocument, MarkupNode } from "../../core/entities/markup";
import {
  collapseWhitespace,
  flattenDocumentOrder,
  visibleText,
  type VisitedNode,
} from "./markupTree";

export type NarrativePatterns = {
  start: RegExp;
  stop: RegExp;
};

/**
 * MD&A header and the two headings that follow it in 10-K (Item 7A / Item 8) and 10-Q layouts.
 * The 1-5 character gap absorbs straight, curly and entity-encoded apostrophes.
 */
export const MDA_PATTERNS: NarrativePatterns = {
  start: /management.{1,5}s discussion and analysis/i,
  stop: /quantitative and qualitative disclosures about market risk|financial statements and supplementary data/i,
};

export type NarrativeExtractionError =
  | { code: "header_not_found"; message: string }
  | { code: "section_empty"; message: string; startHeading: string };

const SECTION_BLOCK_KINDS = new Set<MarkupNode["kind"]>([
  "paragraph",
  "container",
  "heading",
]);

const hasLinkAncestor = (visits: VisitedNode[], index: number): boolean => {
  for (
    let parent = visits[index]?.parentIndex ?? -1;
    parent !== -1;
    parent = visits[parent]?.parentIndex ?? -1
  ) {
    if (visits[parent]?.node.kind === "link") {
      return true;
    }
  }

  return false;
};

const nearestBlockIndex = (visits: VisitedNode[], index: number): number => {
  for (
    let parent = visits[index]?.parentIndex ?? -1;
    parent !== -1;
    parent = visits[parent]?.parentIndex ?? -1
  ) {
    const kind = visits[parent]?.node.kind;
    if (kind && SECTION_BLOCK_KINDS.has(kind)) {
      return parent;
    }
  }

  return -1;
};

const findStartText = (
  visits: VisitedNode[],
  pattern: RegExp,
): number =>
  visits.findIndex(
    (visit, index) =>
      visit.node.kind === "text" &&
      pattern.test(collapseWhitespace(visit.node.value)) &&
      !hasLinkAncestor(visits, index),
  );

/**
 * Extracts the narrative that follows the first non-hyperlinked start heading and
 * ends strictly before the first heading matching the stop pattern.
 *
 * Text is grouped by its nearest paragraph, div or heading, so a block nested
 * inside another block is emitted once, in document order.
 */
export const extractNarrativeSection = (
  document: MarkupDocument,
  patterns: NarrativePatterns = MDA_PATTERNS,
): Result<NarrativeSection, NarrativeExtractionError> => {
  const visits = flattenDocumentOrder(document);
  const startTextIndex = findStartText(visits, patterns.start);
  const startText = visits[startTextIndex];

  if (!startText) {
    return err({
      code: "header_not_found",
      message: "No section header outside a hyperlink matched the start pattern.",
    });
  }

  const anchorIndex = startText.parentIndex;
  const anchor = visits[anchorIndex]?.node ?? startText.node;
  const startHeading = visibleText(anchor);

  const blocks: string[] = [];
  let stopHeading: string | undefined;
  let currentOwner = -1;
  let buffer: string[] = [];

  const flush = () => {
    const text = collapseWhitespace(buffer.join(""));
    if (text) {
      blocks.push(text);
    }
    buffer = [];
  };

  for (let index = anchorIndex + 1; index < visits.length; index += 1) {
    const node = visits[index]?.node;
    if (!node) {
      continue;
    }

    if (node.kind === "heading") {
      const headingText = visibleText(node);
      if (patterns.stop.test(headingText)) {
        stopHeading = headingText;
        break;
      }
    }

    const isText = node.kind === "text";
    const isLineBreak = node.kind === "element" && node.tag === "br";
    if (!isText && !isLineBreak) {
      continue;
    }

    const owner = nearestBlockIndex(visits, index);
    if (owner <= anchorIndex) {
      continue;
    }

    if (owner !== currentOwner) {
      flush();
      currentOwner = owner;
    }

    buffer.push(node.kind === "text" ? node.value : " ");
  }

  flush();

  if (blocks.length === 0) {
    return err({
      code: "section_empty",
      message: "Section header was found but no text followed it.",
      startHeading,
    });
  }

  return ok({ startHeading, blocks, stopHeading });
};

/**
 * Plain-text artifact body: every block followed by a blank line.
 */
export const renderNarrative = (section: NarrativeSection): string =>
  section.blocks.map((block) => `${block}\n\n`).join("");
