import { err, ok, type Result } from "neverthrow";
import type { EmbeddedDocument } from "../../core/entities/filing";

const DOCUMENT_START = "<DOCUMENT>";
const DOCUMENT_END = "</DOCUMENT>";
const TYPE_LINE_PATTERN = /<TYPE>([^\n]+)/;

export type DocumentSelectionError =
  | { code: "no_documents"; message: string }
  | { code: "unbalanced_markers"; message: string; starts: number; ends: number }
  | { code: "no_matching_type"; message: string; declaredTypes: string[] };

const indicesOf = (text: string, marker: string): number[] => {
  const indices: number[] = [];
  for (
    let index = text.indexOf(marker);
    index !== -1;
    index = text.indexOf(marker, index + marker.length)
  ) {
    indices.push(index);
  }

  return indices;
};

const declaredTypeOf = (content: string): string | null => {
  const match = TYPE_LINE_PATTERN.exec(content);
  const value = match?.[1]?.trim();
  return value ? value : null;
};

/**
 * Pairs the i-th `<DOCUMENT>` with the i-th `</DOCUMENT>` and rejects bundles
 * where the markers do not strictly alternate start, end, start, end.
 */
export const scanEmbeddedDocuments = (
  filingText: string,
): Result<EmbeddedDocument[], DocumentSelectionError> => {
  const starts = indicesOf(filingText, DOCUMENT_START);
  const ends = indicesOf(filingText, DOCUMENT_END);

  const unbalanced = (): Result<EmbeddedDocument[], DocumentSelectionError> =>
    err({
      code: "unbalanced_markers",
      message: `Filing has ${starts.length} document start markers and ${ends.length} end markers in an order that cannot be paired.`,
      starts: starts.length,
      ends: ends.length,
    });

  if (starts.length !== ends.length) {
    return unbalanced();
  }

  const documents: EmbeddedDocument[] = [];

  for (let index = 0; index < starts.length; index += 1) {
    const startMarker = starts[index];
    const endMarker = ends[index];
    const nextStartMarker = starts[index + 1];

    if (startMarker === undefined || endMarker === undefined) {
      return unbalanced();
    }

    const start = startMarker + DOCUMENT_START.length;
    if (endMarker < start) {
      return unbalanced();
    }

    if (nextStartMarker !== undefined && nextStartMarker < endMarker) {
      return unbalanced();
    }

    const content = filingText.slice(start, endMarker);
    documents.push({
      declaredType: declaredTypeOf(content),
      start,
      end: endMarker,
      content,
    });
  }

  return ok(documents);
};

const pickLongestCandidate = (
  documents: EmbeddedDocument[],
  formType: string,
): Result<EmbeddedDocument, DocumentSelectionError> => {
  if (documents.length === 0) {
    return err({
      code: "no_documents",
      message: "Filing contains no embedded documents.",
    });
  }

  let selected: EmbeddedDocument | null = null;
  for (const document of documents) {
    if (!document.declaredType?.includes(formType)) {
      continue;
    }

    if (!selected || document.content.length > selected.content.length) {
      selected = document;
    }
  }

  if (!selected) {
    return err({
      code: "no_matching_type",
      message: `No embedded document declares a type containing '${formType}'.`,
      declaredTypes: documents
        .map((document) => document.declaredType)
        .filter((value): value is string => value !== null),
    });
  }

  return ok(selected);
};

/**
 * Picks the longest embedded document whose declared type contains `formType`; the first wins a tie.
 */
export const selectMainDocument = (
  filingText: string,
  formType: string,
): Result<EmbeddedDocument, DocumentSelectionError> =>
  scanEmbeddedDocuments(filingText).andThen((documents) =>
    pickLongestCandidate(documents, formType),
  );
