import { err, ok, type Result } from "neverthrow";
import type { Grid, TableSheet } from "../../core/entities/extraction";
import type {
  MarkupDocument,
  MarkupNode,
  TableCellNode,
  TableNode,
  TableRowNode,
} from "../../core/entities/markup";
import { normalizeTable } from "./markupNormalizer";
import { collectNodes, visibleText } from "./markupTree";

export type TableParseError = {
  code: "no_rows" | "no_cells";
  message: string;
};

export type TableParseFailure = {
  /** 1-based position of the table among all tables in the document. */
  position: number;
  error: TableParseError;
};

export type TableExtraction = {
  tablesFound: number;
  sheets: TableSheet[];
  failures: TableParseFailure[];
  discarded: number;
};

export type TableExtractionError =
  | { code: "no_tables"; message: string }
  | {
      code: "no_valid_tables";
      message: string;
      tablesFound: number;
      failures: TableParseFailure[];
    };

const collectRows = (table: TableNode): TableRowNode[] => {
  const rows: TableRowNode[] = [];
  const stack = [...table.children].reverse();

  for (let node = stack.pop(); node; node = stack.pop()) {
    if (node.kind === "row") {
      rows.push(node);
      continue;
    }

    // Rows of a nested table belong to that table's own grid.
    if (node.kind === "text" || node.kind === "table" || node.kind === "cell") {
      continue;
    }

    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (child) {
        stack.push(child);
      }
    }
  }

  return rows;
};

const isCell = (node: MarkupNode): node is TableCellNode =>
  node.kind === "cell";

/**
 * Lays the table's own rows out on a grid. Spanned cells repeat their text in
 * every slot they cover; short rows are padded with empty strings.
 */
export const tableToGrid = (table: TableNode): Result<Grid, TableParseError> => {
  const rows = collectRows(table);

  if (rows.length === 0) {
    return err({ code: "no_rows", message: "Table has no rows." });
  }

  const placed: Array<Array<string | undefined>> = rows.map(() => []);
  let cellCount = 0;

  rows.forEach((row, rowIndex) => {
    const slots = placed[rowIndex] ?? [];
    let column = 0;

    for (const cell of row.children.filter(isCell)) {
      cellCount += 1;
      while (slots[column] !== undefined) {
        column += 1;
      }

      const text = visibleText(cell);
      const lastRow = Math.min(rows.length, rowIndex + cell.rowSpan);
      for (let spanRow = rowIndex; spanRow < lastRow; spanRow += 1) {
        const target = placed[spanRow];
        if (!target) {
          continue;
        }
        for (let offset = 0; offset < cell.colSpan; offset += 1) {
          target[column + offset] = text;
        }
      }

      column += cell.colSpan;
    }
  });

  if (cellCount === 0) {
    return err({ code: "no_cells", message: "Table rows contain no cells." });
  }

  const width = placed.reduce((max, slots) => Math.max(max, slots.length), 0);
  return ok(
    placed.map((slots) =>
      Array.from({ length: width }, (_, column) => slots[column] ?? ""),
    ),
  );
};

const isBlank = (cell: string | undefined): boolean =>
  (cell ?? "").trim() === "";

/**
 * Drops every row and every column whose cells are all blank.
 */
export const trimGrid = (grid: Grid): Grid => {
  const rows = grid.filter((row) => row.some((cell) => !isBlank(cell)));
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);

  const keptColumns: number[] = [];
  for (let column = 0; column < width; column += 1) {
    if (rows.some((row) => !isBlank(row[column]))) {
      keptColumns.push(column);
    }
  }

  return rows.map((row) => keptColumns.map((column) => row[column] ?? ""));
};

export const isValidGrid = (grid: Grid): boolean =>
  grid.length > 1 && (grid[0]?.length ?? 0) >= 1;

/**
 * Converts every table in document order into a trimmed grid. Each table is
 * normalized on its own copy and parsed independently; survivors are named
 * `Table_1`, `Table_2`, ... in the order they survive.
 */
export const extractTables = (document: MarkupDocument): TableExtraction => {
  const tables = collectNodes(document, "table");
  const sheets: TableSheet[] = [];
  const failures: TableParseFailure[] = [];
  let discarded = 0;

  tables.forEach((table, index) => {
    const gridResult = tableToGrid(normalizeTable(table));
    if (gridResult.isErr()) {
      failures.push({ position: index + 1, error: gridResult.error });
      return;
    }

    const grid = trimGrid(gridResult.value);
    if (!isValidGrid(grid)) {
      discarded += 1;
      return;
    }

    sheets.push({ name: `Table_${sheets.length + 1}`, grid });
  });

  return { tablesFound: tables.length, sheets, failures, discarded };
};

/**
 * Same as {@link extractTables}, but reports "nothing to write" as an error value.
 */
export const extractTableSet = (
  document: MarkupDocument,
): Result<TableExtraction, TableExtractionError> => {
  const extraction = extractTables(document);

  if (extraction.tablesFound === 0) {
    return err({
      code: "no_tables",
      message: "Document contains no <table> elements.",
    });
  }

  if (extraction.sheets.length === 0) {
    return err({
      code: "no_valid_tables",
      message: `Found ${extraction.tablesFound} tables, but none could be parsed into data.`,
      tablesFound: extraction.tablesFound,
      failures: extraction.failures,
    });
  }

  return ok(extraction);
};
