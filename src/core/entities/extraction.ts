export type Grid = string[][];

export type TableSheet = {
  name: string;
  grid: Grid;
};

export type NarrativeSection = {
  startHeading: string;
  blocks: string[];
  stopHeading?: string;
};

export type ArtifactOutcome =
  | { status: "written"; path: string; units: number }
  | { status: "skipped"; reason: string }
  | { status: "write_failed"; path: string; reason: string };

export type FilingStatus =
  | "success"
  | "skipped-existing"
  | "skipped-no-document"
  | "skipped-no-section"
  | "skipped-no-tables"
  | "fetch-error"
  | "extract-error"
  | "write-error";

/**
 * Per-filing status signal consumed by logging and the CLI report.
 */
export type FilingReport = {
  label: string;
  status: FilingStatus;
  reason?: string;
  narrative?: ArtifactOutcome;
  tables?: ArtifactOutcome;
};
