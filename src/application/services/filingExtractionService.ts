import type {
  ArtifactOutcome,
  FilingReport,
  FilingStatus,
} from "../../core/entities/extraction";
import type { MarkupDocument } from "../../core/entities/markup";
import type {
  ArtifactPaths,
  ArtifactStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { parseMarkup } from "../extraction/markupTree";
import {
  extractNarrativeSection,
  renderNarrative,
} from "../extraction/narrativeExtractor";
import { selectMainDocument } from "../extraction/subDocumentSelector";
import { extractTableSet } from "../extraction/tableExtractor";

export type FilingExtractionRequest = {
  label: string;
  filingText: string;
  formType: string;
  paths: ArtifactPaths;
};

const deriveStatus = (
  narrative: ArtifactOutcome,
  tables: ArtifactOutcome,
): FilingStatus => {
  if (
    narrative.status === "write_failed" ||
    tables.status === "write_failed"
  ) {
    return "write-error";
  }

  if (narrative.status === "skipped") {
    return "skipped-no-section";
  }

  if (tables.status === "skipped") {
    return "skipped-no-tables";
  }

  return "success";
};

/**
 * Runs the in-memory extraction pipeline for one filing bundle and persists whichever artifacts have content.
 */
export class FilingExtractionService {
  constructor(private readonly artifactStore: ArtifactStorePort) {}

  /**
   * Selects the main document, then extracts and writes the narrative and the table workbook independently,
   * so a failure on one artifact never blocks the other.
   */
  async process(request: FilingExtractionRequest): Promise<FilingReport> {
    const mainDocument = selectMainDocument(
      request.filingText,
      request.formType,
    );

    if (mainDocument.isErr()) {
      return {
        label: request.label,
        status: "skipped-no-document",
        reason: mainDocument.error.message,
      };
    }

    const document = parseMarkup(mainDocument.value.content);
    const narrative = await this.writeNarrative(
      document,
      request.paths.narrativePath,
    );
    const tables = await this.writeTables(document, request.paths.tablesPath);

    logger.debug(
      { label: request.label, narrative, tables },
      "Artifacts processed",
    );

    return {
      label: request.label,
      status: deriveStatus(narrative, tables),
      narrative,
      tables,
    };
  }

  private async writeNarrative(
    document: MarkupDocument,
    path: string,
  ): Promise<ArtifactOutcome> {
    const section = extractNarrativeSection(document);
    if (section.isErr()) {
      return { status: "skipped", reason: section.error.message };
    }

    const written = await this.artifactStore.writeText(
      path,
      renderNarrative(section.value),
    );
    if (written.isErr()) {
      return { status: "write_failed", path, reason: written.error.message };
    }

    return { status: "written", path, units: section.value.blocks.length };
  }

  private async writeTables(
    document: MarkupDocument,
    path: string,
  ): Promise<ArtifactOutcome> {
    const tableSet = extractTableSet(document);
    if (tableSet.isErr()) {
      return { status: "skipped", reason: tableSet.error.message };
    }

    const { sheets, failures, discarded, tablesFound } = tableSet.value;
    if (failures.length > 0) {
      logger.warn(
        { path, tablesFound, discarded, failures },
        "Some tables could not be parsed",
      );
    }

    const written = await this.artifactStore.writeWorkbook(path, sheets);
    if (written.isErr()) {
      return { status: "write_failed", path, reason: written.error.message };
    }

    return { status: "written", path, units: sheets.length };
  }
}
