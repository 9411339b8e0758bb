import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type { FilingReport } from "../../core/entities/extraction";
import type { FilingRef } from "../../core/entities/filing";
import type {
  CompanyDirectoryPort,
  FilingArchivePort,
  FilingsProviderPort,
} from "../../core/ports/inboundPorts";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { artifactPathsFor, companyOutputDirectory } from "./artifactLayout";
import type { FilingExtractionService } from "./filingExtractionService";

export type CompanyRunResult =
  | {
      status: "completed";
      company: CompanyEntity;
      outputDirectory: string;
      reports: FilingReport[];
    }
  | { status: "ambiguous"; query: string; candidates: CompanyEntity[] }
  | { status: "not_found"; query: string };

export const filingLabel = (filing: FilingRef): string =>
  `${filing.formType} from ${filing.filingDate}`;

/**
 * Drives one company end to end: lookup, filing listing, then fetch and extraction per filing.
 */
export class FilingDownloadService {
  constructor(
    private readonly companyDirectory: CompanyDirectoryPort,
    private readonly filingsProvider: FilingsProviderPort,
    private readonly filingArchive: FilingArchivePort,
    private readonly extractionService: FilingExtractionService,
    private readonly artifactStore: ArtifactStorePort,
    private readonly outputRoot: string,
    private readonly formTypes: string[],
  ) {}

  /**
   * Lookup and listing failures are returned as errors; anything that goes wrong with a single filing
   * lands in that filing's report and the remaining filings still run.
   */
  async runForCompany(
    query: string,
  ): Promise<Result<CompanyRunResult, AppBoundaryError>> {
    const resolution = await this.companyDirectory.resolveCompany({ query });
    if (resolution.isErr()) {
      return err(resolution.error);
    }

    const resolved = resolution.value;
    if (resolved.status === "ambiguous") {
      return ok({ status: "ambiguous", query, candidates: resolved.candidates });
    }

    if (resolved.status === "not_found") {
      return ok({ status: "not_found", query });
    }

    const company = resolved.company;
    const filings = await this.filingsProvider.listFilings({
      cik: company.cik,
      formTypes: this.formTypes,
    });
    if (filings.isErr()) {
      return err(filings.error);
    }

    logger.info(
      { cik: company.cik, company: company.title, filings: filings.value.length },
      "Filings listed",
    );

    const reports: FilingReport[] = [];
    for (const filing of filings.value) {
      const report = await this.processFilingIsolated(company, filing);
      logger.info(
        {
          cik: company.cik,
          accessionNo: filing.accessionNo,
          status: report.status,
          reason: report.reason,
        },
        "Filing processed",
      );
      reports.push(report);
    }

    return ok({
      status: "completed",
      company,
      outputDirectory: companyOutputDirectory(this.outputRoot, company.title),
      reports,
    });
  }

  /**
   * Turns anything thrown while handling one filing into that filing's report, so the batch keeps going.
   */
  private async processFilingIsolated(
    company: CompanyEntity,
    filing: FilingRef,
  ): Promise<FilingReport> {
    try {
      return await this.processFiling(company, filing);
    } catch (error) {
      logger.error(
        { cik: company.cik, accessionNo: filing.accessionNo, error },
        "Filing extraction threw",
      );

      return {
        label: filingLabel(filing),
        status: "extract-error",
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async processFiling(
    company: CompanyEntity,
    filing: FilingRef,
  ): Promise<FilingReport> {
    const label = filingLabel(filing);
    const paths = artifactPathsFor(this.outputRoot, company.title, filing);

    const [hasNarrative, hasTables] = await Promise.all([
      this.artifactStore.exists(paths.narrativePath),
      this.artifactStore.exists(paths.tablesPath),
    ]);
    if (hasNarrative && hasTables) {
      return { label, status: "skipped-existing" };
    }

    const filingText = await this.filingArchive.fetchFilingText({
      cik: company.cik,
      accessionNo: filing.accessionNo,
    });
    if (filingText.isErr()) {
      return { label, status: "fetch-error", reason: filingText.error.message };
    }

    return this.extractionService.process({
      label,
      filingText: filingText.value,
      formType: filing.formType,
      paths,
    });
  }
}
