import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { FilingRef } from "../../../core/entities/filing";
import type {
  FilingArchivePort,
  FilingsProviderPort,
  FilingsRequest,
  FilingTextRequest,
} from "../../../core/ports/inboundPorts";
import { HttpClient } from "../../http/httpClient";
import {
  assertUserAgent,
  edgarRequest,
  toBoundaryError,
  type SecEdgarConfig,
} from "./secEdgarConfig";

const recentFilingsSchema = z.object({
  form: z.array(z.string()).optional(),
  accessionNumber: z.array(z.string()).optional(),
  filingDate: z.array(z.string()).optional(),
  primaryDocument: z.array(z.string()).optional(),
});

const submissionSchema = z.object({
  name: z.string().optional(),
  filings: z
    .object({
      recent: recentFilingsSchema.optional(),
    })
    .optional(),
});

type RecentFilings = z.infer<typeof recentFilingsSchema>;

const padCik = (cik: string): string => cik.padStart(10, "0");

const asAccessionPathPart = (accessionNo: string): string =>
  accessionNo.replaceAll("-", "");

/**
 * Lists periodic reports from the EDGAR submissions index and downloads their full-submission text bundles.
 */
export class SecEdgarFilingsProvider
  implements FilingsProviderPort, FilingArchivePort
{
  constructor(
    private readonly config: SecEdgarConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    assertUserAgent(config);
  }

  /**
   * Returns the issuer's recent filings whose form matches one of the requested types exactly, newest first as EDGAR lists them.
   */
  async listFilings(
    request: FilingsRequest,
  ): Promise<Result<FilingRef[], AppBoundaryError>> {
    const url = new URL(
      `/submissions/CIK${padCik(request.cik)}.json`,
      this.config.baseUrl,
    ).toString();

    const response = await this.httpClient.requestJson(
      edgarRequest(this.config, url, "application/json"),
      submissionSchema,
    );

    if (response.isErr()) {
      if (response.error.httpStatus === 404) {
        return ok([]);
      }

      return err(toBoundaryError("filings", response.error));
    }

    const recent = response.value.filings?.recent;
    if (!recent) {
      return ok([]);
    }

    return ok(this.toFilingRefs(recent, new Set(request.formTypes)));
  }

  async fetchFilingText(
    request: FilingTextRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestText(
      edgarRequest(this.config, this.filingTextUrl(request), "text/plain"),
    );

    if (response.isErr()) {
      return err(toBoundaryError("archive", response.error));
    }

    return ok(response.value);
  }

  filingTextUrl(request: FilingTextRequest): string {
    const cik = Number.parseInt(request.cik, 10);
    const folder = asAccessionPathPart(request.accessionNo);
    return `${this.config.archivesBaseUrl}/${cik}/${folder}/${request.accessionNo}.txt`;
  }

  /**
   * Zips EDGAR's column-oriented "recent" arrays into filing records, skipping incomplete rows.
   */
  private toFilingRefs(
    recent: RecentFilings,
    formTypes: Set<string>,
  ): FilingRef[] {
    const forms = recent.form ?? [];
    const accessionNumbers = recent.accessionNumber ?? [];
    const filingDates = recent.filingDate ?? [];
    const primaryDocuments = recent.primaryDocument ?? [];

    const results: FilingRef[] = [];

    for (let index = 0; index < forms.length; index += 1) {
      const formType = forms[index]?.trim();
      const accessionNo = accessionNumbers[index]?.trim();
      const filingDate = filingDates[index]?.trim();
      const primaryDocument = primaryDocuments[index]?.trim();

      if (!formType || !formTypes.has(formType)) {
        continue;
      }

      if (!accessionNo || !filingDate) {
        continue;
      }

      results.push({
        formType,
        accessionNo,
        filingDate,
        ...(primaryDocument ? { primaryDocument } : {}),
      });
    }

    return results;
  }
}
