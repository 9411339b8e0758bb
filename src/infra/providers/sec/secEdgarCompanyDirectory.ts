import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyEntity } from "../../../core/entities/company";
import type {
  CompanyDirectoryPort,
  CompanyResolveRequest,
  CompanyResolveResult,
} from "../../../core/ports/inboundPorts";
import { HttpClient } from "../../http/httpClient";
import {
  assertUserAgent,
  edgarRequest,
  SEC_EDGAR_PROVIDER,
  toBoundaryError,
  type SecEdgarConfig,
} from "./secEdgarConfig";

const MAX_CANDIDATES = 10;

const tickersSchema = z.record(
  z.string(),
  z.object({
    cik_str: z.number().int().optional(),
    ticker: z.string().optional(),
    title: z.string().optional(),
  }),
);

type TickersPayload = z.infer<typeof tickersSchema>;

type CompanyIndex = {
  /** One entry per listed ticker, share classes included. */
  byTicker: Map<string, CompanyEntity>;
  /** One entry per CIK, for title matching. */
  issuers: CompanyEntity[];
};

/**
 * Resolves free-text company names (or tickers) against SEC's ticker/CIK table.
 */
export class SecEdgarCompanyDirectory implements CompanyDirectoryPort {
  private index: CompanyIndex | null = null;

  constructor(
    private readonly config: SecEdgarConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    assertUserAgent(config);
  }

  /**
   * Prefers an exact ticker, then an exact title, then a unique title substring.
   */
  async resolveCompany(
    request: CompanyResolveRequest,
  ): Promise<Result<CompanyResolveResult, AppBoundaryError>> {
    const query = request.query.trim().toUpperCase();
    if (!query) {
      return err({
        source: "companies",
        code: "validation_error",
        provider: SEC_EDGAR_PROVIDER,
        message: "Company lookup requires a non-empty name or ticker.",
        retryable: false,
      });
    }

    const indexResult = await this.loadIndex();
    if (indexResult.isErr()) {
      return err(indexResult.error);
    }
    const { byTicker, issuers: companies } = indexResult.value;

    const tickerMatch = byTicker.get(query);
    if (tickerMatch) {
      return ok({ status: "resolved", company: tickerMatch });
    }

    const byTitle = companies.find(
      (company) => company.title.toUpperCase() === query,
    );
    if (byTitle) {
      return ok({ status: "resolved", company: byTitle });
    }

    const matches = companies.filter((company) =>
      company.title.toUpperCase().includes(query),
    );

    const [onlyMatch] = matches;
    if (matches.length === 1 && onlyMatch) {
      return ok({ status: "resolved", company: onlyMatch });
    }

    if (matches.length > 1) {
      return ok({
        status: "ambiguous",
        candidates: matches.slice(0, MAX_CANDIDATES),
      });
    }

    return ok({ status: "not_found" });
  }

  /**
   * Downloads the ticker table once per directory instance.
   */
  private async loadIndex(): Promise<Result<CompanyIndex, AppBoundaryError>> {
    if (this.index) {
      return ok(this.index);
    }

    const response = await this.httpClient.requestJson(
      edgarRequest(this.config, this.config.tickersUrl, "application/json"),
      tickersSchema,
    );
    if (response.isErr()) {
      return err(toBoundaryError("companies", response.error));
    }

    this.index = this.toIndex(response.value);
    return ok(this.index);
  }

  /**
   * Indexes every ticker, but keeps only the first listing per CIK for title matching;
   * share classes repeat the issuer under several tickers.
   */
  private toIndex(payload: TickersPayload): CompanyIndex {
    const byTicker = new Map<string, CompanyEntity>();
    const byCik = new Map<string, CompanyEntity>();

    for (const record of Object.values(payload)) {
      const title = record.title?.trim();
      if (!title || record.cik_str === undefined) {
        continue;
      }

      const cik = String(record.cik_str);
      const ticker = record.ticker?.trim().toUpperCase();
      const company: CompanyEntity = ticker ? { cik, title, ticker } : { cik, title };

      if (ticker && !byTicker.has(ticker)) {
        byTicker.set(ticker, company);
      }

      if (!byCik.has(cik)) {
        byCik.set(cik, company);
      }
    }

    return { byTicker, issuers: Array.from(byCik.values()) };
  }
}
