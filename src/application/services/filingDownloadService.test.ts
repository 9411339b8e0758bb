import { describe, expect, it } from "vitest";
import { err, ok, type Result } from "neverthrow";
import { FilingDownloadService } from "./filingDownloadService";
import { FilingExtractionService } from "./filingExtractionService";
import { InMemoryArtifactStore } from "../../infra/storage/inMemoryArtifactStore";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type { FilingRef } from "../../core/entities/filing";
import type {
  CompanyDirectoryPort,
  CompanyResolveResult,
  FilingArchivePort,
  FilingsProviderPort,
} from "../../core/ports/inboundPorts";

const company: CompanyEntity = {
  cik: "111",
  title: "Example Devices Inc.",
  ticker: "EXDV",
};

const companyDir = "/out/Example_Devices_Inc.";

const oldestQuarter: FilingRef = {
  formType: "10-Q",
  accessionNo: "0000000111-24-000001",
  filingDate: "2024-08-02",
};

const filings: FilingRef[] = [
  {
    formType: "10-K",
    accessionNo: "0000000111-25-000003",
    filingDate: "2025-02-14",
  },
  {
    formType: "10-Q",
    accessionNo: "0000000111-24-000002",
    filingDate: "2024-11-01",
  },
  oldestQuarter,
];

const tenQBundle = [
  "<DOCUMENT>",
  "<TYPE>10-Q",
  "<TEXT>",
  "<h2>Item 2. Management's Discussion and Analysis</h2>",
  "<p>Quarterly sales were flat.</p>",
  "<table><tr><td>Quarter</td><td>Sales</td></tr><tr><td>Q3</td><td>4</td></tr></table>",
  "</TEXT>",
  "</DOCUMENT>",
].join("\n");

const directoryReturning = (
  result: CompanyResolveResult,
): CompanyDirectoryPort => ({
  resolveCompany: async () => ok(result),
});

const providerReturning = (listed: FilingRef[]): FilingsProviderPort => ({
  listFilings: async () => ok(listed),
});

const recordingArchive = (fetched: string[]): FilingArchivePort => ({
  fetchFilingText: async ({ accessionNo }) => {
    fetched.push(accessionNo);
    if (accessionNo === "0000000111-24-000002") {
      return err({
        source: "archive",
        code: "timeout",
        provider: "sec-edgar",
        message: "Request timed out after 15000ms.",
        retryable: true,
      });
    }

    return ok(tenQBundle);
  },
});

const buildService = (
  directory: CompanyDirectoryPort,
  provider: FilingsProviderPort,
  archive: FilingArchivePort,
  store: InMemoryArtifactStore,
) =>
  new FilingDownloadService(
    directory,
    provider,
    archive,
    new FilingExtractionService(store),
    store,
    "/out",
    ["10-K", "10-Q"],
  );

describe("FilingDownloadService", () => {
  it("skips cached filings, isolates fetch failures and extracts the rest", async () => {
    const store = new InMemoryArtifactStore();
    await store.writeText(
      `${companyDir}/Example_Devices_Inc._10-K_2025-02-14_MDA.txt`,
      "cached",
    );
    await store.writeWorkbook(
      `${companyDir}/Example_Devices_Inc._10-K_2025-02-14_Tables.xlsx`,
      [],
    );
    const fetched: string[] = [];

    const service = buildService(
      directoryReturning({ status: "resolved", company }),
      providerReturning(filings),
      recordingArchive(fetched),
      store,
    );

    const result = await service.runForCompany("exdv");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    const run = result.value;
    if (run.status !== "completed") {
      throw new Error(`Unexpected run status ${run.status}`);
    }

    expect(run.outputDirectory).toBe(companyDir);
    expect(run.reports.map((report) => [report.label, report.status])).toEqual([
      ["10-K from 2025-02-14", "skipped-existing"],
      ["10-Q from 2024-11-01", "fetch-error"],
      ["10-Q from 2024-08-02", "success"],
    ]);
    expect(run.reports[1]?.reason).toBe("Request timed out after 15000ms.");
    expect(fetched).toEqual(["0000000111-24-000002", "0000000111-24-000001"]);
    expect(
      store.texts.get(`${companyDir}/Example_Devices_Inc._10-Q_2024-08-02_MDA.txt`),
    ).toBe("Quarterly sales were flat.\n\n");
    expect(
      store.workbooks.get(
        `${companyDir}/Example_Devices_Inc._10-Q_2024-08-02_Tables.xlsx`,
      ),
    ).toEqual([
      {
        name: "Table_1",
        grid: [
          ["Quarter", "Sales"],
          ["Q3", "4"],
        ],
      },
    ]);
  });

  it("keeps processing after one filing throws during extraction", async () => {
    class DetachingArtifactStore extends InMemoryArtifactStore {
      override async writeText(
        path: string,
        text: string,
      ): Promise<Result<void, AppBoundaryError>> {
        if (path.includes("2024-11-01")) {
          throw new Error("volume detached");
        }

        return super.writeText(path, text);
      }
    }

    const store = new DetachingArtifactStore();
    const archive: FilingArchivePort = {
      fetchFilingText: async () => ok(tenQBundle),
    };

    const service = buildService(
      directoryReturning({ status: "resolved", company }),
      providerReturning([
        {
          formType: "10-Q",
          accessionNo: "0000000111-24-000002",
          filingDate: "2024-11-01",
        },
        oldestQuarter,
      ]),
      archive,
      store,
    );

    const result = await service.runForCompany("EXDV");

    expect(result.isOk()).toBe(true);
    if (result.isErr() || result.value.status !== "completed") {
      throw new Error("Expected a completed run");
    }

    expect(result.value.reports).toEqual([
      {
        label: "10-Q from 2024-11-01",
        status: "extract-error",
        reason: "volume detached",
      },
      expect.objectContaining({
        label: "10-Q from 2024-08-02",
        status: "success",
      }),
    ]);
    expect(
      store.texts.get(`${companyDir}/Example_Devices_Inc._10-Q_2024-08-02_MDA.txt`),
    ).toBe("Quarterly sales were flat.\n\n");
  });

  it("re-runs a filing when only one of its artifacts exists", async () => {
    const store = new InMemoryArtifactStore();
    await store.writeText(
      `${companyDir}/Example_Devices_Inc._10-Q_2024-08-02_MDA.txt`,
      "partial",
    );
    const fetched: string[] = [];

    const service = buildService(
      directoryReturning({ status: "resolved", company }),
      providerReturning([oldestQuarter]),
      recordingArchive(fetched),
      store,
    );

    const result = await service.runForCompany("EXDV");

    expect(fetched).toEqual(["0000000111-24-000001"]);
    if (result.isErr() || result.value.status !== "completed") {
      throw new Error("Expected a completed run");
    }
    expect(result.value.reports[0]?.status).toBe("success");
  });

  it("returns candidates without listing filings when the query is ambiguous", async () => {
    const candidates: CompanyEntity[] = [
      company,
      { cik: "222", title: "Example Devices Holdings Corp", ticker: "EXDH" },
    ];
    let listed = false;
    const provider: FilingsProviderPort = {
      listFilings: async () => {
        listed = true;
        return ok([]);
      },
    };

    const service = buildService(
      directoryReturning({ status: "ambiguous", candidates }),
      provider,
      recordingArchive([]),
      new InMemoryArtifactStore(),
    );

    const result = await service.runForCompany("example devices");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({
      status: "ambiguous",
      query: "example devices",
      candidates,
    });
    expect(listed).toBe(false);
  });

  it("reports an unknown company as not found", async () => {
    const service = buildService(
      directoryReturning({ status: "not_found" }),
      providerReturning(filings),
      recordingArchive([]),
      new InMemoryArtifactStore(),
    );

    const result = await service.runForCompany("Nonexistent Widgets");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({
      status: "not_found",
      query: "Nonexistent Widgets",
    });
  });

  it("propagates a listing failure as an error", async () => {
    const provider: FilingsProviderPort = {
      listFilings: async () =>
        err({
          source: "filings",
          code: "rate_limited",
          provider: "sec-edgar",
          message: "SEC EDGAR returned HTTP 429.",
          retryable: true,
          httpStatus: 429,
        }),
    };

    const service = buildService(
      directoryReturning({ status: "resolved", company }),
      provider,
      recordingArchive([]),
      new InMemoryArtifactStore(),
    );

    const result = await service.runForCompany("EXDV");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("Expected listing failure to propagate");
    }

    expect(result.error.code).toBe("rate_limited");
  });
});
