import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";
import { Command } from "commander";
import {
  createRuntime,
  type Runtime,
  type RuntimeOverrides,
} from "../application/bootstrap/runtimeFactory";
import { artifactPathsForPrefix } from "../application/services/artifactLayout";
import type { CompanyRunResult } from "../application/services/filingDownloadService";
import type {
  ArtifactOutcome,
  FilingReport,
} from "../core/entities/extraction";
import { env, formTypes, parseFormTypes } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const EXIT_WORD = "exit";

const formatOutcome = (
  artifact: string,
  unit: string,
  outcome: ArtifactOutcome | undefined,
): string | null => {
  if (!outcome) {
    return null;
  }

  switch (outcome.status) {
    case "written":
      return `    ${artifact}: ${outcome.units} ${unit} -> ${outcome.path}`;
    case "skipped":
      return `    ${artifact}: skipped (${outcome.reason})`;
    case "write_failed":
      return `    ${artifact}: write failed for ${outcome.path} (${outcome.reason})`;
  }
};

/**
 * Renders one filing's status and artifact outcomes as indented terminal lines.
 */
export const formatFilingReport = (report: FilingReport): string[] => {
  const lines = [
    `- ${report.label}: ${report.status}${report.reason ? ` (${report.reason})` : ""}`,
  ];

  const narrative = formatOutcome("narrative", "blocks", report.narrative);
  const tables = formatOutcome("tables", "sheets", report.tables);
  [narrative, tables].forEach((line) => {
    if (line) {
      lines.push(line);
    }
  });

  return lines;
};

/**
 * Formats a company run into a compact terminal report for manual inspection.
 */
export const formatCompanyRun = (run: CompanyRunResult): string => {
  if (run.status === "not_found") {
    return `No company matches '${run.query}'.`;
  }

  if (run.status === "ambiguous") {
    return [
      `'${run.query}' matches several companies; try a ticker or a fuller name:`,
      ...run.candidates.map(
        (candidate) =>
          `- ${candidate.title}${candidate.ticker ? ` [${candidate.ticker}]` : ""} (CIK ${candidate.cik})`,
      ),
    ].join("\n");
  }

  const lines = [
    `${run.company.title} (CIK ${run.company.cik})`,
    `Output: ${run.outputDirectory}`,
  ];

  if (run.reports.length === 0) {
    lines.push("No matching filings listed.");
    return lines.join("\n");
  }

  run.reports.forEach((report) => lines.push(...formatFilingReport(report)));

  const counts = new Map<string, number>();
  run.reports.forEach((report) =>
    counts.set(report.status, (counts.get(report.status) ?? 0) + 1),
  );
  lines.push(
    `Summary: ${Array.from(counts, ([status, count]) => `${status}=${count}`).join(", ")}`,
  );

  return lines.join("\n");
};

const fetchAndReport = async (
  runtime: Runtime,
  query: string,
): Promise<boolean> => {
  const result = await runtime.downloadService.runForCompany(query);

  if (result.isErr()) {
    logger.error({ query, error: result.error }, "Company run failed");
    console.log(`Could not process '${query}': ${result.error.message}`);
    return false;
  }

  console.log(formatCompanyRun(result.value));
  return result.value.status === "completed";
};

const overridesFrom = (opts: {
  forms?: string;
  out?: string;
}): RuntimeOverrides => ({
  outputDir: opts.out,
  formTypes: opts.forms ? parseFormTypes(opts.forms) : undefined,
});

/**
 * Defines a single command surface so interactive and one-shot runs share the same pipeline.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("filing-extractor")
    .description(
      "Download SEC periodic reports and extract the MD&A narrative and data tables",
    );

  cli
    .command("run")
    .description("Prompt for company names until 'exit' is entered")
    .option("--forms <list>", "Comma-separated form types, e.g. 10-K,10-Q")
    .option("--out <dir>", "Output root directory")
    .action(async (opts: { forms?: string; out?: string }) => {
      const runtime = createRuntime(overridesFrom(opts));
      const prompt = createInterface({ input: stdin, output: stdout });

      logger.info(
        { outputDir: runtime.outputDir, formTypes: runtime.formTypes },
        "Interactive session started",
      );

      try {
        for (;;) {
          const query = (
            await prompt.question(`Company name or ticker ('${EXIT_WORD}' to quit): `)
          ).trim();

          if (query.toLowerCase() === EXIT_WORD) {
            break;
          }

          if (query) {
            await fetchAndReport(runtime, query);
          }
        }
      } finally {
        prompt.close();
      }
    });

  cli
    .command("fetch")
    .description("Process every listed filing for one company")
    .requiredOption("--company <name>", "Company name or ticker")
    .option("--forms <list>", "Comma-separated form types, e.g. 10-K,10-Q")
    .option("--out <dir>", "Output root directory")
    .action(async (opts: { company: string; forms?: string; out?: string }) => {
      const runtime = createRuntime(overridesFrom(opts));
      const completed = await fetchAndReport(runtime, opts.company);
      if (!completed) {
        process.exitCode = 1;
      }
    });

  cli
    .command("extract")
    .description("Run extraction on a local full-submission text file")
    .requiredOption("--file <path>", "Path to the .txt submission bundle")
    .requiredOption("--form <type>", "Form type of the main document, e.g. 10-K")
    .requiredOption(
      "--out <prefix>",
      "Artifact path prefix; _MDA.txt and _Tables.xlsx are appended",
    )
    .action(async (opts: { file: string; form: string; out: string }) => {
      const runtime = createRuntime();
      const filingText = await readFile(opts.file, "utf8");

      const report = await runtime.extractionService.process({
        label: basename(opts.file),
        filingText,
        formType: opts.form.trim().toUpperCase(),
        paths: artifactPathsForPrefix(opts.out),
      });

      logger.info(
        { file: opts.file, status: report.status, reason: report.reason },
        "Filing processed",
      );
      console.log(formatFilingReport(report).join("\n"));
      if (report.status === "write-error") {
        process.exitCode = 1;
      }
    });

  cli
    .command("status")
    .description("Report resolved configuration")
    .action(() => {
      logger.info(
        {
          nodeEnv: env.NODE_ENV,
          outputDir: env.OUTPUT_DIR,
          formTypes: formTypes(),
          secEdgar: {
            baseUrl: env.SEC_EDGAR_BASE_URL,
            archivesBaseUrl: env.SEC_EDGAR_ARCHIVES_BASE_URL,
            tickersUrl: env.SEC_EDGAR_TICKERS_URL,
            userAgent: env.SEC_EDGAR_USER_AGENT,
            timeoutMs: env.SEC_EDGAR_TIMEOUT_MS,
            retries: env.SEC_EDGAR_RETRIES,
            retryDelayMs: env.SEC_EDGAR_RETRY_DELAY_MS,
            rateLimitDelayMs: env.SEC_EDGAR_RATE_LIMIT_DELAY_MS,
          },
          startupWorkflow: [
            "cp .env.example .env and set SEC_EDGAR_USER_AGENT",
            "npm start -- fetch --company AAPL",
            "npm start -- run",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
