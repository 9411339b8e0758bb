import { FilingDownloadService } from "../services/filingDownloadService";
import { FilingExtractionService } from "../services/filingExtractionService";
import { env, formTypes } from "../../shared/config/env";
import { HttpClient } from "../../infra/http/httpClient";
import { SecEdgarCompanyDirectory } from "../../infra/providers/sec/secEdgarCompanyDirectory";
import type { SecEdgarConfig } from "../../infra/providers/sec/secEdgarConfig";
import { SecEdgarFilingsProvider } from "../../infra/providers/sec/secEdgarFilingsProvider";
import { FsArtifactStore } from "../../infra/storage/fsArtifactStore";

export type RuntimeOverrides = {
  outputDir?: string;
  formTypes?: string[];
};

export const secEdgarConfigFromEnv = (): SecEdgarConfig => ({
  baseUrl: env.SEC_EDGAR_BASE_URL,
  archivesBaseUrl: env.SEC_EDGAR_ARCHIVES_BASE_URL,
  tickersUrl: env.SEC_EDGAR_TICKERS_URL,
  userAgent: env.SEC_EDGAR_USER_AGENT,
  timeoutMs: env.SEC_EDGAR_TIMEOUT_MS,
  retries: env.SEC_EDGAR_RETRIES,
  retryDelayMs: env.SEC_EDGAR_RETRY_DELAY_MS,
});

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 * Both EDGAR adapters go through one HTTP client, so the request spacing covers all SEC traffic.
 */
export const createRuntime = (overrides: RuntimeOverrides = {}) => {
  const outputDir = overrides.outputDir ?? env.OUTPUT_DIR;
  const forms = overrides.formTypes ?? formTypes();

  const config = secEdgarConfigFromEnv();
  const httpClient = new HttpClient(env.SEC_EDGAR_RATE_LIMIT_DELAY_MS);
  const companyDirectory = new SecEdgarCompanyDirectory(config, httpClient);
  const filingsProvider = new SecEdgarFilingsProvider(config, httpClient);

  const artifactStore = new FsArtifactStore();
  const extractionService = new FilingExtractionService(artifactStore);
  const downloadService = new FilingDownloadService(
    companyDirectory,
    filingsProvider,
    filingsProvider,
    extractionService,
    artifactStore,
    outputDir,
    forms,
  );

  return {
    outputDir,
    formTypes: forms,
    extractionService,
    downloadService,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
