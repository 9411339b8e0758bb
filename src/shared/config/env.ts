import "dotenv/config";
import { z } from "zod";

export const PLACEHOLDER_USER_AGENT =
  "filing-extractor/0.1 (contact: devnull@example.com)";

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  SEC_EDGAR_BASE_URL: z.string().default("https://data.sec.gov"),
  SEC_EDGAR_ARCHIVES_BASE_URL: z
    .string()
    .default("https://www.sec.gov/Archives/edgar/data"),
  SEC_EDGAR_TICKERS_URL: z
    .string()
    .default("https://www.sec.gov/files/company_tickers.json"),
  SEC_EDGAR_USER_AGENT: z.string().default(PLACEHOLDER_USER_AGENT),
  SEC_EDGAR_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SEC_EDGAR_RETRIES: z.coerce.number().int().nonnegative().default(2),
  SEC_EDGAR_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(300),
  // SEC fair-access policy caps clients at ten requests per second.
  SEC_EDGAR_RATE_LIMIT_DELAY_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(110),
  OUTPUT_DIR: z.string().default("sec_filings"),
  FORM_TYPES: z.string().default("10-K,10-Q"),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

export const isPlaceholderUserAgent = (userAgent: string): boolean =>
  userAgent.trim() === PLACEHOLDER_USER_AGENT;

/**
 * Warns early when EDGAR requests would go out with the placeholder contact, which SEC throttles or rejects.
 */
const warnIfPlaceholderUserAgent = (appEnv: AppEnv): void => {
  if (appEnv.NODE_ENV === "test") {
    return;
  }

  if (isPlaceholderUserAgent(appEnv.SEC_EDGAR_USER_AGENT)) {
    console.warn(
      "[config] SEC_EDGAR_USER_AGENT is the placeholder contact. Set it to '<app> (contact: <your email>)' in .env before fetching filings.",
    );
  }
};

warnIfPlaceholderUserAgent(env);

/**
 * Normalizes a comma-separated form list so filtering compares exact, upper-cased form codes.
 */
export const parseFormTypes = (raw: string): string[] =>
  Array.from(
    new Set(
      raw
        .split(",")
        .map((item) => item.trim().toUpperCase())
        .filter(Boolean),
    ),
  );

/**
 * Resolves the configured periodic-report forms once so listing and CLI overrides share one parser.
 */
export const formTypes = (): string[] => parseFormTypes(env.FORM_TYPES);
