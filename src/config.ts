import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import { DEFAULT_USER_AGENT } from "./http";

export const DEFAULT_QUERY = 'site:.lk "restaurant" ("contact us" OR "contact" OR "email" OR "phone" OR "address")';

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string(),
  GOOGLE_CX: z.string(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  SEARCH_QUERY: z.string().default(DEFAULT_QUERY),
  // the Custom Search API caps a page at 10 results
  RESULTS_PER_PAGE: z.coerce.number().int().min(1).max(10).default(10),
  OUTPUT_DIR: z.string().default("exported_data"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SCRAPE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  AUTO_CONFIRM: z
    .string()
    .optional()
    .transform((v) => v === "1" || v?.toLowerCase() === "true"),
});

export type AppConfig = {
  googleApiKey: string;
  googleCx: string;
  openaiApiKey?: string;
  openaiModel: string;
  query: string;
  pageSize: number;
  outputDir: string;
  files: {
    state: string;
    records: string;
    export: string;
  };
  fetchTimeoutMs: number;
  scrapeDelayMs: number;
  userAgent: string;
  autoConfirm: boolean;
};

/**
 * Builds the run configuration from environment variables. Blank values count as unset.
 * Throws ConfigurationError listing every missing or invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env)
      .filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== "")
      .map(([k, v]) => [k, v.trim()])
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    googleCx: e.GOOGLE_CX,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    query: e.SEARCH_QUERY,
    pageSize: e.RESULTS_PER_PAGE,
    outputDir: e.OUTPUT_DIR,
    files: {
      state: join(e.OUTPUT_DIR, "scraping_state.json"),
      records: join(e.OUTPUT_DIR, "restaurant_details.json"),
      export: join(e.OUTPUT_DIR, "restaurant_emails.csv"),
    },
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    scrapeDelayMs: e.SCRAPE_DELAY_MS,
    userAgent: e.USER_AGENT,
    autoConfirm: e.AUTO_CONFIRM,
  };
}
