import "dotenv/config";

import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { loadConfig } from "./config";
import { createExcerptFetcher } from "./crawl";
import { createFallbackResolver } from "./fallback";
import { createSearchClient } from "./googleSearch";
import { createHttpClient } from "./http";
import { log } from "./logger";
import { run, type PipelineDeps } from "./pipeline";
import { RateLimiter } from "./utils";

async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input, output });
  const ans = await rl.question(`\n${question} (y/n): `);
  rl.close();
  return /^y(es)?$/i.test(ans.trim());
}

function readFlag(argv: string[], name: string): string | undefined {
  const idx = argv.findIndex((a) => a === name);
  return idx >= 0 ? argv[idx + 1] : undefined;
}

async function main() {
  const config = loadConfig(process.env);
  const query = readFlag(process.argv, "--query") ?? config.query;
  const autoConfirm = config.autoConfirm || process.argv.includes("--yes");

  const http = createHttpClient({ userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs });
  const deps: PipelineDeps = {
    config: { ...config, query },
    search: createSearchClient(config),
    fetchExcerpt: createExcerptFetcher(http),
    resolveEmails: createFallbackResolver(config),
    throttle: new RateLimiter(config.scrapeDelayMs),
  };

  const summary = await run(deps, autoConfirm ? async () => true : askYesNo);

  log(
    "SUCCESS",
    `Done: ${summary.added} added, ${summary.enriched} enriched, ${summary.removed} duplicates removed, ` +
      `${summary.total} total. Next run starts at #${summary.nextStartIndex}`
  );
}

main().catch((e) => {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
