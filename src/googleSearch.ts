import { google, type customsearch_v1 } from "googleapis";
import type { AppConfig } from "./config";
import { describeError, InvalidArgumentError } from "./errors";
import { log } from "./logger";
import type { SearchClient } from "./types";

const MIN_QUERY_LENGTH = 3;
const MAX_START = 100;

export type CseList = (params: customsearch_v1.Params$Resource$Cse$List) => Promise<customsearch_v1.Schema$Search>;

export function googleCseList(): CseList {
  const customsearch = google.customsearch("v1");
  return async (params) => {
    const res = await customsearch.cse.list(params);
    return res.data;
  };
}

export function createSearchClient(
  config: Pick<AppConfig, "googleApiKey" | "googleCx" | "pageSize">,
  list: CseList = googleCseList()
): SearchClient {
  return async (query, start) => {
    if (query.trim().length < MIN_QUERY_LENGTH) {
      throw new InvalidArgumentError(`Search query must be at least ${MIN_QUERY_LENGTH} characters, got "${query}"`);
    }
    if (!Number.isInteger(start) || start < 1 || start > MAX_START) {
      throw new InvalidArgumentError(`Search offset must be an integer between 1 and ${MAX_START}, got ${start}`);
    }

    let data: customsearch_v1.Schema$Search;
    try {
      data = await list({
        q: query,
        cx: config.googleCx,
        key: config.googleApiKey,
        num: config.pageSize,
        start,
      });
    } catch (err) {
      log("ERROR", `Search request failed: ${describeError(err)}`);
      return [];
    }

    log("INFO", `Total results available: ${data.searchInformation?.totalResults ?? "0"}`);

    return (data.items ?? []).map((i) => ({
      title: i.title ?? "",
      snippet: i.snippet ?? "",
      link: i.link ?? "",
    }));
  };
}
