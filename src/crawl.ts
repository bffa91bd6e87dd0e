import type { AxiosInstance } from "axios";
import { describeError } from "./errors";
import { getHtml } from "./http";
import { log } from "./logger";
import { validateUrl } from "./normalize";
import { extractContactExcerpt } from "./parse";
import type { ExcerptFetcher } from "./types";

/** Contact excerpt of a page, or "" when the page can't be fetched or isn't HTML. */
export async function fetchContactExcerpt(url: string, client: AxiosInstance): Promise<string> {
  if (!validateUrl(url)) return "";

  try {
    const html = await getHtml(client, url);
    return extractContactExcerpt(html);
  } catch (err) {
    log("WARN", describeError(err));
    return "";
  }
}

export function createExcerptFetcher(client: AxiosInstance): ExcerptFetcher {
  return (url) => fetchContactExcerpt(url, client);
}
