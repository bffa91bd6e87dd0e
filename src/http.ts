import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { NonSuccessStatusError, TransportError, UnsupportedContentTypeError } from "./errors";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export function createHttpClient({ userAgent, timeoutMs }: { userAgent: string; timeoutMs: number }): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": userAgent,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout: timeoutMs,
    // status is checked in getHtml so every failure maps onto one error type
    validateStatus: () => true,
  });
}

/** Single GET, no retries. Throws a typed error for anything but a 2xx HTML response. */
export async function getHtml(client: AxiosInstance, url: string): Promise<string> {
  let res: AxiosResponse<unknown>;
  try {
    res = await client.get<unknown>(url, { responseType: "text" });
  } catch (err) {
    throw new TransportError(url, err);
  }

  if (res.status < 200 || res.status >= 300) {
    throw new NonSuccessStatusError(url, res.status);
  }

  const contentType = String(res.headers["content-type"] ?? "");
  if (!/html/i.test(contentType)) {
    throw new UnsupportedContentTypeError(url, contentType);
  }

  return typeof res.data === "string" ? res.data : "";
}
