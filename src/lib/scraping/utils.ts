import { config } from "../config";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { FetchFailureError } from "../errors";

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

/**
 * Single GET with the fixed browser header set. Any non-2xx status,
 * timeout or network error throws FetchFailureError; there is no retry.
 */
export async function fetchPage(
  url: string,
  options: { timeoutMs?: number } = {}
): Promise<string> {
  const { timeoutMs = config.requestTimeoutMs } = options;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await undiciFetch(url, {
      headers: config.requestHeaders,
      signal: controller.signal,
      dispatcher: getProxyDispatcher(),
    });

    if (!response.ok) {
      throw new FetchFailureError(url, response.status);
    }

    return await response.text();
  } catch (error: unknown) {
    if (error instanceof FetchFailureError) throw error;
    const detail =
      error instanceof Error && error.name === "AbortError"
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
    throw new FetchFailureError(url, null, detail);
  } finally {
    clearTimeout(timeout);
  }
}

export function parsePrice(raw: string): number | null {
  if (!raw) return null;
  // One leading currency symbol and thousands separators; anything else must fail
  const cleaned = raw.trim().replace(/^[£$€]/, "").replace(/,/g, "");
  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}
