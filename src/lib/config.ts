// Fixed browser-identifying header set sent with every search request
const REQUEST_HEADERS: Record<string, string> = {
  Accept: "text/html",
  "Accept-Language": "en-GB,en;q=0.7",
  "Cache-Control": "no-cache",
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
};

/** Positive integer from an env value, or the fallback when unset or invalid. */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || "", 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export const config = {
  dataDir: process.env.DATA_DIR || "data",
  cacheDir: process.env.CACHE_DIR || "data/cache",
  searchUrl: process.env.SEARCH_URL || "https://www.autotrader.co.uk/car-search",
  requestTimeoutMs: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 15000),
  requestHeaders: REQUEST_HEADERS,
};
