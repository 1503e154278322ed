import { config } from "../config";
import { SearchQuery } from "../types";
import { fetchPage } from "../scraping/utils";
import { buildCacheKey, getHttpCache, setHttpCache } from "../scraping/http-cache";

export type PageFetcher = (query: SearchQuery, runAt: Date) => Promise<string>;

export function buildSearchUrl(query: SearchQuery): string {
  const url = new URL(config.searchUrl);
  url.searchParams.set("postcode", query.postCode);
  url.searchParams.set("make", query.make);
  url.searchParams.set("model", query.model);
  if (query.page) url.searchParams.set("page", query.page);
  return url.toString();
}

/**
 * Raw search results markup for one page. Served from the cache when the
 * same query was fetched earlier in the run's hour bucket.
 */
export const fetchSearchPage: PageFetcher = async (query, runAt) => {
  const key = buildCacheKey(runAt, query);
  const cached = getHttpCache(key);
  if (cached !== null) return cached;

  const url = buildSearchUrl(query);
  console.log(`[fetch] GET ${url}`);
  const body = await fetchPage(url);
  setHttpCache(key, body);
  return body;
};
