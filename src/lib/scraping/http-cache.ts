import fs from "fs";
import path from "path";
import { config } from "../config";
import { SearchQuery } from "../types";

const CACHE_EXT = ".html";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Calendar day of the run in local time, e.g. "2024-03-05". */
export function formatRunDate(runAt: Date): string {
  return `${runAt.getFullYear()}-${pad(runAt.getMonth() + 1)}-${pad(runAt.getDate())}`;
}

/** Run timestamp truncated to the hour, e.g. "2024-03-05_14h". */
export function formatHourBucket(runAt: Date): string {
  return `${formatRunDate(runAt)}_${pad(runAt.getHours())}h`;
}

/** Replace path separators so a value stays a single file name segment. */
export function toFileSegment(value: string): string {
  return value.replace(/[/\\\0]/g, "-");
}

/**
 * Cache key for one search page. Requests for the same query within the
 * same hour share a key.
 */
export function buildCacheKey(runAt: Date, query: SearchQuery): string {
  const page = query.page ?? "none";
  return [
    formatHourBucket(runAt),
    query.make.toLowerCase(),
    query.model.toLowerCase(),
    query.postCode,
    `page-${page}`,
  ].join("_");
}

function cacheFilePath(key: string): string {
  return path.join(config.cacheDir, `${toFileSegment(key)}${CACHE_EXT}`);
}

/**
 * Return the cached body for a key, or null when nothing is stored.
 */
export function getHttpCache(key: string): string | null {
  const filePath = cacheFilePath(key);
  if (!fs.existsSync(filePath)) return null;

  console.log(`[cache] hit ${key}`);
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Write (or overwrite) the cache file for a key.
 */
export function setHttpCache(key: string, body: string): void {
  fs.mkdirSync(config.cacheDir, { recursive: true });
  fs.writeFileSync(cacheFilePath(key), body, "utf-8");
}

/**
 * Delete every cached page. Returns the number of files removed.
 */
export function clearHttpCache(): number {
  if (!fs.existsSync(config.cacheDir)) return 0;

  const files = fs.readdirSync(config.cacheDir).filter((name) => name.endsWith(CACHE_EXT));
  for (const name of files) {
    fs.unlinkSync(path.join(config.cacheDir, name));
  }
  return files.length;
}
