import { RawListing, ScrapeRequest, ScrapeResult, SearchQuery } from "./types";
import { extractListings } from "./listings/extract";
import { aggregate } from "./listings/aggregate";
import { fetchSearchPage, PageFetcher } from "./listings/search";
import { writeDataset } from "./output";

export interface ScrapeOptions {
  runAt: Date; // captured once at run start; drives cache keys and file name
  fetchPage?: PageFetcher;
  outputDir?: string;
}

/**
 * Fetch, extract and aggregate every requested page, then write the dataset.
 *
 * Pages are processed strictly in order: page N+1 is only fetched after
 * page N has been extracted. A fetch failure or malformed listing aborts the
 * run before anything is written.
 */
export async function runScrape(
  request: ScrapeRequest,
  options: ScrapeOptions
): Promise<ScrapeResult> {
  const startTime = Date.now();
  const fetchPage = options.fetchPage ?? fetchSearchPage;

  // No page tokens means the single default results page
  const pageTokens: (string | null)[] =
    request.pages && request.pages.length > 0 ? request.pages : [null];

  const pages: RawListing[][] = [];
  for (const page of pageTokens) {
    const query: SearchQuery = {
      make: request.make,
      model: request.model,
      postCode: request.postCode,
      page,
    };

    const html = await fetchPage(query, options.runAt);
    const listings = extractListings(html);
    console.log(`[pipeline] Page ${page ?? "default"}: ${listings.length} listings`);
    pages.push(listings);
  }

  const dataset = aggregate(pages);

  const outputPath = writeDataset(dataset, {
    runAt: options.runAt,
    make: request.make,
    model: request.model,
    outputDir: options.outputDir,
  });

  const durationMs = Date.now() - startTime;
  console.log(`[pipeline] Wrote ${dataset.length} records to ${outputPath} in ${durationMs}ms`);

  return {
    dataset,
    outputPath,
    pageCount: pages.length,
    durationMs,
  };
}
