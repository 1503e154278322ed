/** Base class for the failures a scrape run expects and reports. */
export class ScrapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Non-success response, timeout or network error from the search endpoint. */
export class FetchFailureError extends ScrapeError {
  readonly url: string;
  readonly status: number | null; // null when no response was received

  constructor(url: string, status: number | null, detail?: string) {
    super(
      status !== null
        ? `HTTP ${status} for ${url}`
        : `Request failed for ${url}${detail ? `: ${detail}` : ""}`
    );
    this.url = url;
    this.status = status;
  }
}

export type ListingElement = "content" | "price" | "title" | "subtitle";

/**
 * A listing node is missing a required sub-element. Aborts extraction of
 * the whole page.
 */
export class MalformedListingError extends ScrapeError {
  readonly element: ListingElement;
  readonly listingIndex: number;

  constructor(element: ListingElement, listingIndex: number) {
    super(`Listing ${listingIndex} is missing its ${element} element`);
    this.element = element;
    this.listingIndex = listingIndex;
  }
}

/** Price text that does not coerce to a number. Reported, never thrown. */
export class PriceParseWarning {
  readonly name = "PriceParseWarning";
  readonly raw: string;
  readonly message: string;

  constructor(raw: string) {
    this.raw = raw;
    this.message = `Could not parse price "${raw}", recording as missing`;
  }
}
