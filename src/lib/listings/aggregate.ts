import { Dataset, ListingRecord, RawListing } from "../types";
import { PriceParseWarning } from "../errors";
import { parsePrice } from "../scraping/utils";

export interface AggregateOptions {
  onWarning?: (warning: PriceParseWarning) => void;
}

function logWarning(warning: PriceParseWarning): void {
  console.warn(`[aggregate] ${warning.message}`);
}

/**
 * Split a title on its first whitespace run: "Ford Fiesta ST-Line" gives
 * make "Ford" and model "Fiesta ST-Line". A single-word title has no model.
 */
export function splitTitle(title: string): { make: string; model: string | null } {
  const m = title.match(/^(\S*)\s+([\s\S]*)$/);
  if (!m) return { make: title, model: null };
  return { make: m[1], model: m[2] };
}

export function toListingRecord(
  raw: RawListing,
  onWarning: (warning: PriceParseWarning) => void = logWarning
): ListingRecord {
  const price = parsePrice(raw.price);
  if (price === null) onWarning(new PriceParseWarning(raw.price));

  const { make, model } = splitTitle(raw.title);

  return {
    price,
    title: raw.title,
    subtitle: raw.subtitle,
    year: raw.year,
    style: raw.style,
    mileage: raw.mileage,
    engine: raw.engine,
    transmission: raw.transmission,
    fuel: raw.fuel,
    make,
    model,
  };
}

/**
 * Concatenate per-page listings in the order given (pages, then document
 * order within a page) and coerce each into a ListingRecord.
 */
export function aggregate(pages: RawListing[][], options: AggregateOptions = {}): Dataset {
  const onWarning = options.onWarning ?? logWarning;
  return pages.flat().map((raw) => toListingRecord(raw, onWarning));
}
