import * as cheerio from "cheerio";
import { RawListing } from "../types";
import { ListingElement, MalformedListingError } from "../errors";
import { classifySpecFragments } from "./classify";

// Search results page layout: result list -> result item -> content block
export const LISTING_SELECTOR = ".search-page__results ul li.search-page__result";
const CONTENT_SELECTOR = ".product-card-content";
const SPEC_SELECTOR = "ul.listing-key-specs li";

const REQUIRED_SELECTORS: Record<Exclude<ListingElement, "content">, string> = {
  price: ".product-card-pricing__price",
  title: ".product-card-details__title",
  subtitle: ".product-card-details__subtitle",
};

/**
 * Extract one RawListing per result item, in document order.
 *
 * Throws MalformedListingError if any item lacks its content block or one of
 * the price/title/subtitle elements; the whole page is rejected in that case.
 */
export function extractListings(html: string): RawListing[] {
  const $ = cheerio.load(html);
  const listings: RawListing[] = [];

  $(LISTING_SELECTOR).each((index, el) => {
    const content = $(el).find(CONTENT_SELECTOR).first();
    if (content.length === 0) {
      throw new MalformedListingError("content", index);
    }

    const requiredText = (element: keyof typeof REQUIRED_SELECTORS): string => {
      const node = content.find(REQUIRED_SELECTORS[element]).first();
      if (node.length === 0) {
        throw new MalformedListingError(element, index);
      }
      return node.text().trim();
    };

    const price = requiredText("price");
    const title = requiredText("title");
    const subtitle = requiredText("subtitle");

    const fragments = content
      .find(SPEC_SELECTOR)
      .map((_, li) => $(li).text().trim())
      .get();

    listings.push({
      price,
      title,
      subtitle,
      ...classifySpecFragments(fragments),
    });
  });

  return listings;
}
