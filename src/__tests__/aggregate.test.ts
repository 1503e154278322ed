import { describe, it, expect, vi } from "vitest";
import { aggregate, splitTitle, toListingRecord } from "../lib/listings/aggregate";
import { parsePrice } from "../lib/scraping/utils";
import { PriceParseWarning } from "../lib/errors";
import { FuelType, RawListing, Transmission } from "../lib/types";

function makeRaw(overrides: Partial<RawListing> = {}): RawListing {
  return {
    price: "£12,450",
    title: "Ford Fiesta ST-Line",
    subtitle: "1.0 EcoBoost 125 ST-Line 5dr",
    year: 2019,
    style: null,
    mileage: 23500,
    engine: 1,
    transmission: Transmission.MANUAL,
    fuel: FuelType.PETROL,
    ...overrides,
  };
}

describe("parsePrice", () => {
  it("strips the currency symbol and thousands separators", () => {
    expect(parsePrice("£12,450")).toBe(12450);
    expect(parsePrice("£1,234,567")).toBe(1234567);
  });

  it("accepts plain and decimal numbers", () => {
    expect(parsePrice("995")).toBe(995);
    expect(parsePrice("£7,499.50")).toBe(7499.5);
  });

  it("returns null for text that is not a number", () => {
    expect(parsePrice("Call for price")).toBeNull();
    expect(parsePrice("£12,450 + VAT")).toBeNull();
    expect(parsePrice("")).toBeNull();
  });

  it("does not join separate numbers into one price", () => {
    expect(parsePrice("£9,995 £10,495")).toBeNull();
    expect(parsePrice("12 450")).toBeNull();
  });

  it("only strips a leading currency symbol", () => {
    expect(parsePrice("12,450£")).toBeNull();
    expect(parsePrice("  £12,450  ")).toBe(12450);
  });
});

describe("splitTitle", () => {
  it("splits on the first whitespace run", () => {
    expect(splitTitle("Ford Fiesta ST-Line")).toEqual({ make: "Ford", model: "Fiesta ST-Line" });
    expect(splitTitle("Land   Rover Defender")).toEqual({ make: "Land", model: "Rover Defender" });
  });

  it("leaves model null for a single-word title", () => {
    expect(splitTitle("Ford")).toEqual({ make: "Ford", model: null });
  });
});

describe("toListingRecord", () => {
  it("coerces price and derives make and model", () => {
    expect(toListingRecord(makeRaw())).toEqual({
      price: 12450,
      title: "Ford Fiesta ST-Line",
      subtitle: "1.0 EcoBoost 125 ST-Line 5dr",
      year: 2019,
      style: null,
      mileage: 23500,
      engine: 1,
      transmission: Transmission.MANUAL,
      fuel: FuelType.PETROL,
      make: "Ford",
      model: "Fiesta ST-Line",
    });
  });

  it("reports a PriceParseWarning and records a missing price", () => {
    const onWarning = vi.fn();
    const record = toListingRecord(makeRaw({ price: "Call for price" }), onWarning);

    expect(record.price).toBeNull();
    expect(onWarning).toHaveBeenCalledTimes(1);
    const warning = onWarning.mock.calls[0][0];
    expect(warning).toBeInstanceOf(PriceParseWarning);
    expect(warning.raw).toBe("Call for price");
  });

  it("logs the warning when no handler is given", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    toListingRecord(makeRaw({ price: "POA" }));
    expect(warnSpy).toHaveBeenCalledWith('[aggregate] Could not parse price "POA", recording as missing');
    warnSpy.mockRestore();
  });
});

describe("aggregate", () => {
  it("returns an empty dataset for no pages", () => {
    expect(aggregate([])).toEqual([]);
    expect(aggregate([[], []])).toEqual([]);
  });

  it("preserves the caller's page order, then document order", () => {
    const page1 = [makeRaw({ title: "Ford Fiesta" }), makeRaw({ title: "Ford Focus" })];
    const page2 = [makeRaw({ title: "Ford Puma" }), makeRaw({ title: "Ford Kuga" })];

    const dataset = aggregate([page2, page1]);
    expect(dataset.map((r) => r.title)).toEqual(["Ford Puma", "Ford Kuga", "Ford Fiesta", "Ford Focus"]);
  });

  it("keeps going past unparseable prices", () => {
    const onWarning = vi.fn();
    const dataset = aggregate(
      [[makeRaw({ price: "Call for price" }), makeRaw({ price: "£8,000" })]],
      { onWarning }
    );

    expect(dataset.map((r) => r.price)).toEqual([null, 8000]);
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it("records a was/now price pair as missing", () => {
    const onWarning = vi.fn();
    const [record] = aggregate([[makeRaw({ price: "£9,995 £10,495" })]], { onWarning });

    expect(record.price).toBeNull();
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it("produces identical output for identical input", () => {
    const pages = [[makeRaw(), makeRaw({ title: "Ford" })]];
    expect(aggregate(pages)).toEqual(aggregate(pages));
  });
});
