import { BodyStyle, FuelType, ListingSpecs, Transmission } from "../types";

// ===== Vocabulary Maps =====
// Lowercased page text -> canonical enum value

export const STYLE_MAP: Record<string, BodyStyle> = {
  saloon: BodyStyle.SALOON,
  hatchback: BodyStyle.HATCHBACK,
  convertible: BodyStyle.CONVERTIBLE,
  coupe: BodyStyle.COUPE,
  estate: BodyStyle.ESTATE,
  mpv: BodyStyle.MPV,
  suv: BodyStyle.SUV,
};

export const TRANSMISSION_MAP: Record<string, Transmission> = {
  manual: Transmission.MANUAL,
  automatic: Transmission.AUTOMATIC,
};

export const FUEL_MAP: Record<string, FuelType> = {
  diesel: FuelType.DIESEL,
  petrol: FuelType.PETROL,
  electric: FuelType.ELECTRIC,
  "diesel hybrid": FuelType.DIESEL_HYBRID,
  "petrol hybrid": FuelType.PETROL_HYBRID,
  "petrol plug-in hybrid": FuelType.PETROL_PLUG_IN_HYBRID,
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Start-anchored, case-insensitive alternation over a vocabulary, longest
 * term first so "Petrol Plug-in Hybrid" is never cut short at "Petrol".
 */
function vocabularyPattern(terms: string[]): RegExp {
  const alternatives = [...terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp(`^(${alternatives.join("|")})`, "i");
}

// ===== Fragment Patterns =====
// All anchored at the start of the fragment.

const YEAR_RE = /^(\d{4})\s\(/; // "2019 (19 reg)"
const STYLE_RE = vocabularyPattern(Object.keys(STYLE_MAP));
const MILEAGE_RE = /^(\d{1,3}(?:,\d{3})+|\d+)\s+miles/i; // "45,120 miles"
const ENGINE_RE = /^(\d+(?:\.\d+)?)L/; // "1.6L"
const TRANSMISSION_RE = vocabularyPattern(Object.keys(TRANSMISSION_MAP));
const FUEL_RE = vocabularyPattern(Object.keys(FUEL_MAP));

export function matchYear(fragment: string): number | null {
  const m = fragment.match(YEAR_RE);
  return m ? parseInt(m[1], 10) : null;
}

export function matchStyle(fragment: string): BodyStyle | null {
  const m = fragment.match(STYLE_RE);
  return m ? STYLE_MAP[m[1].toLowerCase()] ?? null : null;
}

export function matchMileage(fragment: string): number | null {
  const m = fragment.match(MILEAGE_RE);
  return m ? parseInt(m[1].replace(/,/g, ""), 10) : null;
}

export function matchEngine(fragment: string): number | null {
  const m = fragment.match(ENGINE_RE);
  return m ? parseFloat(m[1]) : null;
}

export function matchTransmission(fragment: string): Transmission | null {
  const m = fragment.match(TRANSMISSION_RE);
  return m ? TRANSMISSION_MAP[m[1].toLowerCase()] ?? null : null;
}

export function matchFuel(fragment: string): FuelType | null {
  const m = fragment.match(FUEL_RE);
  return m ? FUEL_MAP[m[1].toLowerCase()] ?? null : null;
}

export function emptySpecs(): ListingSpecs {
  return {
    year: null,
    style: null,
    mileage: null,
    engine: null,
    transmission: null,
    fuel: null,
  };
}

/**
 * Fields one key-spec fragment yields. A fragment can match more than one
 * classifier; fields it does not match are absent from the result.
 */
export function classifySpecFragment(fragment: string): Partial<ListingSpecs> {
  const text = fragment.trim();
  const result: Partial<ListingSpecs> = {};

  const year = matchYear(text);
  if (year !== null) result.year = year;

  const style = matchStyle(text);
  if (style !== null) result.style = style;

  const mileage = matchMileage(text);
  if (mileage !== null) result.mileage = mileage;

  const engine = matchEngine(text);
  if (engine !== null) result.engine = engine;

  const transmission = matchTransmission(text);
  if (transmission !== null) result.transmission = transmission;

  const fuel = matchFuel(text);
  if (fuel !== null) result.fuel = fuel;

  return result;
}

/**
 * Fold fragments in document order. Every match overwrites the field, so a
 * repeated fragment type resolves to its last occurrence.
 */
export function classifySpecFragments(fragments: string[]): ListingSpecs {
  const specs = emptySpecs();
  for (const fragment of fragments) {
    Object.assign(specs, classifySpecFragment(fragment));
  }
  return specs;
}
