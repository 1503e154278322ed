// ===== Enums =====
// Closed vocabularies for the spec fields. null means missing/unrecognised.

export enum BodyStyle {
  SALOON = "Saloon",
  HATCHBACK = "Hatchback",
  CONVERTIBLE = "Convertible",
  COUPE = "Coupe",
  ESTATE = "Estate",
  MPV = "MPV",
  SUV = "SUV",
}

export enum Transmission {
  MANUAL = "Manual",
  AUTOMATIC = "Automatic",
}

export enum FuelType {
  DIESEL = "Diesel",
  PETROL = "Petrol",
  ELECTRIC = "Electric",
  DIESEL_HYBRID = "Diesel Hybrid",
  PETROL_HYBRID = "Petrol Hybrid",
  PETROL_PLUG_IN_HYBRID = "Petrol Plug-in Hybrid",
}

// ===== Spec fields (classified from key-spec fragments) =====

export interface ListingSpecs {
  year: number | null;
  style: BodyStyle | null;
  mileage: number | null;
  engine: number | null; // litres
  transmission: Transmission | null;
  fuel: FuelType | null;
}

// ===== Raw Listing (extractor output, price still text) =====

export interface RawListing extends ListingSpecs {
  price: string; // e.g. "£12,450", "Call for price"
  title: string;
  subtitle: string;
}

// ===== Listing Record (one dataset row) =====

export interface ListingRecord extends ListingSpecs {
  price: number | null;
  title: string;
  subtitle: string;
  make: string;
  model: string | null;
}

export type Dataset = ListingRecord[];

// ===== Search =====

export interface SearchQuery {
  make: string;
  model: string;
  postCode: string;
  page?: string | null;
}

export interface ScrapeRequest {
  make: string;
  model: string;
  postCode: string;
  pages?: string[] | null;
}

export interface ScrapeResult {
  dataset: Dataset;
  outputPath: string;
  pageCount: number;
  durationMs: number;
}
