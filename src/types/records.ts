import { ExternalIds } from "../db/schema";

export interface CollectionRecord {
  tmdbId: number;
  name: string;
  posterPath: string | null;
  backdropPath: string | null;
}

export interface CompanyRecord {
  tmdbId: number;
  name: string;
  logoPath: string | null;
  originCountry: string | null;
}

export interface CountryRecord {
  code: string;
  name: string;
}

export interface LanguageRecord {
  code: string;
  englishName: string;
}

/** A dataset record after validation, ready to be written. */
export interface MovieRecord {
  tmdbId: number;
  title: string;
  originalTitle: string | null;
  originalLanguage: string | null;
  adult: boolean;
  status: string | null;
  tagline: string | null;
  overview: string | null;
  releaseDate: string | null;
  runtime: number | null;
  budget: number | null;
  revenue: number | null;
  popularity: number | null;
  voteCount: number | null;
  voteAverage: number | null;
  posterPath: string | null;
  backdropPath: string | null;
  homepage: string | null;
  imdbId: string | null;
  externalIds: ExternalIds;
  originCountry: string[];
  collection: CollectionRecord | null;
  genres: string[];
  companies: CompanyRecord[];
  countries: CountryRecord[];
  languages: LanguageRecord[];
}

export type ConflictPolicy = "skip" | "overwrite";

export interface LoadOptions {
  onConflict?: ConflictPolicy;
}

export interface RecordFailure {
  index: number;
  tmdbId: number | null;
  reason: string;
  sqlState?: string | null;
}

export interface LoadReport {
  processed: number;
  inserted: number;
  skipped: number;
  overwritten: number;
  rejected: RecordFailure[];
  failed: RecordFailure[];
}

export type LoadOutcome = "inserted" | "skipped" | "overwritten";
