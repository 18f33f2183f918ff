import { Injectable } from "@tsed/di";
import { ExternalIds } from "../db/schema";
import {
  CollectionRecord,
  CompanyRecord,
  CountryRecord,
  LanguageRecord,
  MovieRecord,
} from "../types/records";

export interface MovieRecordValidationResult {
    valid: boolean;
    tmdbId: number | null;
    data?: MovieRecord;
    errors: string[];
    // problems that dropped a value or a sub-record but kept the movie
    warnings: string[];
}

type RawObject = Record<string, unknown>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// rejects calendar-impossible days such as 1959-02-30, which Date.parse rolls over
function isCalendarDate(value: string): boolean {
    if (!ISO_DATE.test(value)) return false;
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function isObject(value: unknown): value is RawObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | null {
    if (typeof value !== "string") return null;
    const trimmed = value.trim();
    return trimmed.length ? trimmed : null;
}

function positiveInteger(value: unknown): number | null {
    const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    return typeof parsed === "number" && Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function arrayOf(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

@Injectable()
export class ValidationService {

    validateMovieRecord(raw: unknown): MovieRecordValidationResult {
        const errors: string[] = [];
        const warnings: string[] = [];

        if (!isObject(raw)) {
            return { valid: false, tmdbId: null, errors: ["record is not an object"], warnings };
        }

        const tmdbId = positiveInteger(raw.id);
        if (tmdbId === null) {
            errors.push("id must be a positive integer");
        }

        const title = optionalText(raw.title);
        if (!title) {
            errors.push("title is required");
        }

        if (tmdbId === null || !title) {
            return { valid: false, tmdbId, errors, warnings };
        }

        const numeric = (key: string, integer: boolean): number | null => {
            const value = raw[key];
            // absent metrics count as zero, explicit nulls stay null
            if (value === undefined) return 0;
            if (value === null || value === "") return null;
            const parsed = typeof value === "number" ? value : Number(value);
            if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
                warnings.push(`${key} is not a valid number`);
                return null;
            }
            return parsed;
        };

        let releaseDate = optionalText(raw.release_date);
        if (releaseDate && !isCalendarDate(releaseDate)) {
            warnings.push(`release_date "${releaseDate}" is not a date`);
            releaseDate = null;
        }

        let runtime: number | null = null;
        if (raw.runtime !== undefined && raw.runtime !== null) {
            runtime = numeric("runtime", true);
        }

        const countries = this.readCountries(raw.production_countries, warnings);
        const rawOrigin = arrayOf(raw.origin_country)
            .map(optionalText)
            .filter((code): code is string => code !== null)
            .map((code) => code.toUpperCase());

        return {
            valid: true,
            tmdbId,
            errors,
            warnings,
            data: {
                tmdbId,
                title,
                originalTitle: optionalText(raw.original_title),
                originalLanguage: optionalText(raw.original_language),
                adult: raw.adult === true,
                status: optionalText(raw.status),
                tagline: optionalText(raw.tagline),
                overview: optionalText(raw.overview),
                releaseDate,
                runtime,
                budget: numeric("budget", true),
                revenue: numeric("revenue", true),
                popularity: numeric("popularity", false),
                voteCount: numeric("vote_count", true),
                voteAverage: numeric("vote_average", false),
                posterPath: optionalText(raw.poster_path),
                backdropPath: optionalText(raw.backdrop_path),
                homepage: optionalText(raw.homepage),
                imdbId: optionalText(raw.imdb_id),
                externalIds: this.readExternalIds(raw.external_ids),
                // the dump has no origin_country of its own for most records; production countries stand in
                originCountry: rawOrigin.length ? unique(rawOrigin) : unique(countries.map((c) => c.code)),
                collection: this.readCollection(raw.belongs_to_collection, warnings),
                genres: this.readGenres(raw.genres, warnings),
                companies: this.readCompanies(raw.production_companies, warnings),
                countries,
                languages: this.readLanguages(raw.spoken_languages, warnings),
            },
        };
    }

    private readGenres(value: unknown, warnings: string[]): string[] {
        const names: string[] = [];
        for (const entry of arrayOf(value)) {
            const name = isObject(entry) ? optionalText(entry.name) : optionalText(entry);
            if (!name) {
                warnings.push("genre without a name dropped");
                continue;
            }
            names.push(name);
        }
        return unique(names);
    }

    private readCollection(value: unknown, warnings: string[]): CollectionRecord | null {
        if (value === null || value === undefined) return null;
        if (!isObject(value)) {
            warnings.push("belongs_to_collection is not an object");
            return null;
        }

        const tmdbId = positiveInteger(value.id);
        const name = optionalText(value.name);
        if (tmdbId === null || !name) {
            warnings.push("collection without id or name dropped");
            return null;
        }

        return {
            tmdbId,
            name,
            posterPath: optionalText(value.poster_path),
            backdropPath: optionalText(value.backdrop_path),
        };
    }

    private readCompanies(value: unknown, warnings: string[]): CompanyRecord[] {
        const companies = new Map<number, CompanyRecord>();
        for (const entry of arrayOf(value)) {
            const tmdbId = isObject(entry) ? positiveInteger(entry.id) : null;
            const name = isObject(entry) ? optionalText(entry.name) : null;
            if (!isObject(entry) || tmdbId === null || !name) {
                warnings.push("production company without id or name dropped");
                continue;
            }
            if (!companies.has(tmdbId)) {
                companies.set(tmdbId, {
                    tmdbId,
                    name,
                    logoPath: optionalText(entry.logo_path),
                    originCountry: optionalText(entry.origin_country)?.toUpperCase() ?? null,
                });
            }
        }
        return [...companies.values()];
    }

    private readCountries(value: unknown, warnings: string[]): CountryRecord[] {
        const countries = new Map<string, CountryRecord>();
        for (const entry of arrayOf(value)) {
            const code = isObject(entry) ? optionalText(entry.iso_3166_1)?.toUpperCase() : null;
            const name = isObject(entry) ? optionalText(entry.name) : null;
            if (!code || !name) {
                warnings.push("production country without code or name dropped");
                continue;
            }
            if (!countries.has(code)) countries.set(code, { code, name });
        }
        return [...countries.values()];
    }

    private readLanguages(value: unknown, warnings: string[]): LanguageRecord[] {
        const languages = new Map<string, LanguageRecord>();
        for (const entry of arrayOf(value)) {
            const code = isObject(entry) ? optionalText(entry.iso_639_1)?.toLowerCase() : null;
            const englishName = isObject(entry)
                ? optionalText(entry.english_name) ?? optionalText(entry.name)
                : null;
            if (!code || !englishName) {
                warnings.push("spoken language without code or name dropped");
                continue;
            }
            if (!languages.has(code)) languages.set(code, { code, englishName });
        }
        return [...languages.values()];
    }

    private readExternalIds(value: unknown): ExternalIds {
        const ids: ExternalIds = {};
        if (!isObject(value)) return ids;

        for (const [key, id] of Object.entries(value)) {
            if (typeof id === "string") ids[key] = id;
            else if (typeof id === "number") ids[key] = String(id);
            else if (id === null) ids[key] = null;
        }
        return ids;
    }
}

function unique<T>(values: T[]): T[] {
    return [...new Set(values)];
}
