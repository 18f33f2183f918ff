import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { eq, sql } from "drizzle-orm";
import * as schema from "../db/schema";
import { ConstraintViolationError, RecordValidationError, describeError, getSqlState } from "../errors";
import {
  CollectionRecord,
  CompanyRecord,
  ConflictPolicy,
  CountryRecord,
  LanguageRecord,
  LoadOptions,
  LoadOutcome,
  LoadReport,
  MovieRecord,
} from "../types/records";
import { CatalogDatabase, DatabaseService } from "./DatabaseService";
import { ValidationService } from "./ValidationService";

// SQLSTATE classes that end the whole batch: 08 connection exception,
// 53 insufficient resources, 57 operator intervention, 58 system error.
const FATAL_SQLSTATE = /^(08|53|57|58)/;

function toNumeric(value: number | null): string | null {
  return value === null ? null : String(value);
}

@Injectable()
export class CatalogLoaderService {

    @Inject()
    private databaseService!: DatabaseService; // DI handles this using !
    @Inject()
    private validationService!: ValidationService;

    /**
     * Loads a batch of raw dataset records, one transaction per record.
     * Invalid records and records the database refuses are reported and skipped;
     * re-running the same batch changes nothing.
     */
    async loadMovies(records: readonly unknown[], options: LoadOptions = {}): Promise<LoadReport> {
        const policy: ConflictPolicy = options.onConflict ?? "skip";
        const report: LoadReport = {
            processed: 0,
            inserted: 0,
            skipped: 0,
            overwritten: 0,
            rejected: [],
            failed: [],
        };

        for (const [index, raw] of records.entries()) {
            report.processed++;

            const validation = this.validationService.validateMovieRecord(raw);
            if (!validation.valid || !validation.data) {
                const error = new RecordValidationError(validation.tmdbId, validation.errors);
                $log.warn(`Record #${index} rejected: ${error.message}`);
                report.rejected.push({ index, tmdbId: validation.tmdbId, reason: error.message });
                continue;
            }

            for (const warning of validation.warnings) {
                $log.debug(`Movie ${validation.data.tmdbId}: ${warning}`);
            }

            try {
                const outcome = await this.loadMovie(validation.data, policy);
                report[outcome]++;
            } catch (error) {
                if (!(error instanceof ConstraintViolationError)) throw error;

                $log.error(`Record #${index} failed: ${error.message}`);
                report.failed.push({
                    index,
                    tmdbId: error.tmdbId,
                    reason: error.message,
                    sqlState: error.sqlState,
                });
            }
        }

        $log.info(
            `Processed ${report.processed} records: ${report.inserted} inserted, ${report.skipped} skipped, ` +
            `${report.overwritten} overwritten, ${report.rejected.length} rejected, ${report.failed.length} failed`
        );
        return report;
    }

    /**
     * Writes one validated record: dimensions, then the movie row, then its links.
     * All of it commits or none of it does.
     */
    async loadMovie(record: MovieRecord, policy: ConflictPolicy = "skip"): Promise<LoadOutcome> {
        const db = this.databaseService.getDb();

        try {
            return await db.transaction(async (tx) => {
                const genreIds: number[] = [];
                for (const name of record.genres) {
                    genreIds.push(await this.resolveGenre(tx, name));
                }

                const collectionId = record.collection
                    ? await this.resolveCollection(tx, record.collection)
                    : null;

                const companyIds: number[] = [];
                for (const company of record.companies) {
                    companyIds.push(await this.resolveCompany(tx, company));
                }

                const countryCodes: string[] = [];
                for (const country of record.countries) {
                    countryCodes.push(await this.resolveCountry(tx, country));
                }

                const languageCodes: string[] = [];
                for (const language of record.languages) {
                    languageCodes.push(await this.resolveLanguage(tx, language));
                }

                const { movieId, outcome } = await this.upsertMovie(tx, record, collectionId, policy);

                if (outcome === "overwritten") {
                    await this.unlinkMovie(tx, movieId);
                }

                if (genreIds.length) {
                    await tx.insert(schema.movieGenres)
                        .values(genreIds.map((genreId) => ({ movieId, genreId })))
                        .onConflictDoNothing();
                }
                if (companyIds.length) {
                    await tx.insert(schema.movieProdCompanies)
                        .values(companyIds.map((companyId) => ({ movieId, companyId })))
                        .onConflictDoNothing();
                }
                if (countryCodes.length) {
                    await tx.insert(schema.movieProdCountries)
                        .values(countryCodes.map((iso31661) => ({ movieId, iso31661 })))
                        .onConflictDoNothing();
                }
                if (languageCodes.length) {
                    await tx.insert(schema.movieSpokenLanguages)
                        .values(languageCodes.map((iso6391) => ({ movieId, iso6391 })))
                        .onConflictDoNothing();
                }

                return outcome;
            });
        } catch (error) {
            const sqlState = getSqlState(error);
            if (sqlState && !FATAL_SQLSTATE.test(sqlState)) {
                throw new ConstraintViolationError(record.tmdbId, sqlState, error);
            }
            $log.error(`Movie ${record.tmdbId}: ${describeError(error)}`);
            throw error;
        }
    }

    // Find-or-create by natural key. The no-op DO UPDATE makes RETURNING yield
    // the existing row's id on conflict, so one statement covers both cases.

    async resolveGenre(db: CatalogDatabase, name: string): Promise<number> {
        const [row] = await db.insert(schema.genres)
            .values({ name })
            .onConflictDoUpdate({ target: schema.genres.name, set: { name: sql`excluded.name` } })
            .returning({ id: schema.genres.id });
        return row.id;
    }

    async resolveCollection(db: CatalogDatabase, collection: CollectionRecord): Promise<number> {
        const [row] = await db.insert(schema.collections)
            .values(collection)
            .onConflictDoUpdate({ target: schema.collections.tmdbId, set: { tmdbId: sql`excluded.tmdb_id` } })
            .returning({ id: schema.collections.id });
        return row.id;
    }

    async resolveCompany(db: CatalogDatabase, company: CompanyRecord): Promise<number> {
        const [row] = await db.insert(schema.productionCompanies)
            .values(company)
            .onConflictDoUpdate({ target: schema.productionCompanies.tmdbId, set: { tmdbId: sql`excluded.tmdb_id` } })
            .returning({ id: schema.productionCompanies.id });
        return row.id;
    }

    async resolveCountry(db: CatalogDatabase, country: CountryRecord): Promise<string> {
        await db.insert(schema.productionCountries)
            .values({ iso31661: country.code, name: country.name })
            .onConflictDoNothing({ target: schema.productionCountries.iso31661 });
        return country.code;
    }

    async resolveLanguage(db: CatalogDatabase, language: LanguageRecord): Promise<string> {
        await db.insert(schema.spokenLanguages)
            .values({ iso6391: language.code, englishName: language.englishName })
            .onConflictDoNothing({ target: schema.spokenLanguages.iso6391 });
        return language.code;
    }

    private async upsertMovie(
        db: CatalogDatabase,
        record: MovieRecord,
        collectionId: number | null,
        policy: ConflictPolicy
    ): Promise<{ movieId: number; outcome: LoadOutcome }> {
        // dataset-owned columns; crew and external_ids after the first insert belong to enrichment
        const datasetColumns = {
            title: record.title,
            originalTitle: record.originalTitle,
            originalLanguage: record.originalLanguage,
            adult: record.adult,
            status: record.status,
            tagline: record.tagline,
            overview: record.overview,
            releaseDate: record.releaseDate,
            runtime: record.runtime,
            budget: record.budget,
            revenue: record.revenue,
            popularity: toNumeric(record.popularity),
            voteCount: record.voteCount,
            voteAverage: toNumeric(record.voteAverage),
            posterPath: record.posterPath,
            backdropPath: record.backdropPath,
            homepage: record.homepage,
            imdbId: record.imdbId,
            originCountry: record.originCountry,
            collectionId,
        };
        const values: schema.NewMovie = {
            ...datasetColumns,
            tmdbId: record.tmdbId,
            externalIds: record.externalIds,
            crew: [],
        };

        if (policy === "overwrite") {
            const [row] = await db.insert(schema.movies)
                .values(values)
                .onConflictDoUpdate({ target: schema.movies.tmdbId, set: datasetColumns })
                .returning({ id: schema.movies.id, inserted: sql<boolean>`(xmax = 0)` });
            return { movieId: row.id, outcome: row.inserted ? "inserted" : "overwritten" };
        }

        const inserted = await db.insert(schema.movies)
            .values(values)
            .onConflictDoNothing({ target: schema.movies.tmdbId })
            .returning({ id: schema.movies.id });
        if (inserted.length) {
            return { movieId: inserted[0].id, outcome: "inserted" };
        }

        const [existing] = await db
            .select({ id: schema.movies.id })
            .from(schema.movies)
            .where(eq(schema.movies.tmdbId, record.tmdbId));
        return { movieId: existing.id, outcome: "skipped" };
    }

    private async unlinkMovie(db: CatalogDatabase, movieId: number): Promise<void> {
        await db.delete(schema.movieGenres).where(eq(schema.movieGenres.movieId, movieId));
        await db.delete(schema.movieProdCompanies).where(eq(schema.movieProdCompanies.movieId, movieId));
        await db.delete(schema.movieProdCountries).where(eq(schema.movieProdCountries.movieId, movieId));
        await db.delete(schema.movieSpokenLanguages).where(eq(schema.movieSpokenLanguages.movieId, movieId));
    }
}
