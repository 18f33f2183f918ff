import { Inject, Injectable } from "@tsed/di";
import { and, arrayContains, asc, desc, eq, gte, ilike, isNotNull, lte, or, sql, SQL } from "drizzle-orm";
import * as schema from "../db/schema";
import { CrewMember, ExternalIds } from "../db/schema";
import { DatabaseService } from "./DatabaseService";

export interface MovieSummary {
    tmdbId: number;
    title: string;
    releaseDate: string | null;
    runtime: number | null;
    popularity: number | null;
    voteAverage: number | null;
    voteCount: number | null;
    originCountry: string[];
    crew: CrewMember[];
    externalIds: ExternalIds;
}

export interface MovieDetail extends MovieSummary {
    originalTitle: string | null;
    originalLanguage: string | null;
    overview: string | null;
    tagline: string | null;
    status: string | null;
    budget: number | null;
    revenue: number | null;
    imdbId: string | null;
    collection: { tmdbId: number; name: string } | null;
    genres: string[];
    companies: { tmdbId: number; name: string }[];
    countries: string[];
    languages: string[];
}

export interface CompanyMatch {
    tmdbId: number;
    name: string;
    originCountry: string | null;
    similarity: number;
}

const summaryColumns = {
    tmdbId: schema.movies.tmdbId,
    title: schema.movies.title,
    releaseDate: schema.movies.releaseDate,
    runtime: schema.movies.runtime,
    popularity: schema.movies.popularity,
    voteAverage: schema.movies.voteAverage,
    voteCount: schema.movies.voteCount,
    originCountry: schema.movies.originCountry,
    crew: schema.movies.crew,
    externalIds: schema.movies.externalIds,
};

type SummaryRow = {
    tmdbId: number;
    title: string;
    releaseDate: string | null;
    runtime: number | null;
    popularity: string | null;
    voteAverage: string | null;
    voteCount: number | null;
    originCountry: string[] | null;
    crew: CrewMember[] | null;
    externalIds: ExternalIds | null;
};

// numeric columns come back from the driver as strings
export function fromNumeric(value: string | null): number | null {
    return value === null ? null : Number(value);
}

export function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, "\\$&");
}

function toSummary(row: SummaryRow): MovieSummary {
    return {
        tmdbId: row.tmdbId,
        title: row.title,
        releaseDate: row.releaseDate,
        runtime: row.runtime,
        popularity: fromNumeric(row.popularity),
        voteAverage: fromNumeric(row.voteAverage),
        voteCount: row.voteCount,
        originCountry: row.originCountry ?? [],
        crew: row.crew ?? [],
        externalIds: row.externalIds ?? {},
    };
}

@Injectable()
export class MoviesService {

    @Inject()
    private databaseService!: DatabaseService; // DI handles this using !

    async findReleasedBetween(from: string | null, to: string | null, limit: number = 50): Promise<MovieSummary[]> {
        const conditions: SQL[] = [isNotNull(schema.movies.releaseDate)];
        if (from) conditions.push(gte(schema.movies.releaseDate, from));
        if (to) conditions.push(lte(schema.movies.releaseDate, to));

        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(and(...conditions))
            .orderBy(desc(schema.movies.releaseDate), asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    async topByPopularity(limit: number = 20): Promise<MovieSummary[]> {
        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(isNotNull(schema.movies.popularity))
            .orderBy(desc(schema.movies.popularity), asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    async topByVoteAverage(limit: number = 20, minVoteCount: number = 0): Promise<MovieSummary[]> {
        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(and(
                isNotNull(schema.movies.voteAverage),
                gte(schema.movies.voteCount, minVoteCount)
            ))
            .orderBy(desc(schema.movies.voteAverage), asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    /** Movies whose crew list contains an entry matching every given field. */
    async findByCrewMember(member: Partial<CrewMember>, limit: number = 50): Promise<MovieSummary[]> {
        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(sql`${schema.movies.crew} @> ${JSON.stringify([member])}::jsonb`)
            .orderBy(asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    async findByExternalIds(ids: ExternalIds, limit: number = 50): Promise<MovieSummary[]> {
        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(sql`${schema.movies.externalIds} @> ${JSON.stringify(ids)}::jsonb`)
            .orderBy(asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    /** Movies whose origin countries include all of `codes`. */
    async findByOriginCountry(codes: string[], limit: number = 50): Promise<MovieSummary[]> {
        if (codes.length === 0) return [];

        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .where(arrayContains(schema.movies.originCountry, codes.map((code) => code.toUpperCase())))
            .orderBy(asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    /** Trigram match or substring match on company name, closest first. */
    async searchCompanies(query: string, limit: number = 20): Promise<CompanyMatch[]> {
        const term = query.trim();
        if (!term) return [];

        const similarity = sql<number>`similarity(${schema.productionCompanies.name}, ${term})`.mapWith(Number);
        return this.databaseService.getDb()
            .select({
                tmdbId: schema.productionCompanies.tmdbId,
                name: schema.productionCompanies.name,
                originCountry: schema.productionCompanies.originCountry,
                similarity,
            })
            .from(schema.productionCompanies)
            .where(or(
                sql`${schema.productionCompanies.name} % ${term}`,
                ilike(schema.productionCompanies.name, `%${escapeLike(term)}%`)
            ))
            .orderBy(desc(similarity), asc(schema.productionCompanies.tmdbId))
            .limit(limit);
    }

    async findGenre(name: string): Promise<schema.Genre | null> {
        const [genre] = await this.databaseService.getDb()
            .select()
            .from(schema.genres)
            .where(eq(schema.genres.name, name));
        return genre ?? null;
    }

    async searchGenres(prefix: string): Promise<schema.Genre[]> {
        return this.databaseService.getDb()
            .select()
            .from(schema.genres)
            .where(ilike(schema.genres.name, `${escapeLike(prefix.trim())}%`))
            .orderBy(asc(schema.genres.name));
    }

    async findMoviesByGenre(name: string, limit: number = 50): Promise<MovieSummary[]> {
        const rows = await this.databaseService.getDb()
            .select(summaryColumns)
            .from(schema.movies)
            .innerJoin(schema.movieGenres, eq(schema.movies.id, schema.movieGenres.movieId))
            .innerJoin(schema.genres, eq(schema.genres.id, schema.movieGenres.genreId))
            .where(eq(schema.genres.name, name))
            .orderBy(asc(schema.movies.tmdbId))
            .limit(limit);
        return rows.map(toSummary);
    }

    async listTmdbIdsByGenre(name: string): Promise<number[]> {
        const rows = await this.databaseService.getDb()
            .select({ tmdbId: schema.movies.tmdbId })
            .from(schema.movies)
            .innerJoin(schema.movieGenres, eq(schema.movies.id, schema.movieGenres.movieId))
            .innerJoin(schema.genres, eq(schema.genres.id, schema.movieGenres.genreId))
            .where(eq(schema.genres.name, name))
            .orderBy(asc(schema.movies.id));
        return rows.map((r) => r.tmdbId);
    }

    async getMovieDetail(tmdbId: number): Promise<MovieDetail | null> {
        const db = this.databaseService.getDb();
        const [movie] = await db
            .select({
                ...summaryColumns,
                id: schema.movies.id,
                originalTitle: schema.movies.originalTitle,
                originalLanguage: schema.movies.originalLanguage,
                overview: schema.movies.overview,
                tagline: schema.movies.tagline,
                status: schema.movies.status,
                budget: schema.movies.budget,
                revenue: schema.movies.revenue,
                imdbId: schema.movies.imdbId,
                collectionTmdbId: schema.collections.tmdbId,
                collectionName: schema.collections.name,
            })
            .from(schema.movies)
            .leftJoin(schema.collections, eq(schema.movies.collectionId, schema.collections.id))
            .where(eq(schema.movies.tmdbId, tmdbId));

        if (!movie) {
            return null;
        }

        const genres = await db
            .select({ name: schema.genres.name })
            .from(schema.movieGenres)
            .innerJoin(schema.genres, eq(schema.genres.id, schema.movieGenres.genreId))
            .where(eq(schema.movieGenres.movieId, movie.id))
            .orderBy(asc(schema.genres.name));

        const companies = await db
            .select({ tmdbId: schema.productionCompanies.tmdbId, name: schema.productionCompanies.name })
            .from(schema.movieProdCompanies)
            .innerJoin(schema.productionCompanies, eq(schema.productionCompanies.id, schema.movieProdCompanies.companyId))
            .where(eq(schema.movieProdCompanies.movieId, movie.id))
            .orderBy(asc(schema.productionCompanies.tmdbId));

        const countries = await db
            .select({ code: schema.movieProdCountries.iso31661 })
            .from(schema.movieProdCountries)
            .where(eq(schema.movieProdCountries.movieId, movie.id))
            .orderBy(asc(schema.movieProdCountries.iso31661));

        const languages = await db
            .select({ code: schema.movieSpokenLanguages.iso6391 })
            .from(schema.movieSpokenLanguages)
            .where(eq(schema.movieSpokenLanguages.movieId, movie.id))
            .orderBy(asc(schema.movieSpokenLanguages.iso6391));

        return {
            ...toSummary(movie),
            originalTitle: movie.originalTitle,
            originalLanguage: movie.originalLanguage,
            overview: movie.overview,
            tagline: movie.tagline,
            status: movie.status,
            budget: movie.budget,
            revenue: movie.revenue,
            imdbId: movie.imdbId,
            collection: movie.collectionTmdbId !== null && movie.collectionName !== null
                ? { tmdbId: movie.collectionTmdbId, name: movie.collectionName }
                : null,
            genres: genres.map((g) => g.name),
            companies,
            countries: countries.map((c) => c.code),
            languages: languages.map((l) => l.code),
        };
    }
}
