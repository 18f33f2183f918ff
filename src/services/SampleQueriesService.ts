import { Inject, Injectable } from "@tsed/di";
import { and, asc, count, desc, eq, gt, gte, isNotNull, sql } from "drizzle-orm";
import * as schema from "../db/schema";
import { SAMPLE_QUERY_DIRECTOR, SAMPLE_QUERY_LIMIT } from "../config";
import { ConfigService } from "./ConfigService";
import { DatabaseService } from "./DatabaseService";

export type QueryRow = Record<string, unknown>;

export interface SampleQueryResult {
    name: string;
    description: string;
    rows: QueryRow[];
}

const { movies, movieGenres, genres } = schema;

const directorName = sql<string | null>`${movies.crew}->0->>'name'`;
const hasDirector = sql`${movies.crew} @> '[{"role":"director"}]'::jsonb`;

function toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

function oneYearBefore(date: Date): Date {
    const earlier = new Date(date.getTime());
    earlier.setUTCFullYear(earlier.getUTCFullYear() - 1);
    return earlier;
}

/**
 * The read-only queries run by the `queries` stage. Each returns plain rows so
 * they can go straight to console.table.
 */
@Injectable()
export class SampleQueriesService {

    @Inject()
    private databaseService!: DatabaseService; // DI handles this using !
    @Inject()
    private configService!: ConfigService;

    async recentReleases(today: Date = new Date()) {
        return this.databaseService.getDb()
            .select({ title: movies.title, releaseDate: movies.releaseDate })
            .from(movies)
            .where(gt(movies.releaseDate, toIsoDate(oneYearBefore(today))))
            .orderBy(desc(movies.releaseDate))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async longestInGenre(genre: string = this.configService.get("targetGenre")) {
        return this.databaseService.getDb()
            .select({ title: movies.title, runtime: movies.runtime })
            .from(movies)
            .innerJoin(movieGenres, eq(movies.id, movieGenres.movieId))
            .innerJoin(genres, eq(genres.id, movieGenres.genreId))
            .where(and(eq(genres.name, genre), isNotNull(movies.runtime)))
            .orderBy(desc(movies.runtime), asc(movies.tmdbId))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async longFilmsWithDirector(minRuntime: number = 150) {
        return this.databaseService.getDb()
            .select({ title: movies.title, runtime: movies.runtime, director: directorName })
            .from(movies)
            .where(and(gt(movies.runtime, minRuntime), hasDirector))
            .orderBy(asc(movies.tmdbId))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async moviesPerDecade() {
        const decade = sql<number>`(extract(year from ${movies.releaseDate})::int / 10) * 10`.mapWith(Number);
        return this.databaseService.getDb()
            .select({ decade, totalMovies: count() })
            .from(movies)
            .where(isNotNull(movies.releaseDate))
            .groupBy(decade)
            .orderBy(decade);
    }

    async longerThanAverage() {
        const averageRuntime = sql`(select avg(${movies.runtime}) from ${movies} where ${movies.runtime} is not null)`;
        return this.databaseService.getDb()
            .select({ title: movies.title, runtime: movies.runtime })
            .from(movies)
            .where(gt(movies.runtime, averageRuntime))
            .orderBy(desc(movies.runtime), asc(movies.tmdbId))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async genreWithDirectors(genre: string = this.configService.get("targetGenre")) {
        return this.databaseService.getDb()
            .select({ title: movies.title, director: directorName })
            .from(movies)
            .innerJoin(movieGenres, eq(movies.id, movieGenres.movieId))
            .innerJoin(genres, eq(genres.id, movieGenres.genreId))
            .where(and(eq(genres.name, genre), hasDirector))
            .orderBy(asc(movies.tmdbId))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async genreByDirector(
        director: string = SAMPLE_QUERY_DIRECTOR,
        genre: string = this.configService.get("targetGenre")
    ) {
        const member = JSON.stringify([{ role: "director", name: director }]);
        return this.databaseService.getDb()
            .select({ title: movies.title, releaseDate: movies.releaseDate })
            .from(movies)
            .innerJoin(movieGenres, eq(movies.id, movieGenres.movieId))
            .innerJoin(genres, eq(genres.id, movieGenres.genreId))
            .where(and(eq(genres.name, genre), sql`${movies.crew} @> ${member}::jsonb`))
            .orderBy(sql`${movies.releaseDate} desc nulls last`, asc(movies.tmdbId))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async genresWithManyFilms(minFilms: number = 10) {
        const movieCount = count(movies.id);
        return this.databaseService.getDb()
            .select({ genre: genres.name, movieCount })
            .from(genres)
            .innerJoin(movieGenres, eq(genres.id, movieGenres.genreId))
            .innerJoin(movies, eq(movies.id, movieGenres.movieId))
            .groupBy(genres.name)
            .having(gt(movieCount, minFilms))
            .orderBy(desc(movieCount), asc(genres.name));
    }

    async prolificGenreDirectors(genre: string = this.configService.get("targetGenre")) {
        const db = this.databaseService.getDb();
        const member = sql`jsonb_array_elements(${movies.crew})`;
        const credits = db
            .select({
                name: sql<string | null>`${member}->>'name'`.as("director_name"),
                role: sql<string | null>`${member}->>'role'`.as("crew_role"),
            })
            .from(movies)
            .innerJoin(movieGenres, eq(movies.id, movieGenres.movieId))
            .innerJoin(genres, eq(genres.id, movieGenres.genreId))
            .where(and(eq(genres.name, genre), hasDirector))
            .as("credits");

        const films = count();
        return db
            .select({ director: credits.name, films })
            .from(credits)
            .where(and(isNotNull(credits.name), eq(credits.role, "director")))
            .groupBy(credits.name)
            .having(gt(films, 1))
            .orderBy(desc(films), asc(credits.name))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async averageRuntimeByGenre(since: string = "2000-01-01") {
        const averageRuntime = sql<number>`avg(${movies.runtime})`.mapWith(Number);
        return this.databaseService.getDb()
            .select({ genre: genres.name, averageRuntime })
            .from(genres)
            .innerJoin(movieGenres, eq(genres.id, movieGenres.genreId))
            .innerJoin(movies, eq(movies.id, movieGenres.movieId))
            .where(and(gte(movies.releaseDate, since), isNotNull(movies.runtime)))
            .groupBy(genres.name)
            .orderBy(desc(averageRuntime), asc(genres.name))
            .limit(10);
    }

    async acclaimedBigBudget(minVoteAverage: number = 7.5, minBudget: number = 1_000_000) {
        const voteAverage = sql<number | null>`${movies.voteAverage}`.mapWith(Number);
        return this.databaseService.getDb()
            .select({ title: movies.title, voteAverage, budget: movies.budget })
            .from(movies)
            .where(and(gt(movies.voteAverage, String(minVoteAverage)), gt(movies.budget, minBudget)))
            .orderBy(desc(movies.voteAverage), desc(movies.budget))
            .limit(SAMPLE_QUERY_LIMIT);
    }

    async runAll(today: Date = new Date()): Promise<SampleQueryResult[]> {
        const genre = this.configService.get("targetGenre");
        const queries: [string, string, () => Promise<QueryRow[]>][] = [
            ["recentReleases", "Movies released within the last year, newest first", () => this.recentReleases(today)],
            ["longestInGenre", `Longest ${genre} movies`, () => this.longestInGenre(genre)],
            ["longFilmsWithDirector", "Movies over 150 minutes with their director", () => this.longFilmsWithDirector()],
            ["moviesPerDecade", "Number of movies per decade", () => this.moviesPerDecade()],
            ["longerThanAverage", "Movies longer than the average runtime", () => this.longerThanAverage()],
            ["genreWithDirectors", `${genre} movies with their director`, () => this.genreWithDirectors(genre)],
            [
                "genreByDirector",
                `${genre} movies directed by ${SAMPLE_QUERY_DIRECTOR}, newest first`,
                () => this.genreByDirector(SAMPLE_QUERY_DIRECTOR, genre),
            ],
            ["genresWithManyFilms", "Genres with more than 10 movies", () => this.genresWithManyFilms()],
            ["prolificGenreDirectors", `Directors of more than one ${genre} movie`, () => this.prolificGenreDirectors(genre)],
            ["averageRuntimeByGenre", "Average runtime per genre for movies released since 2000", () => this.averageRuntimeByGenre()],
            ["acclaimedBigBudget", "Movies rated above 7.5 with a budget over $1,000,000", () => this.acclaimedBigBudget()],
        ];

        const results: SampleQueryResult[] = [];
        for (const [name, description, run] of queries) {
            results.push({ name, description, rows: await run() });
        }
        return results;
    }
}
