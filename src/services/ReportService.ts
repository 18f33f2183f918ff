import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { stringify } from "csv-stringify/sync";
import { and, asc, eq, isNotNull } from "drizzle-orm";
import * as schema from "../db/schema";
import { TOP_POPULAR_REPORT_SIZE } from "../config";
import { CorrelationResult, formatSignificant, mean, pearson } from "../utils/stats";
import { WordCount, countWords, slugify, tokenize } from "../utils/text";
import { ConfigService } from "./ConfigService";
import { DatabaseService } from "./DatabaseService";
import { fromNumeric } from "./MoviesService";

export interface YearCount {
    year: number;
    count: number;
}

export interface YearPopularity {
    year: number;
    averagePopularity: number | null;
}

export interface PopularMovie {
    title: string;
    popularity: number;
    year: number;
}

export interface GenreReport {
    genre: string;
    movies: number;
    countsByYear: YearCount[];
    averagePopularityByYear: YearPopularity[];
    topByPopularity: PopularMovie[];
    runtimeTitleCorrelation: CorrelationResult | null;
    wordFrequencies: WordCount[];
}

interface ReportMovie {
    title: string;
    runtime: number | null;
    year: number;
    overview: string | null;
    popularity: number | null;
}

export function formatCorrelation(result: CorrelationResult): string {
    return `Pearson r (runtime vs title length): ${result.r.toFixed(3)}, p=${formatSignificant(result.p)}\n`;
}

function groupByYear(movies: ReportMovie[]): Map<number, ReportMovie[]> {
    const byYear = new Map<number, ReportMovie[]>();
    for (const movie of movies) {
        const bucket = byYear.get(movie.year);
        if (bucket) {
            bucket.push(movie);
        } else {
            byYear.set(movie.year, [movie]);
        }
    }
    return new Map([...byYear.entries()].sort(([a], [b]) => a - b));
}

@Injectable()
export class ReportService {

    @Inject()
    private databaseService!: DatabaseService; // DI handles this using !
    @Inject()
    private configService!: ConfigService;

    async buildReport(genre: string = this.configService.get("targetGenre")): Promise<GenreReport> {
        const rows = await this.databaseService.getDb()
            .select({
                title: schema.movies.title,
                runtime: schema.movies.runtime,
                releaseDate: schema.movies.releaseDate,
                overview: schema.movies.overview,
                popularity: schema.movies.popularity,
            })
            .from(schema.movies)
            .innerJoin(schema.movieGenres, eq(schema.movies.id, schema.movieGenres.movieId))
            .innerJoin(schema.genres, eq(schema.genres.id, schema.movieGenres.genreId))
            .where(and(eq(schema.genres.name, genre), isNotNull(schema.movies.releaseDate)))
            .orderBy(asc(schema.movies.id));

        const movies: ReportMovie[] = [];
        for (const row of rows) {
            const year = Number(row.releaseDate?.slice(0, 4));
            if (!Number.isInteger(year)) continue;
            movies.push({
                title: row.title,
                runtime: row.runtime,
                year,
                overview: row.overview,
                popularity: fromNumeric(row.popularity),
            });
        }

        const byYear = groupByYear(movies);
        const countsByYear = [...byYear.entries()].map(([year, group]) => ({ year, count: group.length }));
        const averagePopularityByYear = [...byYear.entries()].map(([year, group]) => ({
            year,
            averagePopularity: mean(group.flatMap((m) => (m.popularity === null ? [] : [m.popularity]))),
        }));

        const topByPopularity: PopularMovie[] = [];
        for (const movie of movies) {
            if (movie.popularity !== null) {
                topByPopularity.push({ title: movie.title, popularity: movie.popularity, year: movie.year });
            }
        }
        // stable sort: equal popularity keeps load order
        topByPopularity.sort((a, b) => b.popularity - a.popularity);

        const runtimes: number[] = [];
        const titleLengths: number[] = [];
        for (const movie of movies) {
            if (movie.runtime === null) continue;
            runtimes.push(movie.runtime);
            titleLengths.push(movie.title.length);
        }
        const runtimeTitleCorrelation = pearson(runtimes, titleLengths);

        const tokens = movies.flatMap((m) => (m.overview ? tokenize(m.overview) : []));

        return {
            genre,
            movies: movies.length,
            countsByYear,
            averagePopularityByYear,
            topByPopularity: topByPopularity.slice(0, TOP_POPULAR_REPORT_SIZE),
            runtimeTitleCorrelation,
            wordFrequencies: countWords(tokens),
        };
    }

    /** Writes the report files and returns their paths. Nothing is written when the genre has no dated movies. */
    async writeReports(
        outputDir: string = this.configService.get("reportsDir"),
        genre: string = this.configService.get("targetGenre")
    ): Promise<string[]> {
        const report = await this.buildReport(genre);
        if (report.movies === 0) {
            $log.warn(`No ${genre} movies with a release date found for analysis`);
            return [];
        }

        await mkdir(outputDir, { recursive: true });
        const slug = slugify(genre);
        const written: string[] = [];
        const write = async (fileName: string, content: string) => {
            const file = path.join(outputDir, fileName);
            await writeFile(file, content, "utf8");
            written.push(file);
            $log.info(`Saved ${file}`);
        };

        await write(`${slug}_by_year.csv`, stringify(report.countsByYear, {
            header: true,
            columns: [{ key: "year" }, { key: "count" }],
        }));

        await write("avg_popularity_by_year.csv", stringify(report.averagePopularityByYear, {
            header: true,
            columns: [{ key: "year" }, { key: "averagePopularity", header: "avg_popularity" }],
        }));

        await write(`top${TOP_POPULAR_REPORT_SIZE}_${slug}_by_popularity.csv`, stringify(report.topByPopularity, {
            header: true,
            columns: [{ key: "title" }, { key: "popularity" }, { key: "year" }],
        }));

        if (report.runtimeTitleCorrelation) {
            await write("correlation_runtime_title.txt", formatCorrelation(report.runtimeTitleCorrelation));
        } else {
            $log.warn("Not enough data for runtime vs title length correlation");
        }

        await write("overview_word_frequencies.csv", stringify(report.wordFrequencies, {
            header: true,
            columns: [{ key: "word" }, { key: "count" }],
        }));

        return written;
    }
}
