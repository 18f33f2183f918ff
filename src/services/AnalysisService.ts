import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { and, eq, inArray, isNotNull, sql } from "drizzle-orm";
import * as schema from "../db/schema";
import { WordCount, countWords, tokenize } from "../utils/text";
import { ConfigService } from "./ConfigService";
import { DatabaseService } from "./DatabaseService";

export interface CountryWords {
    country: string;
    movies: number;
    words: WordCount[];
}

@Injectable()
export class AnalysisService {

    @Inject()
    private databaseService!: DatabaseService; // DI handles this using !
    @Inject()
    private configService!: ConfigService;

    /**
     * Most frequent overview words per origin country, in the order the
     * countries are given. Only movies with exactly one origin country count.
     */
    async topWordsByCountry(topN?: number, countries?: string[]): Promise<CountryWords[]> {
        const limit = topN ?? this.configService.get("topNWords");
        const codes = (countries ?? this.configService.get("targetCountries")).map((c) => c.toUpperCase());
        if (codes.length === 0) return [];

        const firstCountry = sql<string>`${schema.movies.originCountry}[1]`;
        const rows = await this.databaseService.getDb()
            .select({ country: firstCountry, overview: schema.movies.overview })
            .from(schema.movies)
            .where(and(
                isNotNull(schema.movies.overview),
                eq(sql`array_length(${schema.movies.originCountry}, 1)`, 1),
                inArray(firstCountry, codes)
            ))
            .orderBy(schema.movies.id);

        const tokensByCountry = new Map<string, string[]>(codes.map((code) => [code, []]));
        const moviesByCountry = new Map<string, number>();
        for (const row of rows) {
            const tokens = tokensByCountry.get(row.country);
            if (!tokens || row.overview === null) continue;
            tokens.push(...tokenize(row.overview));
            moviesByCountry.set(row.country, (moviesByCountry.get(row.country) ?? 0) + 1);
        }

        if (rows.length === 0) {
            $log.warn(`No overviews found for ${codes.join(", ")}`);
        }

        return codes.map((country) => ({
            country,
            movies: moviesByCountry.get(country) ?? 0,
            words: countWords(tokensByCountry.get(country) ?? [], limit),
        }));
    }
}
