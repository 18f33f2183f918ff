import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { ConfigService } from "./ConfigService";

export interface ReadMoviesOptions {
    // false reads every line without genre/country selection
    select?: boolean;
    genre?: string;
    countries?: string[];
    maxRecords?: number;
    maxSelected?: number;
}

export interface DatasetReadResult {
    records: unknown[];
    linesRead: number;
    invalidLines: number;
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function namesOf(value: unknown, key: string): string[] {
    if (!Array.isArray(value)) return [];
    const names: string[] = [];
    for (const entry of value) {
        const name = isObject(entry) ? entry[key] : entry;
        if (typeof name === "string") names.push(name);
    }
    return names;
}

function metric(record: RawObject, key: string): number {
    const value = Number(record[key]);
    return Number.isFinite(value) ? value : 0;
}

export function matchesSelection(record: unknown, genre: string, countries: readonly string[]): boolean {
    if (!isObject(record)) return false;

    const wanted = genre.toLowerCase();
    if (!namesOf(record.genres, "name").some((name) => name.toLowerCase() === wanted)) {
        return false;
    }

    const codes = new Set(namesOf(record.production_countries, "iso_3166_1").map((code) => code.toUpperCase()));
    return countries.some((code) => codes.has(code.toUpperCase()));
}

/** Most popular first, then most voted; ties keep file order. */
export function rankByPopularity(records: RawObject[]): RawObject[] {
    return [...records].sort((a, b) =>
        metric(b, "popularity") - metric(a, "popularity") || metric(b, "vote_count") - metric(a, "vote_count")
    );
}

@Injectable()
export class DatasetService {

    @Inject()
    private configService!: ConfigService; // DI handles this using !

    /**
     * Reads a JSON-lines dump of TMDB movie records. Lines that are not JSON
     * objects are counted and skipped. Validation happens at load time.
     */
    async readMovies(file: string = this.configService.get("dataFile"), options: ReadMoviesOptions = {}): Promise<DatasetReadResult> {
        const select = options.select ?? true;
        const genre = options.genre ?? this.configService.get("targetGenre");
        const countries = options.countries ?? this.configService.get("targetCountries");
        const maxRecords = options.maxRecords ?? this.configService.get("maxRecords");
        const maxSelected = options.maxSelected ?? this.configService.get("maxSelectedRecords");

        const lines = createInterface({ input: createReadStream(file, { encoding: "utf8" }), crlfDelay: Infinity });

        const matched: RawObject[] = [];
        let linesRead = 0;
        let invalidLines = 0;

        try {
            for await (const line of lines) {
                if (linesRead >= maxRecords) break;
                linesRead++;

                if (!line.trim()) continue;
                let parsed: unknown;
                try {
                    parsed = JSON.parse(line);
                } catch {
                    parsed = undefined;
                }
                if (!isObject(parsed)) {
                    invalidLines++;
                    $log.debug(`Skipping line ${linesRead} of ${file}: not a JSON object`);
                    continue;
                }

                if (!select || matchesSelection(parsed, genre, countries)) {
                    matched.push(parsed);
                }
            }
        } finally {
            lines.close();
        }

        const records = select ? rankByPopularity(matched).slice(0, maxSelected) : matched;
        $log.info(
            `Read ${linesRead} lines from ${file}: ${matched.length} matched, ${records.length} kept, ${invalidLines} invalid`
        );
        return { records, linesRead, invalidLines };
    }
}
