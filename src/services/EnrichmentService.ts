import { setTimeout as sleep } from "node:timers/promises";
import { Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { eq } from "drizzle-orm";
import * as schema from "../db/schema";
import { CrewMember, ExternalIds } from "../db/schema";
import { MovieNotFoundError, RecordValidationError, describeError } from "../errors";
import { ConfigService } from "./ConfigService";
import { CreditsCache } from "./CreditsCache";
import { DatabaseService } from "./DatabaseService";
import { MoviesService } from "./MoviesService";
import { TmdbCrewEntry, TmdbMovieCredits, TmdbService } from "./TmdbService";

/** What enrichment may change on an existing movie. */
export interface EnrichmentPayload {
    crew?: CrewMember[];
    externalIds?: ExternalIds;
}

export interface EnrichCrewOptions {
    genre?: string;
    cacheFile?: string;
}

export interface EnrichCrewSummary {
    candidates: number;
    updated: number;
    cached: number;
    fetched: number;
    dead: number;
    failed: number;
    withoutDirectors: number;
}

export function extractDirectors(crew: TmdbCrewEntry[]): CrewMember[] {
    const seen = new Set<string>();
    const directors: CrewMember[] = [];
    for (const entry of crew) {
        const name = entry.name.trim();
        if (entry.job !== "Director" || !name || seen.has(name)) continue;
        seen.add(name);
        directors.push({ role: "director", name });
    }
    return directors;
}

@Injectable()
export class EnrichmentService {

    @Inject()
    private databaseService!: DatabaseService;
    @Inject()
    private moviesService!: MoviesService;
    @Inject()
    private tmdbService!: TmdbService;
    @Inject()
    private configService!: ConfigService;

    /**
     * Replaces crew and/or external ids of an existing movie in one statement.
     * Never creates a movie: an unknown id throws and leaves the store untouched.
     */
    async enrichMovie(tmdbId: number, payload: EnrichmentPayload): Promise<void> {
        if (!Number.isInteger(tmdbId) || tmdbId <= 0) {
            throw new RecordValidationError(null, [`tmdb id must be a positive integer, got ${tmdbId}`]);
        }

        const changes: Pick<schema.NewMovie, "crew" | "externalIds"> = {};
        if (payload.crew !== undefined) changes.crew = payload.crew;
        if (payload.externalIds !== undefined) changes.externalIds = payload.externalIds;

        if (Object.keys(changes).length === 0) {
            throw new RecordValidationError(tmdbId, ["enrichment payload has neither crew nor externalIds"]);
        }

        const updated = await this.databaseService.getDb()
            .update(schema.movies)
            .set(changes)
            .where(eq(schema.movies.tmdbId, tmdbId))
            .returning({ id: schema.movies.id });

        if (updated.length === 0) {
            throw new MovieNotFoundError(tmdbId);
        }
    }

    /**
     * Pulls directors and external ids from TMDB for every movie of the target
     * genre, going through the on-disk credits cache first.
     */
    async enrichCrew(options: EnrichCrewOptions = {}): Promise<EnrichCrewSummary> {
        const genre = options.genre ?? this.configService.get("targetGenre");
        const cache = new CreditsCache(options.cacheFile ?? this.configService.get("creditsCacheFile"));
        const delayMs = this.configService.get("requestDelayMs");
        await cache.load();

        const tmdbIds = await this.moviesService.listTmdbIdsByGenre(genre);
        const summary: EnrichCrewSummary = {
            candidates: tmdbIds.length,
            updated: 0,
            cached: 0,
            fetched: 0,
            dead: 0,
            failed: 0,
            withoutDirectors: 0,
        };

        if (tmdbIds.length === 0) {
            $log.warn(`No ${genre} movies found in the database`);
            return summary;
        }

        $log.info(`Enriching ${tmdbIds.length} ${genre} movies (${cache.size} cached, ${cache.deadCount} known dead)`);

        for (const tmdbId of tmdbIds) {
            if (cache.isDead(tmdbId)) {
                summary.dead++;
                continue;
            }

            let credits: TmdbMovieCredits | null | undefined = cache.get(tmdbId);
            if (credits) {
                summary.cached++;
            } else {
                try {
                    credits = await this.tmdbService.getMovieCredits(tmdbId);
                } catch (error) {
                    $log.warn(`TMDB error for movie ${tmdbId}: ${describeError(error)}`);
                    summary.failed++;
                    continue;
                }

                if (credits === null) {
                    await cache.markDead(tmdbId);
                    summary.dead++;
                    continue;
                }

                await cache.store(credits);
                summary.fetched++;
                if (delayMs > 0) await sleep(delayMs);
            }

            const directors = extractDirectors(credits.crew);
            const hasExternalIds = Object.keys(credits.externalIds).length > 0;
            if (directors.length === 0) {
                summary.withoutDirectors++;
                if (!hasExternalIds) continue;
            }

            try {
                await this.enrichMovie(tmdbId, {
                    crew: directors.length ? directors : undefined,
                    externalIds: hasExternalIds ? credits.externalIds : undefined,
                });
                summary.updated++;
            } catch (error) {
                if (!(error instanceof MovieNotFoundError)) throw error;
                $log.warn(error.message);
                summary.failed++;
            }
        }

        $log.info(
            `Updated ${summary.updated} movies (${summary.fetched} fetched, ${summary.cached} from cache, ` +
            `${summary.dead} dead, ${summary.failed} failed). Cache: ${cache.cacheFile}, dead ids: ${cache.deadFile}`
        );
        return summary;
    }
}
