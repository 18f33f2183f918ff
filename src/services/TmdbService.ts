import axios, { AxiosInstance } from "axios";
import { Inject, Injectable } from "@tsed/di";
import { ExternalIds } from "../db/schema";
import { TMDB_NOT_FOUND_STATUS_CODE, TMDB_REQUEST_TIMEOUT_MS } from "../config";
import { ConfigService } from "./ConfigService";

export interface TmdbCrewEntry {
  name: string;
  job: string;
  department: string | null;
}

export interface TmdbMovieCredits {
  tmdbId: number;
  crew: TmdbCrewEntry[];
  externalIds: ExternalIds;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isTmdbNotFound(error: unknown): boolean {
  if (!axios.isAxiosError(error) || !error.response) return false;
  const body: unknown = error.response.data;
  return (
    error.response.status === 404 ||
    (isObject(body) && body.status_code === TMDB_NOT_FOUND_STATUS_CODE)
  );
}

@Injectable()
export class TmdbService {
    @Inject()
    private configService!: ConfigService;

    private client: AxiosInstance | null = null;

    getClient(): AxiosInstance {
        if (!this.client) {
            const apiKey = this.configService.get("tmdbApiKey");
            if (!apiKey) {
                throw new Error("TMDB_API_KEY is required to fetch enrichment data.");
            }

            this.client = axios.create({
                baseURL: this.configService.get("tmdbBaseUrl"),
                timeout: TMDB_REQUEST_TIMEOUT_MS,
                params: { api_key: apiKey },
            });
        }
        return this.client;
    }

    setClient(client: AxiosInstance): void {
        this.client = client;
    }

    /**
     * Crew and cross-reference ids for one movie, or null when TMDB does not know the id.
     */
    async getMovieCredits(tmdbId: number): Promise<TmdbMovieCredits | null> {
        try {
            const response = await this.getClient().get<unknown>(`/movie/${tmdbId}`, {
                params: { append_to_response: "credits,external_ids" },
            });
            return this.parseMovieCredits(tmdbId, response.data);
        } catch (error) {
            if (isTmdbNotFound(error)) {
                return null;
            }
            throw error;
        }
    }

    parseMovieCredits(tmdbId: number, body: unknown): TmdbMovieCredits {
        const crew: TmdbCrewEntry[] = [];
        const externalIds: ExternalIds = {};

        if (isObject(body)) {
            const credits = body.credits;
            const entries = isObject(credits) && Array.isArray(credits.crew) ? credits.crew : [];
            for (const entry of entries) {
                if (!isObject(entry) || typeof entry.name !== "string" || typeof entry.job !== "string") continue;
                crew.push({
                    name: entry.name,
                    job: entry.job,
                    department: typeof entry.department === "string" ? entry.department : null,
                });
            }

            if (isObject(body.external_ids)) {
                for (const [key, value] of Object.entries(body.external_ids)) {
                    if (key === "id") continue;
                    if (typeof value === "string" && value.length) externalIds[key] = value;
                    else if (value === null || value === "") externalIds[key] = null;
                }
            }
        }

        return { tmdbId, crew, externalIds };
    }
}
