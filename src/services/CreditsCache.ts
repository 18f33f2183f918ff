import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { $log } from "@tsed/logger";
import { ExternalIds } from "../db/schema";
import { TmdbCrewEntry, TmdbMovieCredits } from "./TmdbService";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isObject(error) && error.code === "ENOENT";
}

export function deadFilePath(cacheFile: string): string {
  const { dir, name } = path.parse(cacheFile);
  return path.join(dir, `${name}.dead`);
}

/**
 * Append-only JSONL cache of TMDB credit payloads, plus a `.dead` file listing
 * ids TMDB does not know. Lets an interrupted enrichment run resume without
 * asking TMDB again.
 */
export class CreditsCache {
  private readonly entries = new Map<number, TmdbMovieCredits>();
  private readonly dead = new Set<number>();
  readonly deadFile: string;

  constructor(readonly cacheFile: string) {
    this.deadFile = deadFilePath(cacheFile);
  }

  get size(): number {
    return this.entries.size;
  }

  get deadCount(): number {
    return this.dead.size;
  }

  async load(): Promise<void> {
    for (const line of await this.readLines(this.deadFile)) {
      const id = Number(line);
      if (Number.isInteger(id) && id > 0) this.dead.add(id);
    }

    for (const line of await this.readLines(this.cacheFile)) {
      const entry = this.parseEntry(line);
      if (entry) {
        this.entries.set(entry.tmdbId, entry);
      } else {
        $log.debug(`Skipping unreadable cache line in ${this.cacheFile}`);
      }
    }
  }

  get(tmdbId: number): TmdbMovieCredits | undefined {
    return this.entries.get(tmdbId);
  }

  isDead(tmdbId: number): boolean {
    return this.dead.has(tmdbId);
  }

  async store(credits: TmdbMovieCredits): Promise<void> {
    await mkdir(path.dirname(this.cacheFile), { recursive: true });
    await appendFile(this.cacheFile, JSON.stringify(credits) + "\n", "utf8");
    this.entries.set(credits.tmdbId, credits);
  }

  async markDead(tmdbId: number): Promise<void> {
    await mkdir(path.dirname(this.deadFile), { recursive: true });
    await appendFile(this.deadFile, `${tmdbId}\n`, "utf8");
    this.dead.add(tmdbId);
  }

  private async readLines(file: string): Promise<string[]> {
    try {
      const content = await readFile(file, "utf8");
      return content.split("\n").map((line) => line.trim()).filter((line) => line.length > 0);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
  }

  private parseEntry(line: string): TmdbMovieCredits | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      return null;
    }
    if (!isObject(parsed) || typeof parsed.tmdbId !== "number" || !Array.isArray(parsed.crew)) {
      return null;
    }

    const crew: TmdbCrewEntry[] = [];
    for (const entry of parsed.crew) {
      if (isObject(entry) && typeof entry.name === "string" && typeof entry.job === "string") {
        crew.push({
          name: entry.name,
          job: entry.job,
          department: typeof entry.department === "string" ? entry.department : null,
        });
      }
    }

    const externalIds: ExternalIds = {};
    if (isObject(parsed.externalIds)) {
      for (const [key, value] of Object.entries(parsed.externalIds)) {
        if (typeof value === "string" || value === null) externalIds[key] = value;
      }
    }

    return { tmdbId: parsed.tmdbId, crew, externalIds };
  }
}
