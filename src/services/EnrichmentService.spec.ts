import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { DITest } from "@tsed/di";
import { eq } from "drizzle-orm";
import * as schema from "../db/schema";
import { MovieNotFoundError, RecordValidationError } from "../errors";
import { CatalogTestContext, createCatalogTestContext } from "../testing/catalogTestContext";
import { dustRiver, rioBravo, silverCanyon } from "../testing/movieRecords";
import { NOT_FOUND, StubReply, movieBody, stubTmdbClient } from "../testing/tmdbStub";
import { CatalogLoaderService } from "./CatalogLoaderService";
import { EnrichmentService, extractDirectors } from "./EnrichmentService";
import { MoviesService } from "./MoviesService";
import { TmdbService } from "./TmdbService";

describe("EnrichmentService", () => {
  let context: CatalogTestContext;
  let tmdb: TmdbService;
  let enrichment: EnrichmentService;
  let loader: CatalogLoaderService;

  beforeAll(async () => {
    await DITest.create();
    context = await createCatalogTestContext();
    loader = await context.invoke(CatalogLoaderService);
    tmdb = await context.invoke(TmdbService);
    const movies = await context.invoke(MoviesService);
    enrichment = await context.invoke(EnrichmentService, [
      { token: MoviesService, use: movies },
      { token: TmdbService, use: tmdb },
    ]);
  });

  afterAll(async () => {
    await context.close();
    await DITest.reset();
  });

  beforeEach(async () => {
    await context.database.resetSchema();
    await loader.loadMovies([rioBravo(), dustRiver(), silverCanyon()]);
  });

  const movieRow = async (tmdbId: number) => {
    const [row] = await context.database.getDb()
      .select()
      .from(schema.movies)
      .where(eq(schema.movies.tmdbId, tmdbId));
    return row;
  };

  describe("enrichMovie", () => {
    it("replaces crew without touching other columns", async () => {
      await enrichment.enrichMovie(42, { crew: [{ role: "director", name: "Jane Director" }] });

      expect(await movieRow(42)).toMatchObject({
        title: "Rio Bravo",
        crew: [{ role: "director", name: "Jane Director" }],
        externalIds: {},
        runtime: 141,
      });
    });

    it("replaces external ids only", async () => {
      await enrichment.enrichMovie(101, { externalIds: { imdb_id: "tt0000101", tvdb_id: null } });

      expect(await movieRow(101)).toMatchObject({
        crew: [],
        externalIds: { imdb_id: "tt0000101", tvdb_id: null },
      });
    });

    it("throws for an unknown movie and creates nothing", async () => {
      const before = await context.database.getTableCounts();

      await expect(enrichment.enrichMovie(777, { crew: [] })).rejects.toThrow(MovieNotFoundError);
      expect(await context.database.getTableCounts()).toEqual(before);
      expect(await movieRow(777)).toBeUndefined();
    });

    it("rejects an empty payload or a bad id", async () => {
      await expect(enrichment.enrichMovie(42, {})).rejects.toThrow(RecordValidationError);
      await expect(enrichment.enrichMovie(0, { crew: [] })).rejects.toThrow(
        "Invalid movie record: tmdb id must be a positive integer, got 0"
      );
    });
  });

  describe("enrichCrew", () => {
    let dir: string;
    let cacheFile: string;
    let requested: string[];

    const useReplies = (replies: Record<string, StubReply>) => {
      tmdb.setClient(stubTmdbClient((request) => {
        const url = request.url ?? "";
        requested.push(url);
        return replies[url] ?? NOT_FOUND;
      }));
    };

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "enrich-crew-"));
      cacheFile = path.join(dir, "credits_dump.jsonl");
      requested = [];
      await loader.loadMovies([rioBravo({ id: 304, title: "Ghost Ridge" })]);
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("fetches, caches and marks unknown ids dead", async () => {
      await writeFile(cacheFile, JSON.stringify({ tmdbId: 101, crew: [], externalIds: {} }) + "\n");
      useReplies({ "/movie/42": { status: 200, data: movieBody(42, ["Jane Director"], { imdb_id: "tt0000042" }) } });

      const summary = await enrichment.enrichCrew({ cacheFile });

      expect(summary).toEqual({
        candidates: 3,
        updated: 1,
        cached: 1,
        fetched: 1,
        dead: 1,
        failed: 0,
        withoutDirectors: 1,
      });
      expect(requested).toEqual(["/movie/42", "/movie/304"]);
      expect(await movieRow(42)).toMatchObject({
        crew: [{ role: "director", name: "Jane Director" }],
        externalIds: { imdb_id: "tt0000042" },
      });
      expect((await movieRow(101)).crew).toEqual([]);
    });

    it("resumes from the cache without asking TMDB again", async () => {
      useReplies({ "/movie/42": { status: 200, data: movieBody(42, ["Jane Director"]) } });
      await enrichment.enrichCrew({ cacheFile });
      requested = [];

      const summary = await enrichment.enrichCrew({ cacheFile });

      expect(requested).toEqual([]);
      expect(summary).toMatchObject({ cached: 1, fetched: 0, dead: 2, updated: 1 });
    });

    it("stores external ids even when there is no director", async () => {
      useReplies({
        "/movie/42": { status: 200, data: movieBody(42, [], { imdb_id: "tt0000042" }) },
        "/movie/101": { status: 200, data: movieBody(101, ["Luca Regista", "Luca Regista"]) },
      });

      const summary = await enrichment.enrichCrew({ cacheFile });

      expect(summary).toMatchObject({ updated: 2, withoutDirectors: 1, dead: 1 });
      expect(await movieRow(42)).toMatchObject({ crew: [], externalIds: { imdb_id: "tt0000042" } });
      expect((await movieRow(101)).crew).toEqual([{ role: "director", name: "Luca Regista" }]);
    });

    it("counts TMDB failures and carries on", async () => {
      useReplies({
        "/movie/42": { status: 500, data: {} },
        "/movie/101": { status: 200, data: movieBody(101, ["Luca Regista"]) },
      });

      const summary = await enrichment.enrichCrew({ cacheFile });

      expect(summary).toMatchObject({ failed: 1, updated: 1, fetched: 1, dead: 1 });
    });

    it("does nothing for a genre without movies", async () => {
      useReplies({});

      expect(await enrichment.enrichCrew({ cacheFile, genre: "Horror" })).toEqual({
        candidates: 0,
        updated: 0,
        cached: 0,
        fetched: 0,
        dead: 0,
        failed: 0,
        withoutDirectors: 0,
      });
      expect(requested).toEqual([]);
    });
  });
});

describe("extractDirectors", () => {
  it("keeps distinct directors in credit order", () => {
    expect(extractDirectors([
      { name: "Sam Writer", job: "Screenplay", department: "Writing" },
      { name: " Jane Director ", job: "Director", department: "Directing" },
      { name: "Luca Regista", job: "Director", department: "Directing" },
      { name: "Jane Director", job: "Director", department: "Directing" },
      { name: "", job: "Director", department: null },
    ])).toEqual([
      { role: "director", name: "Jane Director" },
      { role: "director", name: "Luca Regista" },
    ]);
  });
});
