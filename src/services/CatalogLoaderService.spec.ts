import { DITest } from "@tsed/di";
import { asc, eq } from "drizzle-orm";
import * as schema from "../db/schema";
import { CatalogTestContext, createCatalogTestContext } from "../testing/catalogTestContext";
import { dustRiver, rioBravo } from "../testing/movieRecords";
import { CatalogLoaderService } from "./CatalogLoaderService";

describe("CatalogLoaderService", () => {
  let context: CatalogTestContext;
  let loader: CatalogLoaderService;

  beforeAll(async () => {
    await DITest.create();
    context = await createCatalogTestContext();
    loader = await context.invoke(CatalogLoaderService);
  });

  afterAll(async () => {
    await context.close();
    await DITest.reset();
  });

  beforeEach(() => context.database.resetSchema());

  const movieRow = async (tmdbId: number) => {
    const [row] = await context.database.getDb()
      .select()
      .from(schema.movies)
      .where(eq(schema.movies.tmdbId, tmdbId));
    return row;
  };

  const linkRows = async () => {
    const db = context.database.getDb();
    return {
      genres: await db.select().from(schema.movieGenres)
        .orderBy(asc(schema.movieGenres.movieId), asc(schema.movieGenres.genreId)),
      companies: await db.select().from(schema.movieProdCompanies)
        .orderBy(asc(schema.movieProdCompanies.movieId), asc(schema.movieProdCompanies.companyId)),
      countries: await db.select().from(schema.movieProdCountries)
        .orderBy(asc(schema.movieProdCountries.movieId), asc(schema.movieProdCountries.iso31661)),
      languages: await db.select().from(schema.movieSpokenLanguages)
        .orderBy(asc(schema.movieSpokenLanguages.movieId), asc(schema.movieSpokenLanguages.iso6391)),
    };
  };

  it("writes one row per entity for a single record", async () => {
    const report = await loader.loadMovies([rioBravo()]);

    expect(report).toEqual({ processed: 1, inserted: 1, skipped: 0, overwritten: 0, rejected: [], failed: [] });
    expect(await context.database.getTableCounts()).toEqual({
      movies: 1,
      genres: 1,
      collections: 0,
      productionCompanies: 1,
      productionCountries: 0,
      spokenLanguages: 0,
      movieGenres: 1,
      movieProdCompanies: 1,
      movieProdCountries: 0,
      movieSpokenLanguages: 0,
    });
  });

  it("changes nothing when the same batch is loaded again", async () => {
    await loader.loadMovies([rioBravo(), dustRiver()]);
    const before = await context.database.getTableCounts();
    const linksBefore = await linkRows();

    const report = await loader.loadMovies([rioBravo(), dustRiver()]);

    expect(report.inserted).toBe(0);
    expect(report.skipped).toBe(2);
    expect(await context.database.getTableCounts()).toEqual(before);
    expect(await linkRows()).toEqual(linksBefore);
    expect(linksBefore.genres).toHaveLength(3);
    expect(linksBefore.countries.map((link) => link.iso31661)).toEqual(["ES", "IT"]);
  });

  it("keeps a movie whose release date is not on the calendar", async () => {
    const report = await loader.loadMovies([rioBravo({ release_date: "1959-02-30" })]);

    expect(report).toMatchObject({ inserted: 1, failed: [] });
    expect((await movieRow(42)).releaseDate).toBeNull();
  });

  it("stores every column and dimension of a full record", async () => {
    await loader.loadMovies([dustRiver()]);

    const movie = await movieRow(101);
    expect(movie).toMatchObject({
      title: "Dust River",
      originalTitle: "Fiume di Polvere",
      originalLanguage: "it",
      releaseDate: "1967-11-02",
      runtime: 118,
      budget: 300000,
      revenue: 900000,
      voteCount: 120,
      crew: [],
      externalIds: { imdb_id: "tt0000101", wikidata_id: "Q101" },
      originCountry: ["IT", "ES"],
    });
    expect(Number(movie.popularity)).toBe(8.25);
    expect(Number(movie.voteAverage)).toBe(6.9);

    const [collection] = await context.database.getDb().select().from(schema.collections);
    expect(movie.collectionId).toBe(collection.id);
    expect(collection.name).toBe("River Trilogy");

    expect(await context.database.getTableCounts()).toMatchObject({
      genres: 2,
      productionCompanies: 2,
      productionCountries: 2,
      spokenLanguages: 2,
      movieGenres: 2,
      movieProdCompanies: 2,
      movieProdCountries: 2,
      movieSpokenLanguages: 2,
    });
  });

  it("reuses dimension rows shared between movies", async () => {
    await loader.loadMovies([
      dustRiver(),
      dustRiver({
        id: 102,
        title: "Dust River II",
        belongs_to_collection: { id: 500, name: "Renamed Trilogy" },
        production_companies: [{ id: 71, name: "Polvere Film S.p.A." }],
      }),
    ]);

    const collections = await context.database.getDb().select().from(schema.collections);
    expect(collections.map((c) => c.name)).toEqual(["River Trilogy"]);

    const companies = await context.database.getDb()
      .select()
      .from(schema.productionCompanies)
      .where(eq(schema.productionCompanies.tmdbId, 71));
    expect(companies.map((c) => c.name)).toEqual(["Polvere Film"]);

    expect(await context.database.getTableCounts()).toMatchObject({
      movies: 2,
      genres: 2,
      collections: 1,
      productionCompanies: 2,
      movieGenres: 4,
      movieProdCompanies: 3,
    });
  });

  it("rejects invalid records and keeps going", async () => {
    const report = await loader.loadMovies([rioBravo({ id: undefined }), { title: 5 }, dustRiver()]);

    expect(report.inserted).toBe(1);
    expect(report.rejected).toEqual([
      { index: 0, tmdbId: null, reason: "Invalid movie record: id must be a positive integer" },
      { index: 1, tmdbId: null, reason: "Invalid movie record: id must be a positive integer; title is required" },
    ]);
    expect((await context.database.getTableCounts()).movies).toBe(1);
  });

  it("rolls back a record the database refuses and reports its SQLSTATE", async () => {
    const report = await loader.loadMovies([
      rioBravo({ original_language: "english", genres: [{ name: "Musical" }] }),
      dustRiver(),
    ]);

    expect(report.inserted).toBe(1);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0]).toMatchObject({ index: 0, tmdbId: 42, sqlState: "22001" });
    expect(report.failed[0].reason).toMatch(/^Movie 42 could not be written \(SQLSTATE 22001\): /);

    const genres = await context.database.getDb().select({ name: schema.genres.name }).from(schema.genres);
    expect(genres.map((g) => g.name).sort()).toEqual(["Drama", "Western"]);
    expect(await movieRow(42)).toBeUndefined();
  });

  it("leaves an existing movie untouched by default", async () => {
    await loader.loadMovies([dustRiver()]);
    const report = await loader.loadMovies([dustRiver({ title: "Changed Title", runtime: 90 })]);

    expect(report.skipped).toBe(1);
    expect(await movieRow(101)).toMatchObject({ title: "Dust River", runtime: 118 });
  });

  it("overwrites dataset columns and links but keeps enrichment data", async () => {
    await loader.loadMovies([dustRiver()]);
    await context.database.getDb()
      .update(schema.movies)
      .set({ crew: [{ role: "director", name: "Jane Director" }] })
      .where(eq(schema.movies.tmdbId, 101));

    const report = await loader.loadMovies([
      dustRiver({
        title: "Dust River (Restored)",
        external_ids: { imdb_id: "tt9999999" },
        genres: [{ name: "Western" }],
        production_companies: [],
        production_countries: [{ iso_3166_1: "IT", name: "Italy" }],
        spoken_languages: [],
      }),
    ], { onConflict: "overwrite" });

    expect(report).toMatchObject({ inserted: 0, skipped: 0, overwritten: 1 });
    expect(await movieRow(101)).toMatchObject({
      title: "Dust River (Restored)",
      originCountry: ["IT"],
      crew: [{ role: "director", name: "Jane Director" }],
      externalIds: { imdb_id: "tt0000101", wikidata_id: "Q101" },
    });
    expect(await context.database.getTableCounts()).toMatchObject({
      movies: 1,
      genres: 2,
      productionCompanies: 2,
      movieGenres: 1,
      movieProdCompanies: 0,
      movieProdCountries: 1,
      movieSpokenLanguages: 0,
    });
  });

  it("inserts new movies under the overwrite policy", async () => {
    const report = await loader.loadMovies([rioBravo()], { onConflict: "overwrite" });
    expect(report).toMatchObject({ inserted: 1, overwritten: 0 });
  });

  describe("referential actions", () => {
    it("removes genre links but keeps the movie when a genre is deleted", async () => {
      await loader.loadMovies([dustRiver()]);
      await context.database.getDb().delete(schema.genres).where(eq(schema.genres.name, "Drama"));

      expect(await context.database.getTableCounts()).toMatchObject({ movies: 1, genres: 1, movieGenres: 1 });
    });

    it("clears collection_id when the collection is deleted", async () => {
      await loader.loadMovies([dustRiver()]);
      await context.database.getDb().delete(schema.collections);

      expect((await movieRow(101)).collectionId).toBeNull();
    });

    it("removes all links when a movie is deleted", async () => {
      await loader.loadMovies([dustRiver()]);
      await context.database.getDb().delete(schema.movies);

      expect(await context.database.getTableCounts()).toMatchObject({
        movies: 0,
        genres: 2,
        movieGenres: 0,
        movieProdCompanies: 0,
        movieProdCountries: 0,
        movieSpokenLanguages: 0,
      });
    });
  });
});
