import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { DITest } from "@tsed/di";
import { dustRiver, rioBravo, silverCanyon } from "../testing/movieRecords";
import { ConfigService } from "./ConfigService";
import { DatasetService, matchesSelection, rankByPopularity } from "./DatasetService";

const US = { iso_3166_1: "US", name: "United States of America" };

describe("DatasetService", () => {
  let dir: string;
  let file: string;
  let dataset: DatasetService;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "dataset-"));
    file = path.join(dir, "movies.jsonl");
    await writeFile(file, [
      JSON.stringify(rioBravo({ production_countries: [US] })),
      "{not json",
      JSON.stringify(dustRiver()),
      JSON.stringify(silverCanyon()),
      "[1, 2]",
      "",
      JSON.stringify(rioBravo({ id: 5, production_countries: [{ iso_3166_1: "FR", name: "France" }] })),
      JSON.stringify(rioBravo({ id: 6, title: "Tie Breaker", vote_count: 1000, genres: ["western"], production_countries: [{ iso_3166_1: "us" }] })),
    ].join("\n") + "\n");

    await DITest.create();
    const config = new ConfigService();
    config.merge({ targetGenre: "Western", targetCountries: ["US", "IT"], maxRecords: 1000, maxSelectedRecords: 100, logLevel: "off" });
    dataset = await DITest.invoke<DatasetService>(DatasetService, [{ token: ConfigService, use: config }]);
  });

  afterAll(async () => {
    await DITest.reset();
    await rm(dir, { recursive: true, force: true });
  });

  const ids = (records: unknown[]) => records.map((r) => (typeof r === "object" && r !== null && "id" in r ? r.id : null));

  it("selects genre movies from the target countries, most popular first", async () => {
    const result = await dataset.readMovies(file);

    expect(ids(result.records)).toEqual([6, 42, 101]);
    expect(result.linesRead).toBe(8);
    expect(result.invalidLines).toBe(2);
  });

  it("keeps only the configured number of selected records", async () => {
    expect(ids((await dataset.readMovies(file, { maxSelected: 2 })).records)).toEqual([6, 42]);
  });

  it("stops after the configured number of lines", async () => {
    const result = await dataset.readMovies(file, { maxRecords: 3 });

    expect(ids(result.records)).toEqual([42, 101]);
    expect(result.linesRead).toBe(3);
    expect(result.invalidLines).toBe(1);
  });

  it("reads every object when selection is off", async () => {
    expect(ids((await dataset.readMovies(file, { select: false })).records)).toEqual([42, 101, 203, 5, 6]);
  });

  it("selects another genre and country on request", async () => {
    expect(ids((await dataset.readMovies(file, { genre: "adventure", countries: ["us"] })).records)).toEqual([203]);
  });

  it("fails for a missing file", async () => {
    await expect(dataset.readMovies(path.join(dir, "absent.jsonl"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("matchesSelection", () => {
  it("needs both the genre and one of the countries", () => {
    expect(matchesSelection(dustRiver(), "Western", ["IT"])).toBe(true);
    expect(matchesSelection(dustRiver(), "Western", ["US"])).toBe(false);
    expect(matchesSelection(silverCanyon(), "Western", ["US"])).toBe(false);
    expect(matchesSelection("not a record", "Western", ["US"])).toBe(false);
  });
});

describe("rankByPopularity", () => {
  it("treats missing metrics as zero and keeps input order on ties", () => {
    const ranked = rankByPopularity([
      { id: 1 },
      { id: 2, popularity: 3 },
      { id: 3, popularity: "3", vote_count: 10 },
      { id: 4 },
    ]);

    expect(ranked.map((r) => r.id)).toEqual([3, 2, 1, 4]);
  });
});
