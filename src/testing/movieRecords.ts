type RawRecord = Record<string, unknown>;

export function rioBravo(overrides: RawRecord = {}): RawRecord {
  return {
    id: 42,
    title: "Rio Bravo",
    original_title: "Rio Bravo",
    original_language: "en",
    adult: false,
    status: "Released",
    tagline: "A sheriff holds the jail.",
    overview: "A small-town sheriff holds a prisoner while the outlaw's gang waits outside town.",
    release_date: "1959-03-18",
    runtime: 141,
    budget: 1200000,
    revenue: 5750000,
    popularity: 12.5,
    vote_count: 900,
    vote_average: 7.6,
    poster_path: "/poster-42.jpg",
    backdrop_path: null,
    homepage: "",
    imdb_id: "tt0000042",
    genres: [{ id: 37, name: "Western" }],
    production_companies: [{ id: 7, name: "Warner Bros.", logo_path: null, origin_country: "US" }],
    production_countries: [],
    spoken_languages: [],
    ...overrides,
  };
}

/** A made-up record with every dimension filled in. */
export function dustRiver(overrides: RawRecord = {}): RawRecord {
  return {
    id: 101,
    title: "Dust River",
    original_title: "Fiume di Polvere",
    original_language: "it",
    status: "Released",
    overview: "A drifter rides into a border town and finds the river has gone dry.",
    release_date: "1967-11-02",
    runtime: 118,
    budget: 300000,
    revenue: 900000,
    popularity: 8.25,
    vote_count: 120,
    vote_average: 6.9,
    imdb_id: "tt0000101",
    external_ids: { imdb_id: "tt0000101", wikidata_id: "Q101" },
    belongs_to_collection: { id: 500, name: "River Trilogy", poster_path: null, backdrop_path: null },
    genres: [{ id: 37, name: "Western" }, { id: 18, name: "Drama" }],
    production_companies: [
      { id: 70, name: "Warner  Bros", logo_path: null, origin_country: "IT" },
      { id: 71, name: "Polvere Film", logo_path: "/pf.png", origin_country: "IT" },
    ],
    production_countries: [
      { iso_3166_1: "IT", name: "Italy" },
      { iso_3166_1: "ES", name: "Spain" },
    ],
    spoken_languages: [
      { iso_639_1: "it", english_name: "Italian", name: "Italiano" },
      { iso_639_1: "en", english_name: "English", name: "English" },
    ],
    ...overrides,
  };
}

export function silverCanyon(overrides: RawRecord = {}): RawRecord {
  return rioBravo({
    id: 203,
    title: "Silver Canyon",
    original_title: "Silver Canyon",
    overview: "Two prospectors race a storm to reach a hidden silver vein.",
    release_date: "2001-06-15",
    runtime: 95,
    budget: 2000000,
    popularity: 30,
    vote_count: 1000,
    vote_average: 5.5,
    imdb_id: "tt0000203",
    genres: [{ id: 12, name: "Adventure" }],
    production_companies: [],
    production_countries: [{ iso_3166_1: "US", name: "United States of America" }],
    spoken_languages: [{ iso_639_1: "en", english_name: "English" }],
    ...overrides,
  });
}
