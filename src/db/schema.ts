import {
  pgTable,
  serial,
  integer,
  bigint,
  text,
  char,
  boolean,
  date,
  numeric,
  jsonb,
  timestamp,
  index,
  primaryKey,
} from "drizzle-orm/pg-core";

export interface CrewMember {
  role: string;
  name: string;
}

// provider name -> identifier, e.g. { "imdb_id": "tt0053221", "wikidata_id": "Q1170538" }
export type ExternalIds = Record<string, string | null>;

// ─── Dimensions ───────────────────────────────────────────────────────────────

export const collections = pgTable("collections", {
  id: serial("id").primaryKey(),
  tmdbId: integer("tmdb_id").notNull().unique(),
  name: text("name").notNull(),
  posterPath: text("poster_path"),
  backdropPath: text("backdrop_path"),
});

export const genres = pgTable("genres", {
  id: serial("id").primaryKey(),
  name: text("name").notNull().unique(),
}, (table) => [
  index("idx_genres_name").on(table.name),
]);

export const productionCompanies = pgTable("production_companies", {
  id: serial("id").primaryKey(),
  tmdbId: integer("tmdb_id").notNull().unique(),
  name: text("name").notNull(),
  logoPath: text("logo_path"),
  originCountry: char("origin_country", { length: 2 }),
}, (table) => [
  index("idx_prod_companies_name_trgm").using("gin", table.name.op("gin_trgm_ops")),
]);

export const productionCountries = pgTable("production_countries", {
  iso31661: char("iso_3166_1", { length: 2 }).primaryKey(),
  name: text("name").notNull(),
});

export const spokenLanguages = pgTable("spoken_languages", {
  iso6391: char("iso_639_1", { length: 2 }).primaryKey(),
  englishName: text("english_name").notNull(),
});

// ─── Fact table ───────────────────────────────────────────────────────────────

export const movies = pgTable("movies", {
  id: serial("id").primaryKey(),
  tmdbId: integer("tmdb_id").notNull().unique(),
  title: text("title").notNull(),
  originalTitle: text("original_title"),
  originalLanguage: char("original_language", { length: 2 }),
  adult: boolean("adult").notNull().default(false),
  status: text("status"),
  tagline: text("tagline"),
  overview: text("overview"),
  releaseDate: date("release_date"),
  runtime: integer("runtime"),
  budget: bigint("budget", { mode: "number" }),
  revenue: bigint("revenue", { mode: "number" }),
  popularity: numeric("popularity", { precision: 12, scale: 4 }),
  voteCount: integer("vote_count"),
  voteAverage: numeric("vote_average", { precision: 4, scale: 2 }),
  posterPath: text("poster_path"),
  backdropPath: text("backdrop_path"),
  homepage: text("homepage"),
  imdbId: text("imdb_id"),
  externalIds: jsonb("external_ids").$type<ExternalIds>(),
  crew: jsonb("crew").$type<CrewMember[]>(),
  originCountry: char("origin_country", { length: 2 }).array(),
  // a movie outlives its franchise grouping
  collectionId: integer("collection_id").references(() => collections.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index("idx_movies_release_date").on(table.releaseDate),
  index("idx_movies_popularity").on(table.popularity.desc()),
  index("idx_movies_vote_average").on(table.voteAverage.desc()),
  index("idx_movies_crew_gin").using("gin", table.crew),
  index("idx_movies_external_ids_gin").using("gin", table.externalIds),
  index("idx_movies_origin_country_gin").using("gin", table.originCountry),
]);

// ─── Associations ─────────────────────────────────────────────────────────────

export const movieGenres = pgTable("movie_genres", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  genreId: integer("genre_id").notNull().references(() => genres.id, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.genreId] }),
]);

export const movieProdCompanies = pgTable("movie_prod_companies", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  companyId: integer("company_id").notNull().references(() => productionCompanies.id, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.companyId] }),
]);

export const movieProdCountries = pgTable("movie_prod_countries", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  iso31661: char("iso_3166_1", { length: 2 }).notNull().references(() => productionCountries.iso31661, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.iso31661] }),
]);

export const movieSpokenLanguages = pgTable("movie_spoken_languages", {
  movieId: integer("movie_id").notNull().references(() => movies.id, { onDelete: "cascade" }),
  iso6391: char("iso_639_1", { length: 2 }).notNull().references(() => spokenLanguages.iso6391, { onDelete: "cascade" }),
}, (table) => [
  primaryKey({ columns: [table.movieId, table.iso6391] }),
]);

// Type exports for use in application
export type Movie = typeof movies.$inferSelect;
export type NewMovie = typeof movies.$inferInsert;

export type Genre = typeof genres.$inferSelect;
export type Collection = typeof collections.$inferSelect;
export type NewCollection = typeof collections.$inferInsert;
export type ProductionCompany = typeof productionCompanies.$inferSelect;
export type NewProductionCompany = typeof productionCompanies.$inferInsert;
export type ProductionCountry = typeof productionCountries.$inferSelect;
export type SpokenLanguage = typeof spokenLanguages.$inferSelect;
