import { sql, SQL } from "drizzle-orm";

// Runtime DDL for the catalog. Keep in step with ./schema.ts.
// One statement per entry: the embedded driver rejects multi-statement queries.

export const CREATE_SCHEMA_STATEMENTS: SQL[] = [
  sql`CREATE EXTENSION IF NOT EXISTS pg_trgm`,

  sql`
    CREATE TABLE IF NOT EXISTS collections (
      id            SERIAL PRIMARY KEY,
      tmdb_id       INTEGER UNIQUE NOT NULL,
      name          TEXT    NOT NULL,
      poster_path   TEXT,
      backdrop_path TEXT
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS genres (
      id   SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS production_companies (
      id             SERIAL PRIMARY KEY,
      tmdb_id        INTEGER UNIQUE NOT NULL,
      name           TEXT NOT NULL,
      logo_path      TEXT,
      origin_country CHAR(2)
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS production_countries (
      iso_3166_1 CHAR(2) PRIMARY KEY,
      name       TEXT NOT NULL
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS spoken_languages (
      iso_639_1    CHAR(2) PRIMARY KEY,
      english_name TEXT NOT NULL
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS movies (
      id                SERIAL PRIMARY KEY,
      tmdb_id           INTEGER UNIQUE NOT NULL,
      title             TEXT NOT NULL,
      original_title    TEXT,
      original_language CHAR(2),
      adult             BOOLEAN NOT NULL DEFAULT FALSE,
      status            TEXT,
      tagline           TEXT,
      overview          TEXT,
      release_date      DATE,
      runtime           INT,
      budget            BIGINT,
      revenue           BIGINT,
      popularity        NUMERIC(12,4),
      vote_count        INT,
      vote_average      NUMERIC(4,2),
      poster_path       TEXT,
      backdrop_path     TEXT,
      homepage          TEXT,
      imdb_id           TEXT,
      external_ids      JSONB,
      crew              JSONB,
      origin_country    CHAR(2)[],
      collection_id     INT REFERENCES collections(id) ON DELETE SET NULL,
      created_at        TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS movie_genres (
      movie_id INT REFERENCES movies(id) ON DELETE CASCADE,
      genre_id INT REFERENCES genres(id) ON DELETE CASCADE,
      PRIMARY KEY (movie_id, genre_id)
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS movie_prod_companies (
      movie_id   INT REFERENCES movies(id)               ON DELETE CASCADE,
      company_id INT REFERENCES production_companies(id) ON DELETE CASCADE,
      PRIMARY KEY (movie_id, company_id)
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS movie_prod_countries (
      movie_id   INT REFERENCES movies(id) ON DELETE CASCADE,
      iso_3166_1 CHAR(2) REFERENCES production_countries(iso_3166_1) ON DELETE CASCADE,
      PRIMARY KEY (movie_id, iso_3166_1)
    )
  `,
  sql`
    CREATE TABLE IF NOT EXISTS movie_spoken_languages (
      movie_id  INT REFERENCES movies(id) ON DELETE CASCADE,
      iso_639_1 CHAR(2) REFERENCES spoken_languages(iso_639_1) ON DELETE CASCADE,
      PRIMARY KEY (movie_id, iso_639_1)
    )
  `,

  sql`CREATE INDEX IF NOT EXISTS idx_movies_release_date ON movies(release_date)`,
  sql`CREATE INDEX IF NOT EXISTS idx_movies_popularity ON movies(popularity DESC)`,
  sql`CREATE INDEX IF NOT EXISTS idx_movies_vote_average ON movies(vote_average DESC)`,
  sql`CREATE INDEX IF NOT EXISTS idx_movies_crew_gin ON movies USING GIN (crew)`,
  sql`CREATE INDEX IF NOT EXISTS idx_movies_external_ids_gin ON movies USING GIN (external_ids)`,
  sql`CREATE INDEX IF NOT EXISTS idx_movies_origin_country_gin ON movies USING GIN (origin_country)`,
  sql`CREATE INDEX IF NOT EXISTS idx_genres_name ON genres(name)`,
  sql`CREATE INDEX IF NOT EXISTS idx_prod_companies_name_trgm ON production_companies USING GIN (name gin_trgm_ops)`,
];

// Dependents first.
export const DROP_SCHEMA_STATEMENTS: SQL[] = [
  sql`DROP TABLE IF EXISTS movie_spoken_languages CASCADE`,
  sql`DROP TABLE IF EXISTS movie_prod_countries CASCADE`,
  sql`DROP TABLE IF EXISTS movie_prod_companies CASCADE`,
  sql`DROP TABLE IF EXISTS movie_genres CASCADE`,
  sql`DROP TABLE IF EXISTS movies CASCADE`,
  sql`DROP TABLE IF EXISTS spoken_languages CASCADE`,
  sql`DROP TABLE IF EXISTS production_countries CASCADE`,
  sql`DROP TABLE IF EXISTS production_companies CASCADE`,
  sql`DROP TABLE IF EXISTS collections CASCADE`,
  sql`DROP TABLE IF EXISTS genres CASCADE`,
];
