import { Inject, Injectable, ProviderScope } from "@tsed/di";
import { $log } from "@tsed/logger";
import { count } from "drizzle-orm";
import { drizzle as drizzleNodePg } from "drizzle-orm/node-postgres";
import { drizzle as drizzlePglite } from "drizzle-orm/pglite";
import { PgDatabase, PgQueryResultHKT, PgTable } from "drizzle-orm/pg-core";
import { PGlite } from "@electric-sql/pglite";
import { pg_trgm } from "@electric-sql/pglite/contrib/pg_trgm";
import { Pool } from "pg";
import * as schema from "../db/schema";
import { CREATE_SCHEMA_STATEMENTS, DROP_SCHEMA_STATEMENTS } from "../db/ddl";
import { ConfigService } from "./ConfigService";

// Accepts both the node-postgres and the embedded PGlite driver, and transactions of either.
export type CatalogDatabase = PgDatabase<PgQueryResultHKT, typeof schema>;

export type TableCounts = Record<
  | "movies"
  | "genres"
  | "collections"
  | "productionCompanies"
  | "productionCountries"
  | "spokenLanguages"
  | "movieGenres"
  | "movieProdCompanies"
  | "movieProdCountries"
  | "movieSpokenLanguages",
  number
>;

const MEMORY_URL = "memory://";
const FILE_URL_PREFIX = "file://";

export function isEmbeddedUrl(databaseUrl: string): boolean {
  return databaseUrl.startsWith(MEMORY_URL) || databaseUrl.startsWith(FILE_URL_PREFIX);
}

@Injectable({
  scope: ProviderScope.SINGLETON
})
export class DatabaseService {
    @Inject()
    private configService!: ConfigService;

    private dbInstance: CatalogDatabase | null = null;
    private closeClient: (() => Promise<void>) | null = null;

    getDb(): CatalogDatabase {
        if (!this.dbInstance) {
            const databaseUrl = this.configService.get("databaseUrl");

            if (isEmbeddedUrl(databaseUrl)) {
                const dataDir = databaseUrl.startsWith(FILE_URL_PREFIX)
                    ? databaseUrl.slice(FILE_URL_PREFIX.length)
                    : MEMORY_URL;
                const client = new PGlite(dataDir, { extensions: { pg_trgm } });
                this.dbInstance = drizzlePglite(client, { schema });
                this.closeClient = () => client.close();
                $log.debug(`Opened embedded database at ${dataDir}`);
            } else {
                const pool = new Pool({ connectionString: databaseUrl });
                this.dbInstance = drizzleNodePg(pool, { schema });
                this.closeClient = () => pool.end();
            }
        }
        return this.dbInstance;
    }

    async closeConnections(): Promise<void> {
        if (this.closeClient) {
            const close = this.closeClient;
            this.closeClient = null;
            this.dbInstance = null;
            await close();
        }
    }

    async initSchema(): Promise<void> {
        const db = this.getDb();
        for (const statement of CREATE_SCHEMA_STATEMENTS) {
            await db.execute(statement);
        }
    }

    async resetSchema(): Promise<void> {
        const db = this.getDb();
        for (const statement of DROP_SCHEMA_STATEMENTS) {
            await db.execute(statement);
        }
        await this.initSchema();
    }

    async getTableCounts(): Promise<TableCounts> {
        const db = this.getDb();
        const countOf = async (table: PgTable): Promise<number> => {
            const [row] = await db.select({ n: count() }).from(table);
            return row?.n ?? 0;
        };

        return {
            movies: await countOf(schema.movies),
            genres: await countOf(schema.genres),
            collections: await countOf(schema.collections),
            productionCompanies: await countOf(schema.productionCompanies),
            productionCountries: await countOf(schema.productionCountries),
            spokenLanguages: await countOf(schema.spokenLanguages),
            movieGenres: await countOf(schema.movieGenres),
            movieProdCompanies: await countOf(schema.movieProdCompanies),
            movieProdCountries: await countOf(schema.movieProdCountries),
            movieSpokenLanguages: await countOf(schema.movieSpokenLanguages),
        };
    }
}
