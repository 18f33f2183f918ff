import "reflect-metadata";

export * from "./config";
export * from "./errors";
export * from "./types/records";
export * as schema from "./db/schema";
export type { CrewMember, ExternalIds } from "./db/schema";
export * from "./services/ConfigService";
export * from "./services/DatabaseService";
export * from "./services/ValidationService";
export * from "./services/CatalogLoaderService";
export * from "./services/MoviesService";
export * from "./services/TmdbService";
export * from "./services/CreditsCache";
export * from "./services/EnrichmentService";
export * from "./services/DatasetService";
export * from "./services/AnalysisService";
export * from "./services/SampleQueriesService";
export * from "./services/ReportService";
export * from "./utils/stats";
export * from "./utils/text";
