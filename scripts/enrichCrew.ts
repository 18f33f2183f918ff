import { banner, readOption, run } from "./bootstrap";
import { EnrichmentService } from "../src/services/EnrichmentService";

run(async ({ injector, config }) => {
  banner("Crew Enrichment Script");

  if (!config.get("tmdbApiKey")) {
    throw new Error("TMDB_API_KEY not found in environment variables.");
  }

  const enrichment = injector.invoke<EnrichmentService>(EnrichmentService);
  const summary = await enrichment.enrichCrew({ cacheFile: readOption("cache") });
  console.table([summary]);

  console.log("\n" + "=".repeat(50));
  console.log("Crew enrichment complete!");
});
