import { banner, hasFlag, readOption, run } from "./bootstrap";
import { CatalogLoaderService } from "../src/services/CatalogLoaderService";
import { DatasetService } from "../src/services/DatasetService";

run(async ({ injector, config, database }) => {
  banner("Movie Load Script");

  const file = readOption("file") ?? config.get("dataFile");
  const onConflict = hasFlag("overwrite") ? "overwrite" : "skip";

  await database.initSchema();

  const dataset = injector.invoke<DatasetService>(DatasetService);
  const { records, linesRead, invalidLines } = await dataset.readMovies(file, { select: !hasFlag("all") });
  console.log(`Lines read: ${linesRead} (${invalidLines} invalid), records selected: ${records.length}`);

  const loader = injector.invoke<CatalogLoaderService>(CatalogLoaderService);
  const report = await loader.loadMovies(records, { onConflict });

  console.table([{
    processed: report.processed,
    inserted: report.inserted,
    skipped: report.skipped,
    overwritten: report.overwritten,
    rejected: report.rejected.length,
    failed: report.failed.length,
  }]);

  const problems = [...report.rejected, ...report.failed];
  if (problems.length) {
    console.log("\nRecords not loaded:");
    console.table(problems.slice(0, 20));
  }

  console.log("\n" + "=".repeat(50));
  console.log(`${config.get("targetGenre")} movies loaded!`);
});
