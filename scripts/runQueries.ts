import { banner, run } from "./bootstrap";
import { SampleQueriesService } from "../src/services/SampleQueriesService";

run(async ({ injector }) => {
  banner("Catalog Sample Queries");

  const queries = injector.invoke<SampleQueriesService>(SampleQueriesService);
  for (const [i, { description, rows }] of (await queries.runAll()).entries()) {
    console.log(`\n${i + 1}. ${description}`);
    if (rows.length === 0) {
      console.log("No results");
      continue;
    }
    console.table(rows);
  }
});
