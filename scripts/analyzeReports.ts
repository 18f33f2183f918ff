import { banner, readOption, run } from "./bootstrap";
import { ReportService } from "../src/services/ReportService";

run(async ({ injector, config }) => {
  banner(`Analyzing ${config.get("targetGenre")} Movies`);

  const reports = injector.invoke<ReportService>(ReportService);
  const outputDir = readOption("out") ?? config.get("reportsDir");
  const written = await reports.writeReports(outputDir);

  console.log("\n" + "=".repeat(50));
  console.log(written.length ? `Analysis complete. ${written.length} reports generated in '${outputDir}'` : "No reports generated");
});
