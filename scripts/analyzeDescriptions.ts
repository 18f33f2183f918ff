import { banner, readOption, run } from "./bootstrap";
import { AnalysisService } from "../src/services/AnalysisService";

run(async ({ injector, config }) => {
  banner("Movie Description Analysis");

  const topOption = readOption("top");
  const topN = topOption ? Number(topOption) : config.get("topNWords");
  if (!Number.isInteger(topN) || topN <= 0) {
    throw new Error(`--top must be a positive integer, got "${topOption}"`);
  }

  const analysis = injector.invoke<AnalysisService>(AnalysisService);
  for (const { country, movies, words } of await analysis.topWordsByCountry(topN)) {
    console.log(`\nTop-${topN} words (${country}, ${movies} overviews)`);
    if (words.length === 0) {
      console.log("No descriptions found");
      continue;
    }
    console.table(words.map(({ word, count }, i) => ({ rank: i + 1, word, frequency: count })));
  }
});
