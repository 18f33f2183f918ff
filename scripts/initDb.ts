import { banner, hasFlag, run } from "./bootstrap";

run(async ({ database }) => {
  banner("Catalog Schema Setup");

  if (hasFlag("reset")) {
    console.log("Dropping and recreating all catalog tables...");
    await database.resetSchema();
  } else {
    await database.initSchema();
  }

  console.log("\nTable row counts:");
  console.table(await database.getTableCounts());
  console.log("\n" + "=".repeat(50));
  console.log("Schema ready!");
});
