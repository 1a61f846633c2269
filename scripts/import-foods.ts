import fs from "node:fs";
import path from "node:path";
import { getEnv } from "../src/config/env.js";
import { DEFAULT_NUTRIENT_REFERENCE } from "../src/config/nutritionConfig.js";
import { describeNutrient, parseFoodCsv } from "../src/ingestion/foodCsv.js";
import { SqliteFoodCatalog } from "../src/services/catalog/sqliteFoodCatalog.js";
import { createChildLogger } from "../src/utils/logger.js";

const log = createChildLogger("importFoods");

function main(): void {
  const csvPath = process.argv[2];
  if (!csvPath) {
    log.error({ msg: "Usage: import-foods <foods.csv> [source]" });
    process.exitCode = 1;
    return;
  }

  const source = process.argv[3] ?? "usda";
  const env = getEnv();
  const resolved = path.resolve(csvPath);
  const { records, summary } = parseFoodCsv(fs.readFileSync(resolved, "utf8"), { source });

  const catalog = new SqliteFoodCatalog({ dbPath: env.FOODS_DB_PATH });
  try {
    for (const entry of DEFAULT_NUTRIENT_REFERENCE) {
      catalog.upsertNutrientMeta(describeNutrient(entry.nutrientKey));
    }
    const imported = catalog.importFoods(records);
    log.info({
      msg: "Food import finished",
      file: resolved,
      dbPath: env.FOODS_DB_PATH,
      imported,
      skipped: summary.skipped,
      skipReasons: summary.skipReasons,
      totalFoods: catalog.countFoods()
    });
  } finally {
    catalog.close();
  }
}

main();
