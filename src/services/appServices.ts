import { getEnv, type Env } from "../config/env.js";
import { createNutritionConfig, type NutritionConfig } from "../config/nutritionConfig.js";
import { createChildLogger } from "../utils/logger.js";
import { SqliteFoodCatalog } from "./catalog/sqliteFoodCatalog.js";

export type AppServices = {
  catalog: SqliteFoodCatalog;
  config: NutritionConfig;
};

const log = createChildLogger("appServices");

export function createAppServices(env: Env = getEnv()): AppServices {
  const config = createNutritionConfig({
    expansionsPath: env.ALIAS_EXPANSIONS_PATH,
    aliasSeedPath: env.ALIAS_SEED_PATH,
    optimizer: { maxIterations: env.OPTIMIZER_MAX_ITERATIONS }
  });
  const catalog = new SqliteFoodCatalog({ dbPath: env.FOODS_DB_PATH });

  log.info({
    msg: "Food catalog opened",
    dbPath: env.FOODS_DB_PATH,
    foods: catalog.countFoods(),
    aliasExpansions: config.aliasExpansions.size
  });

  return { catalog, config };
}
