import { Router } from "express";
import { z } from "zod";
import { getEnv } from "../../config/env.js";
import type { NutritionConfig } from "../../config/nutritionConfig.js";
import { AppError } from "../../middleware/error.js";
import type { SqliteFoodCatalog } from "../../services/catalog/sqliteFoodCatalog.js";
import { searchFoods } from "../../services/foodSearch.js";
import { expandQuery } from "../../services/queryExpander.js";
import { clampInt } from "../../utils/normalize.js";

export type FoodsRouterDeps = {
  catalog: Pick<SqliteFoodCatalog, "lookup" | "searchByTokens" | "lookupByQuery" | "foodNutrients">;
  config: NutritionConfig;
};

const searchQuerySchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().positive().optional()
});

const foodIdSchema = z.object({
  id: z.coerce.number().int().positive()
});

export function createFoodsRouter(deps: FoodsRouterDeps): Router {
  const router = Router();
  const env = getEnv();

  router.get("/foods/search", (req, res) => {
    const query = searchQuerySchema.parse(req.query);
    const limit = clampInt(query.limit ?? env.SEARCH_DEFAULT_LIMIT, 1, env.SEARCH_MAX_LIMIT);
    const items = searchFoods({ catalog: deps.catalog, aliases: deps.catalog, config: deps.config }, query.q, limit);
    res.json({ items });
  });

  router.get("/foods/expand", (req, res) => {
    const query = searchQuerySchema.parse(req.query);
    res.json({ terms: expandQuery(query.q, deps.config) });
  });

  router.get("/foods/:id", (req, res) => {
    const { id } = foodIdSchema.parse(req.params);
    const food = deps.catalog.lookup(id);
    if (!food) {
      throw new AppError(`Food ${id} was not found`, 404, "food_not_found");
    }

    res.json({ ...food, nutrients: deps.catalog.foodNutrients(id) });
  });

  return router;
}
