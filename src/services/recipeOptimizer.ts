import type { NutritionConfig } from "../config/nutritionConfig.js";
import type { DogProfile, FormulaItem, FormulaResult, NrcRow, NutrientVector } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { roundTo } from "../utils/normalize.js";
import type { FoodCatalog } from "./catalog/types.js";
import { buildNrcRows, computeRequirements } from "./nutrientRequirements.js";
import { createToxicityFilter, type ToxicityFilter } from "./toxicity.js";

export type OptimizerDeps = {
  catalog: Pick<FoodCatalog, "lookup" | "nutrientVector">;
  config: Pick<NutritionConfig, "nutrientReference" | "activityFactors" | "toxicKeywords" | "optimizer">;
  isToxic?: ToxicityFilter;
};

export type OptimizerFood = {
  id: number;
  name: string;
  nutrients: NutrientVector;
};

const ENERGY_KEY = "kcal";

const log = createChildLogger("recipeOptimizer");

/**
 * Greedy allocator: seeds an even energy split, then nudges the densest food for
 * every LOW/HIGH nutrient until all rows are OK or the iteration cap is hit.
 */
export function optimizeRecipe(deps: OptimizerDeps, profile: DogProfile, foodIds: number[]): FormulaResult {
  const { mer, requirements } = computeRequirements(profile, deps.config);
  const foods = prepareCandidates(deps, foodIds);

  if (foods.length === 0) {
    log.info({ msg: "No eligible foods for formula", requested: foodIds.length });
    return { feasible: false, reason: "no safe foods available", items: [], rows: [], mer, iterations: 0 };
  }

  const { maxIterations, negligibleGrams } = deps.config.optimizer;
  let grams = seedGrams(foods, mer);

  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    const rows = buildNrcRows(requirements, computeTotals(foods, grams));
    if (rows.every((row) => row.status === "OK")) {
      log.info({ msg: "Formula converged", foods: foods.length, iterations: iteration });
      return {
        feasible: true,
        reason: "ok",
        items: toFormulaItems(foods, grams, negligibleGrams),
        rows,
        mer,
        iterations: iteration
      };
    }
    grams = optimizerStep(foods, grams, rows);
  }

  const rows = buildNrcRows(requirements, computeTotals(foods, grams));
  log.info({
    msg: "Formula did not converge",
    foods: foods.length,
    iterations: maxIterations,
    offTarget: rows.filter((row) => row.status !== "OK").map((row) => row.nutrientKey)
  });
  return { feasible: false, reason: "no feasible solution", items: [], rows, mer, iterations: maxIterations };
}

/** Resolves ids in caller order, dropping unknown, duplicate, toxic and zero-energy foods. */
function prepareCandidates(deps: OptimizerDeps, foodIds: number[]): OptimizerFood[] {
  const isToxic = deps.isToxic ?? createToxicityFilter(deps.config.toxicKeywords);
  const seen = new Set<number>();
  const foods: OptimizerFood[] = [];

  for (const id of foodIds) {
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);

    const food = deps.catalog.lookup(id);
    if (!food || isToxic(food.name)) {
      continue;
    }
    const nutrients = deps.catalog.nutrientVector(id);
    if (!((nutrients[ENERGY_KEY] ?? 0) > 0)) {
      continue;
    }
    foods.push({ id: food.id, name: food.name, nutrients });
  }

  return foods;
}

function seedGrams(foods: OptimizerFood[], mer: number): number[] {
  const share = mer / foods.length;
  return foods.map((food) => share / ((food.nutrients[ENERGY_KEY] ?? 0) / 100));
}

function computeTotals(foods: OptimizerFood[], grams: readonly number[]): Record<string, number> {
  const totals: Record<string, number> = {};
  foods.forEach((food, index) => {
    const amount = grams[index] ?? 0;
    for (const [key, per100g] of Object.entries(food.nutrients)) {
      totals[key] = (totals[key] ?? 0) + (per100g * amount) / 100;
    }
  });
  return totals;
}

/**
 * One iteration over the rows of the current grams vector. Returns a new vector;
 * the input is left untouched.
 */
export function optimizerStep(foods: OptimizerFood[], grams: readonly number[], rows: NrcRow[]): number[] {
  const next = [...grams];

  for (const row of rows) {
    if (row.status === "OK") {
      continue;
    }

    const index = densestFoodIndex(foods, row.nutrientKey);
    const density = foods[index]?.nutrients[row.nutrientKey] ?? 0;
    if (density <= 0) {
      continue;
    }

    const current = next[index] ?? 0;
    if (row.status === "LOW") {
      next[index] = current + ((row.minimum - row.actual) / density) * 100;
    } else if (row.maximum !== null) {
      next[index] = Math.max(0, current - ((row.actual - row.maximum) / density) * 100);
    }
  }

  return next;
}

/** Index of the highest density; the earliest candidate wins ties. */
export function densestFoodIndex(foods: OptimizerFood[], nutrientKey: string): number {
  let bestIndex = 0;
  let bestDensity = -Infinity;
  foods.forEach((food, index) => {
    const density = food.nutrients[nutrientKey] ?? 0;
    if (density > bestDensity) {
      bestDensity = density;
      bestIndex = index;
    }
  });
  return bestIndex;
}

function toFormulaItems(foods: OptimizerFood[], grams: readonly number[], negligibleGrams: number): FormulaItem[] {
  const items: FormulaItem[] = [];
  foods.forEach((food, index) => {
    const rounded = roundTo(grams[index] ?? 0, 1);
    if (rounded < negligibleGrams) {
      return;
    }
    items.push({ foodId: food.id, foodName: food.name, grams: rounded });
  });
  return items;
}
