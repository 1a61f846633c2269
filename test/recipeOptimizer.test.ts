import test from "node:test";
import assert from "node:assert/strict";
import { createNutritionConfig, type NutritionConfig } from "../src/config/nutritionConfig.js";
import { SqliteFoodCatalog } from "../src/services/catalog/sqliteFoodCatalog.js";
import { calculateMer, createDogProfile } from "../src/services/energy.js";
import {
  densestFoodIndex,
  optimizeRecipe,
  optimizerStep,
  type OptimizerFood
} from "../src/services/recipeOptimizer.js";
import { roundTo } from "../src/utils/normalize.js";
import { createFixtureCatalog, SUPPLEMENT_NUTRIENTS } from "./helpers/foodFixtures.js";

const config = createNutritionConfig();

function proteinOnlyConfig(): NutritionConfig {
  return {
    ...config,
    nutrientReference: [{ nutrientKey: "protein_g", min: 50, suggest: 60, max: null }]
  };
}

test("a food matching the suggested intake is feasible immediately", () => {
  const { catalog, ids } = createFixtureCatalog();
  const profile = createDogProfile({ weightKg: 5, activity: "low" });

  const result = optimizeRecipe({ catalog, config }, profile, [ids.supplement]);

  assert.equal(result.feasible, true);
  assert.equal(result.reason, "ok");
  assert.equal(result.iterations, 0);
  assert.deepEqual(result.items, [
    { foodId: ids.supplement, foodName: "Supplement Mix", grams: roundTo(calculateMer(profile), 1) }
  ]);
  assert.equal(result.rows.length, 16);
  assert.ok(result.rows.every((row) => row.status === "OK"));
  catalog.close();
});

test("ties on nutrient density go to the earliest candidate", () => {
  const catalog = new SqliteFoodCatalog({ dbPath: ":memory:" });
  const rabbit = catalog.upsertFood({ name: "Rabbit, raw", kcalPer100g: 100, source: "fixture" });
  const venison = catalog.upsertFood({ name: "Venison, raw", kcalPer100g: 100, source: "fixture" });
  catalog.upsertFoodNutrient(rabbit, "protein_g", 2);
  catalog.upsertFoodNutrient(venison, "protein_g", 2);
  const deps = { catalog, config: proteinOnlyConfig() };
  const profile = createDogProfile({ weightKg: 10 });

  const forward = optimizeRecipe(deps, profile, [rabbit, venison]);
  const reversed = optimizeRecipe(deps, profile, [venison, rabbit]);

  assert.equal(forward.feasible, true);
  assert.deepEqual(forward.items.map((item) => item.foodId), [rabbit, venison]);
  assert.ok((forward.items[0]?.grams ?? 0) > (forward.items[1]?.grams ?? 0));

  assert.deepEqual(reversed.items.map((item) => item.foodId), [venison, rabbit]);
  assert.ok((reversed.items[0]?.grams ?? 0) > (reversed.items[1]?.grams ?? 0));

  assert.deepEqual(optimizeRecipe(deps, profile, [rabbit, venison]), forward);
  catalog.close();
});

test("a nutrient no candidate supplies ends infeasible at the iteration cap", () => {
  const catalog = new SqliteFoodCatalog({ dbPath: ":memory:" });
  const { vit_d_ug: _vitaminD, ...withoutVitaminD } = SUPPLEMENT_NUTRIENTS;
  catalog.importFoods([
    { name: "Base Mix", kcalPer100g: 100, source: "fixture", fdcId: null, nutrients: withoutVitaminD }
  ]);
  const capped = createNutritionConfig({ optimizer: { maxIterations: 5 } });

  const result = optimizeRecipe({ catalog, config: capped }, createDogProfile({ weightKg: 5, activity: "low" }), [1]);

  assert.equal(result.feasible, false);
  assert.equal(result.reason, "no feasible solution");
  assert.equal(result.iterations, 5);
  assert.deepEqual(result.items, []);
  assert.deepEqual(
    result.rows.filter((row) => row.status !== "OK").map((row) => [row.nutrientKey, row.status, row.actual]),
    [["vit_d_ug", "LOW", 0]]
  );
  catalog.close();
});

test("unknown, toxic and zero-energy foods leave nothing to optimize", () => {
  const { catalog, ids } = createFixtureCatalog();
  const water = catalog.upsertFood({ name: "Water, tap", kcalPer100g: 0, source: "fixture" });

  const result = optimizeRecipe({ catalog, config }, createDogProfile({ weightKg: 10 }), [ids.onion, water, 9999]);

  assert.equal(result.feasible, false);
  assert.equal(result.reason, "no safe foods available");
  assert.deepEqual(result.items, []);
  assert.deepEqual(result.rows, []);
  assert.equal(result.iterations, 0);
  assert.ok(result.mer > 0);
  catalog.close();
});

test("optimizerStep returns a new vector and never goes below zero", () => {
  const foods: OptimizerFood[] = [
    { id: 1, name: "Sardine, canned in water", nutrients: { kcal: 100, na_mg: 100 } },
    { id: 2, name: "Pumpkin, raw", nutrients: { kcal: 26, na_mg: 100 } }
  ];
  const grams = [200, 50];

  const trimmed = optimizerStep(foods, grams, [
    { nutrientKey: "na_mg", minimum: 10, suggest: 20, maximum: 50, actual: 200, status: "HIGH" }
  ]);
  assert.deepEqual(trimmed, [50, 50]);
  assert.deepEqual(grams, [200, 50]);

  const clamped = optimizerStep(foods, grams, [
    { nutrientKey: "na_mg", minimum: 10, suggest: 20, maximum: 10, actual: 1000, status: "HIGH" }
  ]);
  assert.deepEqual(clamped, [0, 50]);

  const untouched = optimizerStep(foods, grams, [
    { nutrientKey: "zn_mg", minimum: 10, suggest: 12, maximum: null, actual: 0, status: "LOW" }
  ]);
  assert.deepEqual(untouched, [200, 50]);
});

test("densestFoodIndex picks the first of equally dense foods", () => {
  const foods: OptimizerFood[] = [
    { id: 1, name: "Rabbit, raw", nutrients: { kcal: 100, protein_g: 20 } },
    { id: 2, name: "Venison, raw", nutrients: { kcal: 100, protein_g: 20 } },
    { id: 3, name: "Rice, white, cooked", nutrients: { kcal: 130 } }
  ];

  assert.equal(densestFoodIndex(foods, "protein_g"), 0);
  assert.equal(densestFoodIndex(foods, "fat_g"), 0);
});
