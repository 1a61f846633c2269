import { Router } from "express";
import { z } from "zod";
import type { NutritionConfig } from "../../config/nutritionConfig.js";
import type { FoodCatalog } from "../../services/catalog/types.js";
import { calculateRer, createDogProfile, dogProfileSchema } from "../../services/energy.js";
import { computeRequirements } from "../../services/nutrientRequirements.js";
import { optimizeRecipe } from "../../services/recipeOptimizer.js";
import type { RequirementsResponse } from "../../types/contracts.js";

export type NutritionRouterDeps = {
  catalog: Pick<FoodCatalog, "lookup" | "nutrientVector">;
  config: NutritionConfig;
};

const formulaRequestSchema = z.object({
  profile: dogProfileSchema,
  foodIds: z.array(z.coerce.number().int().positive()).max(100)
});

export function createNutritionRouter(deps: NutritionRouterDeps): Router {
  const router = Router();

  router.post("/requirements", (req, res) => {
    const profile = createDogProfile(req.body ?? {});
    const { mer, requirements } = computeRequirements(profile, deps.config);
    const response: RequirementsResponse = {
      rer: calculateRer(profile.weightKg),
      mer,
      activityFactor: deps.config.activityFactors[profile.activity],
      requirements
    };
    res.json(response);
  });

  router.post("/formula", (req, res) => {
    const payload = formulaRequestSchema.parse(req.body ?? {});
    const profile = createDogProfile(payload.profile);
    res.json(optimizeRecipe(deps, profile, payload.foodIds));
  });

  return router;
}
