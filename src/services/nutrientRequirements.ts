import type { NutritionConfig } from "../config/nutritionConfig.js";
import type { DogProfile, NrcRow, NrcStatus, NutrientRequirement } from "../types/contracts.js";
import { calculateMer } from "./energy.js";

export type RequirementsConfig = Pick<NutritionConfig, "nutrientReference" | "activityFactors">;

export type ComputedRequirements = {
  mer: number;
  requirements: NutrientRequirement[];
};

export function computeRequirements(profile: DogProfile, config: RequirementsConfig): ComputedRequirements {
  const mer = calculateMer(profile, config.activityFactors);
  const scale = mer / 1000;

  const requirements = config.nutrientReference.map((entry) => ({
    nutrientKey: entry.nutrientKey,
    minPerDay: entry.min * scale,
    suggestPerDay: entry.suggest * scale,
    maxPerDay: entry.max === null ? null : entry.max * scale
  }));

  return { mer, requirements };
}

export function nrcStatus(actual: number, minimum: number, maximum: number | null): NrcStatus {
  if (actual < minimum) {
    return "LOW";
  }
  if (maximum !== null && actual > maximum) {
    return "HIGH";
  }
  return "OK";
}

export function buildNrcRows(requirements: NutrientRequirement[], totals: Record<string, number>): NrcRow[] {
  return requirements.map((requirement) => {
    const actual = totals[requirement.nutrientKey] ?? 0;
    return {
      nutrientKey: requirement.nutrientKey,
      minimum: requirement.minPerDay,
      suggest: requirement.suggestPerDay,
      maximum: requirement.maxPerDay,
      actual,
      status: nrcStatus(actual, requirement.minPerDay, requirement.maxPerDay)
    };
  });
}
