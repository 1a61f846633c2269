import { z } from "zod";
import { DEFAULT_ACTIVITY_FACTORS } from "../config/nutritionConfig.js";
import type { ActivityLevel, DogProfile } from "../types/contracts.js";

// JSON numbers, or a plain decimal string from a form post; booleans and arrays are rejected.
const weightInput = z.union([
  z.number(),
  z.string().trim().regex(/^\d+(\.\d+)?$/, { message: "weightKg must be a number" }).transform(Number)
], { errorMap: () => ({ message: "weightKg must be a number" }) });

export const dogProfileSchema = z.object({
  weightKg: weightInput.pipe(z.number().finite().positive({ message: "weightKg must be greater than 0" })),
  neutered: z.boolean().default(true),
  activity: z.enum(["low", "normal", "high"], {
    errorMap: () => ({ message: "activity must be one of: low, normal, high" })
  }).default("normal")
});

export type DogProfileInput = z.input<typeof dogProfileSchema>;

/** Validates and freezes a profile; throws ZodError on invalid weight or activity. */
export function createDogProfile(input: DogProfileInput): DogProfile {
  return Object.freeze(dogProfileSchema.parse(input));
}

/** Resting Energy Requirement, kcal/day. */
export function calculateRer(weightKg: number): number {
  return 70 * weightKg ** 0.75;
}

/** Maintenance Energy Requirement, kcal/day. */
export function calculateMer(
  profile: DogProfile,
  activityFactors: Readonly<Record<ActivityLevel, number>> = DEFAULT_ACTIVITY_FACTORS
): number {
  return calculateRer(profile.weightKg) * activityFactors[profile.activity];
}
