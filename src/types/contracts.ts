export type ActivityLevel = "low" | "normal" | "high";

export type DogProfile = {
  readonly weightKg: number;
  readonly neutered: boolean;
  readonly activity: ActivityLevel;
};

export type Food = {
  id: number;
  name: string;
  kcalPer100g: number;
  source: string;
  fdcId: number | null;
};

/** Amount per 100 g keyed by nutrient key; always carries `kcal`. */
export type NutrientVector = Record<string, number>;

export type NutrientMeta = {
  nutrientKey: string;
  displayName: string;
  unit: string;
};

export type FoodNutrient = NutrientMeta & {
  amountPer100g: number;
};

export type AliasHit = {
  food: Food;
  alias: string;
  lang: string;
  weight: number;
};

export type MatchMode = "all" | "any";

export type NutrientReferenceEntry = {
  nutrientKey: string;
  min: number;
  suggest: number;
  max: number | null;
};

export type NutrientRequirement = {
  nutrientKey: string;
  minPerDay: number;
  suggestPerDay: number;
  maxPerDay: number | null;
};

export type NrcStatus = "LOW" | "OK" | "HIGH";

export type NrcRow = {
  nutrientKey: string;
  minimum: number;
  suggest: number;
  maximum: number | null;
  actual: number;
  status: NrcStatus;
};

export type FormulaItem = {
  foodId: number;
  foodName: string;
  grams: number;
};

export type FormulaFailureReason = "no safe foods available" | "no feasible solution";

export type FormulaResult = {
  feasible: boolean;
  reason: "ok" | FormulaFailureReason;
  items: FormulaItem[];
  rows: NrcRow[];
  mer: number;
  iterations: number;
};

export type RequirementsResponse = {
  rer: number;
  mer: number;
  activityFactor: number;
  requirements: NutrientRequirement[];
};

export type QueryIntent = "egg" | "poultry";

export type IntentPart = {
  /** Substrings of the raw query that select this part. */
  markers: string[];
  /** Search terms injected, most specific first. */
  terms: string[];
  /** Name tokens that earn a ranking boost. */
  tokens: string[];
};

export type IntentRule = {
  intent: QueryIntent;
  markers: string[];
  /** Phrases whose markers do not count, e.g. turkey (火鸡) for poultry. */
  excludes: string[];
  /** Terms injected when no part marker matches. */
  defaultTerms: string[];
  /** Generic species/product terms. */
  genericTerms: string[];
  /** Intents whose generic terms are stripped from the expansion when this intent is detected. */
  suppresses: QueryIntent[];
  /** Name token that identifies a food of this intent. */
  identityToken: string;
  /** Name tokens that mark a cross-intent false positive. */
  conflictTokens: string[];
  parts: IntentPart[];
};

export type CsvImportSummary = {
  imported: number;
  skipped: number;
  skipReasons: Record<string, number>;
};
