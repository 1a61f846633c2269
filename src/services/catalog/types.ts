import type { AliasHit, Food, MatchMode, NutrientVector } from "../../types/contracts.js";

export type FoodCatalog = {
  lookup: (id: number) => Food | null;
  /** Foods whose lower-cased name contains all (or any) tokens, alphabetical by name. */
  searchByTokens: (tokens: string[], matchMode: MatchMode, limit: number, offset?: number) => Food[];
  nutrientVector: (foodId: number) => NutrientVector;
};

export type AliasStore = {
  /** Aliases containing the query, weight descending then alias ascending. `lang` omitted means any language. */
  lookupByQuery: (query: string, lang?: string, limit?: number) => AliasHit[];
};

export type FoodImportRecord = {
  name: string;
  kcalPer100g: number;
  source: string;
  fdcId: number | null;
  nutrients: Record<string, number>;
};
