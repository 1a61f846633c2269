import type { Food, MatchMode } from "../types/contracts.js";
import type { FoodCatalog } from "./catalog/types.js";
import { tokenizeQuery } from "./queryNormalizer.js";
import { isToxicFoodName, type ToxicityFilter } from "./toxicity.js";

export type RetrieveOptions = {
  isToxic?: ToxicityFilter;
  /** Admin tooling only; search never sets it. */
  includeUnsafe?: boolean;
};

export type RetrievedCandidates = {
  foods: Food[];
  tokens: string[];
  matchMode: "all" | "any" | "none";
};

export function retrieveCandidates(
  catalog: Pick<FoodCatalog, "searchByTokens">,
  term: string,
  limit: number,
  options: RetrieveOptions = {}
): RetrievedCandidates {
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new RangeError("limit must be > 0");
  }

  const tokens = tokenizeQuery(term);
  if (tokens.length === 0) {
    return { foods: [], tokens, matchMode: "none" };
  }

  const isToxic = options.isToxic ?? isToxicFoodName;
  const keep = (foods: Food[]) => (options.includeUnsafe ? foods : foods.filter((food) => !isToxic(food.name)));

  const conjunctive = collectSafe(catalog, tokens, "all", limit, keep);
  if (conjunctive.length > 0) {
    return { foods: conjunctive, tokens, matchMode: "all" };
  }

  const disjunctive = collectSafe(catalog, tokens, "any", limit, keep);
  return { foods: disjunctive, tokens, matchMode: disjunctive.length > 0 ? "any" : "none" };
}

/** Pages through matches until `limit` foods survive the filter or the catalog runs out. */
function collectSafe(
  catalog: Pick<FoodCatalog, "searchByTokens">,
  tokens: string[],
  matchMode: MatchMode,
  limit: number,
  keep: (foods: Food[]) => Food[]
): Food[] {
  const collected: Food[] = [];
  for (let offset = 0; collected.length < limit; offset += limit) {
    const page = catalog.searchByTokens(tokens, matchMode, limit, offset);
    collected.push(...keep(page));
    if (page.length < limit) {
      break;
    }
  }
  return collected.slice(0, limit);
}
