import type { NutritionConfig } from "../config/nutritionConfig.js";
import type { Food, MatchMode } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { nameTokens } from "../utils/normalize.js";
import type { AliasStore, FoodCatalog } from "./catalog/types.js";
import { retrieveCandidates } from "./candidateRetriever.js";
import { detectIntent, expandQuery, type DetectedIntent } from "./queryExpander.js";
import { normalizeQuery } from "./queryNormalizer.js";
import { createToxicityFilter, type ToxicityFilter } from "./toxicity.js";

export type FoodSearchDeps = {
  catalog: Pick<FoodCatalog, "searchByTokens">;
  aliases: AliasStore;
  config: Pick<NutritionConfig, "aliasExpansions" | "intentRules" | "toxicKeywords">;
  isToxic?: ToxicityFilter;
};

export type RankedFood = {
  food: Food;
  /** 0 = direct alias hit, 1 = hit through an expanded search term. */
  tier: 0 | 1;
  aliasWeight: number;
  alias: string;
  /** Tokens of the matched term found in the food name. */
  specificity: number;
  matchedTerm: string;
  /** How the matched term reached the food; alias hits carry `null`. */
  matchMode: MatchMode | null;
  intentScore: number;
};

const IDENTITY_BOOST = 2;
const PART_BOOST = 1;
const CONFLICT_PENALTY = 3;

const log = createChildLogger("foodSearch");

export function searchFoods(deps: FoodSearchDeps, query: string, limit: number): Food[] {
  return rankFoods(deps, query, limit).map((entry) => entry.food);
}

export function rankFoods(deps: FoodSearchDeps, query: string, limit: number): RankedFood[] {
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new RangeError("limit must be > 0");
  }

  const { normalized, tokens } = normalizeQuery(query);
  if (!normalized || tokens.length === 0) {
    return [];
  }

  const isToxic = deps.isToxic ?? createToxicityFilter(deps.config.toxicKeywords);
  const detected = detectIntent(normalized, deps.config.intentRules);
  const merged = new Map<number, RankedFood>();

  for (const hit of deps.aliases.lookupByQuery(normalized, undefined, limit)) {
    const candidate: RankedFood = {
      food: hit.food,
      tier: 0,
      aliasWeight: hit.weight,
      alias: hit.alias,
      specificity: 0,
      matchedTerm: hit.alias,
      matchMode: null,
      intentScore: scoreIntent(hit.food.name, detected)
    };
    keepBest(merged, candidate);
  }

  const terms = expandQuery(query, deps.config);
  for (const term of terms) {
    const retrieved = retrieveCandidates(deps.catalog, term, limit, { isToxic });
    for (const food of retrieved.foods) {
      keepBest(merged, {
        food,
        tier: 1,
        aliasWeight: 0,
        alias: "",
        specificity: countMatchedTokens(food.name, retrieved.tokens),
        matchedTerm: term,
        matchMode: retrieved.matchMode === "none" ? null : retrieved.matchMode,
        intentScore: scoreIntent(food.name, detected)
      });
    }
  }

  const ranked = Array.from(merged.values())
    .filter((entry) => !isToxic(entry.food.name))
    .sort(compareRanked)
    .slice(0, limit);

  log.debug({
    msg: "Food search ranked",
    query: normalized,
    intent: detected?.rule.intent ?? null,
    terms: terms.length,
    candidates: merged.size,
    returned: ranked.length
  });

  return ranked;
}

/**
 * Intent-weighted lexical score: rewards the intent's identity token and the
 * requested part, penalizes names that carry a conflicting species instead.
 */
export function scoreIntent(name: string, detected: DetectedIntent | null): number {
  if (!detected) {
    return 0;
  }

  const tokens = new Set(nameTokens(name));
  const has = (token: string) => tokens.has(token) || tokens.has(`${token}s`);

  let score = 0;
  const hasIdentity = has(detected.rule.identityToken);
  if (hasIdentity) {
    score += IDENTITY_BOOST;
  }
  for (const token of detected.part?.tokens ?? []) {
    if (has(token)) {
      score += PART_BOOST;
    }
  }
  if (!hasIdentity && detected.rule.conflictTokens.some(has)) {
    score -= CONFLICT_PENALTY;
  }
  return score;
}

function countMatchedTokens(name: string, tokens: string[]): number {
  const lowered = name.toLowerCase();
  return tokens.filter((token) => lowered.includes(token)).length;
}

function keepBest(merged: Map<number, RankedFood>, candidate: RankedFood): void {
  const previous = merged.get(candidate.food.id);
  if (!previous || compareRanked(candidate, previous) < 0) {
    merged.set(candidate.food.id, candidate);
  }
}

function compareRanked(left: RankedFood, right: RankedFood): number {
  if (left.tier !== right.tier) {
    return left.tier - right.tier;
  }

  if (left.tier === 0) {
    const byWeight = right.aliasWeight - left.aliasWeight;
    if (byWeight !== 0) return byWeight;
    const byAlias = compareText(left.alias, right.alias);
    if (byAlias !== 0) return byAlias;
  } else {
    // A name carrying a conflicting species sinks below every non-conflicting hit.
    const byConflict = Number(left.intentScore < 0) - Number(right.intentScore < 0);
    if (byConflict !== 0) return byConflict;
    const bySpecificity = right.specificity - left.specificity;
    if (bySpecificity !== 0) return bySpecificity;
    const byTermLength = termLengthCredit(right) - termLengthCredit(left);
    if (byTermLength !== 0) return byTermLength;
  }

  const byIntent = right.intentScore - left.intentScore;
  if (byIntent !== 0) return byIntent;

  const byName = compareText(left.food.name.toLowerCase(), right.food.name.toLowerCase());
  if (byName !== 0) return byName;
  return left.food.id - right.food.id;
}

/** Only a term matched in full earns credit for its length. */
function termLengthCredit(entry: RankedFood): number {
  return entry.matchMode === "all" ? Array.from(entry.matchedTerm).length : 0;
}

function compareText(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
