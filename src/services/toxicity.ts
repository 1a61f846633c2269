import { DEFAULT_TOXIC_KEYWORDS } from "../config/nutritionConfig.js";
import { normalizeToken } from "../utils/normalize.js";

export type ToxicityFilter = (name: string) => boolean;

export function createToxicityFilter(keywords: readonly string[] = DEFAULT_TOXIC_KEYWORDS): ToxicityFilter {
  const lowered = keywords
    .map(normalizeToken)
    .filter((keyword) => keyword.length > 0);

  return (name: string) => {
    const value = normalizeToken(String(name ?? ""));
    if (!value) {
      return false;
    }
    return lowered.some((keyword) => value.includes(keyword));
  };
}

export const isToxicFoodName: ToxicityFilter = createToxicityFilter();
