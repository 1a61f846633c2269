import type { NutritionConfig } from "../config/nutritionConfig.js";
import type { IntentPart, IntentRule } from "../types/contracts.js";
import { normalizeQuery } from "./queryNormalizer.js";

export type ExpansionContext = Pick<NutritionConfig, "aliasExpansions" | "intentRules">;

export type DetectedIntent = {
  rule: IntentRule;
  part: IntentPart | null;
};

const MASK = "\u0000";

/**
 * Turns a (possibly non-English) query into ordered search terms, most specific first:
 * the normalized query, alias-table expansions (longest key first), then intent terms.
 */
export function expandQuery(query: string, context: ExpansionContext): string[] {
  const { normalized } = normalizeQuery(query);
  if (!normalized) {
    return [];
  }

  const expanded: string[] = [normalized];
  expanded.push(...matchAliasExpansions(normalized, context.aliasExpansions));

  const detected = detectIntent(normalized, context.intentRules);
  if (detected) {
    expanded.push(...(detected.part?.terms ?? detected.rule.defaultTerms));
  }

  const suppressed = suppressedTerms(detected, context.intentRules);
  return dedupeTerms(expanded.filter((term) => !suppressed.has(term.toLowerCase())));
}

/** First rule whose marker occurs in the query wins; rules are ordered by precedence. */
export function detectIntent(query: string, rules: readonly IntentRule[]): DetectedIntent | null {
  const lowered = query.trim().toLowerCase();
  if (!lowered) {
    return null;
  }

  for (const rule of rules) {
    const haystack = rule.excludes.reduce((text, phrase) => text.replaceAll(phrase, " "), lowered);
    if (!rule.markers.some((marker) => haystack.includes(marker))) {
      continue;
    }
    const part = rule.parts.find((entry) => entry.markers.some((marker) => haystack.includes(marker))) ?? null;
    return { rule, part };
  }

  return null;
}

export function matchAliasExpansions(
  normalized: string,
  table: ReadonlyMap<string, readonly string[]>
): string[] {
  const keys = Array.from(table.keys())
    .filter((key) => key.length > 0)
    .sort((left, right) => codePointLength(right) - codePointLength(left) || compareText(left, right));

  let working = normalized;
  const terms: string[] = [];
  for (const key of keys) {
    if (!working.includes(key)) {
      continue;
    }
    terms.push(...(table.get(key) ?? []));
    // A shorter key must not match inside a span a longer key already claimed.
    working = working.replaceAll(key, MASK);
  }
  return terms;
}

function suppressedTerms(detected: DetectedIntent | null, rules: readonly IntentRule[]): Set<string> {
  const suppressed = new Set<string>();
  if (!detected) {
    return suppressed;
  }

  for (const rule of rules) {
    if (!detected.rule.suppresses.includes(rule.intent)) {
      continue;
    }
    for (const term of rule.genericTerms) {
      suppressed.add(term.toLowerCase());
    }
  }
  return suppressed;
}

function dedupeTerms(terms: string[]): string[] {
  const seen = new Set<string>();
  const output: string[] = [];
  for (const term of terms) {
    const trimmed = term.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) {
      continue;
    }
    seen.add(key);
    output.push(trimmed);
  }
  return output;
}

function codePointLength(value: string): number {
  return Array.from(value).length;
}

function compareText(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
