import { existsSync, readFileSync } from "node:fs";
import type { ActivityLevel, IntentRule, NutrientReferenceEntry } from "../types/contracts.js";

export type OptimizerSettings = {
  maxIterations: number;
  negligibleGrams: number;
};

/**
 * Read-only tables shared by the matching engine and the optimizer.
 * Built once at startup and handed to each component explicitly.
 */
export type NutritionConfig = {
  readonly toxicKeywords: readonly string[];
  readonly nutrientReference: readonly NutrientReferenceEntry[];
  readonly activityFactors: Readonly<Record<ActivityLevel, number>>;
  readonly aliasExpansions: ReadonlyMap<string, readonly string[]>;
  readonly intentRules: readonly IntentRule[];
  readonly optimizer: Readonly<OptimizerSettings>;
};

export const DEFAULT_TOXIC_KEYWORDS: readonly string[] = [
  "onion",
  "garlic",
  "chive",
  "leek",
  "chocolate",
  "cocoa",
  "grape",
  "raisin",
  "xylitol",
  "alcohol",
  "macadamia",
  "avocado pit",
  "coffee",
  "tea leaf",
  "洋葱",
  "大蒜",
  "韭菜",
  "巧克力",
  "可可",
  "葡萄",
  "葡萄干",
  "木糖醇",
  "酒精",
  "夏威夷果"
];

// Per 1000 kcal of metabolizable energy, adult maintenance.
export const DEFAULT_NUTRIENT_REFERENCE: readonly NutrientReferenceEntry[] = [
  { nutrientKey: "protein_g", min: 45.0, suggest: 52.0, max: null },
  { nutrientKey: "fat_g", min: 13.8, suggest: 16.0, max: null },
  { nutrientKey: "ca_mg", min: 1250.0, suggest: 1500.0, max: 6250.0 },
  { nutrientKey: "p_mg", min: 1000.0, suggest: 1200.0, max: 4000.0 },
  { nutrientKey: "k_mg", min: 1500.0, suggest: 1700.0, max: null },
  { nutrientKey: "na_mg", min: 200.0, suggest: 300.0, max: 3200.0 },
  { nutrientKey: "mg_mg", min: 150.0, suggest: 170.0, max: null },
  { nutrientKey: "fe_mg", min: 7.5, suggest: 10.0, max: 75.0 },
  { nutrientKey: "zn_mg", min: 15.0, suggest: 20.0, max: 300.0 },
  { nutrientKey: "cu_mg", min: 1.5, suggest: 1.8, max: 30.0 },
  { nutrientKey: "mn_mg", min: 1.2, suggest: 1.6, max: 24.0 },
  { nutrientKey: "se_ug", min: 90.0, suggest: 100.0, max: 900.0 },
  { nutrientKey: "iodine_ug", min: 220.0, suggest: 300.0, max: 2200.0 },
  { nutrientKey: "vit_a_ug", min: 379.0, suggest: 500.0, max: 18750.0 },
  { nutrientKey: "vit_d_ug", min: 3.4, suggest: 5.0, max: 80.0 },
  { nutrientKey: "vit_e_mg", min: 7.5, suggest: 10.0, max: null }
];

// low: mostly resting, normal: household activity, high: working dog
export const DEFAULT_ACTIVITY_FACTORS: Readonly<Record<ActivityLevel, number>> = {
  low: 1.4,
  normal: 1.6,
  high: 2.0
};

export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  {
    intent: "egg",
    markers: ["鸡蛋", "蛋黄", "蛋清", "蛋白"],
    excludes: ["蛋白质", "蛋白粉"],
    defaultTerms: ["egg", "whole egg"],
    genericTerms: ["egg"],
    suppresses: ["poultry"],
    identityToken: "egg",
    conflictTokens: ["chicken", "broiler", "broilers", "fryers"],
    parts: [
      { markers: ["蛋黄"], terms: ["egg yolk", "egg", "yolk"], tokens: ["yolk"] },
      { markers: ["蛋白", "蛋清"], terms: ["egg white", "egg", "white"], tokens: ["white"] }
    ]
  },
  {
    intent: "poultry",
    markers: ["鸡"],
    excludes: ["火鸡"],
    defaultTerms: ["chicken", "chicken breast", "chicken drumstick"],
    genericTerms: ["chicken", "鸡"],
    suppresses: [],
    identityToken: "chicken",
    conflictTokens: ["turkey", "duck", "goose", "egg", "beef", "pork", "lamb"],
    parts: [
      { markers: ["鸡胸"], terms: ["chicken breast", "chicken", "breast"], tokens: ["breast"] },
      { markers: ["鸡大腿"], terms: ["chicken thigh", "chicken", "thigh"], tokens: ["thigh"] },
      { markers: ["鸡腿", "鸡小腿"], terms: ["chicken drumstick", "chicken", "drumstick"], tokens: ["drumstick"] },
      { markers: ["鸡翅"], terms: ["chicken wing", "chicken", "wing"], tokens: ["wing"] },
      { markers: ["鸡肝"], terms: ["chicken liver", "chicken", "liver"], tokens: ["liver"] },
      { markers: ["鸡心"], terms: ["chicken heart", "chicken", "heart"], tokens: ["heart"] }
    ]
  }
];

export const DEFAULT_OPTIMIZER_SETTINGS: Readonly<OptimizerSettings> = {
  maxIterations: 120,
  negligibleGrams: 0.1
};

export type NutritionConfigOptions = {
  expansionsPath?: string;
  aliasSeedPath?: string;
  aliasExpansions?: Record<string, string[]>;
  optimizer?: Partial<OptimizerSettings>;
};

export function createNutritionConfig(options: NutritionConfigOptions = {}): NutritionConfig {
  const builtIn = options.aliasExpansions
    ?? (options.expansionsPath ? loadAliasExpansions(options.expansionsPath) : {});
  const seed = options.aliasSeedPath ? loadAliasSeed(options.aliasSeedPath) : {};

  const config: NutritionConfig = {
    toxicKeywords: Object.freeze([...DEFAULT_TOXIC_KEYWORDS]),
    nutrientReference: Object.freeze(DEFAULT_NUTRIENT_REFERENCE.map((entry) => Object.freeze({ ...entry }))),
    activityFactors: Object.freeze({ ...DEFAULT_ACTIVITY_FACTORS }),
    aliasExpansions: mergeAliasTables(builtIn, seed),
    intentRules: DEFAULT_INTENT_RULES,
    optimizer: Object.freeze({ ...DEFAULT_OPTIMIZER_SETTINGS, ...options.optimizer })
  };
  return Object.freeze(config);
}

export function loadAliasExpansions(path: string): Record<string, string[]> {
  if (!existsSync(path)) {
    return {};
  }

  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (!isRecord(parsed)) {
    throw new Error(`Alias expansion table at ${path} must be a JSON object`);
  }

  const table: Record<string, string[]> = {};
  for (const [alias, terms] of Object.entries(parsed)) {
    if (!Array.isArray(terms)) {
      continue;
    }
    const cleaned = terms
      .filter((term): term is string => typeof term === "string")
      .map((term) => term.trim().toLowerCase())
      .filter((term) => term.length > 0);
    const key = alias.trim().toLowerCase();
    if (key && cleaned.length > 0) {
      table[key] = cleaned;
    }
  }
  return table;
}

export function loadAliasSeed(path: string): Record<string, string[]> {
  if (!existsSync(path)) {
    return {};
  }
  return parseAliasSeedCSV(readFileSync(path, "utf8"));
}

/** Parses `alias,expands_to` rows where `expands_to` is a `|`-separated term list. */
export function parseAliasSeedCSV(csv: string): Record<string, string[]> {
  const lines = csv.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return {};
  }

  const headers = (lines[0] ?? "").split(",").map((item) => item.trim().toLowerCase());
  const aliasIndex = headers.indexOf("alias");
  const expandsIndex = headers.indexOf("expands_to");
  if (aliasIndex < 0 || expandsIndex < 0) {
    return {};
  }

  const mapping: Record<string, string[]> = {};
  for (const line of lines.slice(1)) {
    const cols = line.split(",");
    const alias = (cols[aliasIndex] ?? "").trim().toLowerCase();
    const candidates = (cols[expandsIndex] ?? "")
      .split("|")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0);
    if (!alias || candidates.length === 0) {
      continue;
    }
    mapping[alias] = candidates;
  }
  return mapping;
}

function mergeAliasTables(...tables: Array<Record<string, string[]>>): ReadonlyMap<string, readonly string[]> {
  const merged = new Map<string, string[]>();
  for (const table of tables) {
    for (const [alias, terms] of Object.entries(table)) {
      const existing = merged.get(alias) ?? [];
      merged.set(alias, [...existing, ...terms.filter((term) => !existing.includes(term))]);
    }
  }
  return merged;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
