import { DEFAULT_NUTRIENT_REFERENCE } from "../config/nutritionConfig.js";
import type { FoodImportRecord } from "../services/catalog/types.js";
import type { CsvImportSummary, NutrientMeta } from "../types/contracts.js";

export type FoodCsvOptions = {
  source?: string;
  nutrientKeys?: readonly string[];
};

export type ParsedFoodCsv = {
  records: FoodImportRecord[];
  summary: CsvImportSummary;
};

const NAME_COLUMNS = ["description", "name"];
const ENERGY_COLUMNS = ["kcal_per_100g", "energy_kcal", "energy"];

const NUTRIENT_LABELS: Record<string, string> = {
  protein_g: "Protein",
  fat_g: "Fat",
  ca_mg: "Calcium",
  p_mg: "Phosphorus",
  k_mg: "Potassium",
  na_mg: "Sodium",
  mg_mg: "Magnesium",
  fe_mg: "Iron",
  zn_mg: "Zinc",
  cu_mg: "Copper",
  mn_mg: "Manganese",
  se_ug: "Selenium",
  iodine_ug: "Iodine",
  vit_a_ug: "Vitamin A",
  vit_d_ug: "Vitamin D",
  vit_e_mg: "Vitamin E"
};

/**
 * Parses the wide food table: one row per food, `fdc_id`, a name column, an
 * energy column, then one column per nutrient key (amount per 100 g).
 */
export function parseFoodCsv(csv: string, options: FoodCsvOptions = {}): ParsedFoodCsv {
  const source = options.source ?? "usda";
  const nutrientKeys = new Set(options.nutrientKeys ?? DEFAULT_NUTRIENT_REFERENCE.map((entry) => entry.nutrientKey));
  const summary: CsvImportSummary = { imported: 0, skipped: 0, skipReasons: {} };
  const records: FoodImportRecord[] = [];

  const lines = csv.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return { records, summary };
  }

  const headers = splitCsvLine(lines[0] ?? "").map((name) => name.toLowerCase());
  const indexByName = new Map(headers.map((name, index) => [name, index]));
  const nameIndex = firstIndex(indexByName, NAME_COLUMNS);
  const energyIndex = firstIndex(indexByName, ENERGY_COLUMNS);
  const fdcIndex = indexByName.get("fdc_id");
  const nutrientColumns = headers
    .map((name, index) => ({ name, index }))
    .filter((column) => nutrientKeys.has(column.name));

  const skip = (reason: string) => {
    summary.skipped += 1;
    summary.skipReasons[reason] = (summary.skipReasons[reason] ?? 0) + 1;
  };

  for (const line of lines.slice(1)) {
    const cols = splitCsvLine(line);
    const name = valueAt(cols, nameIndex);
    if (!name) {
      skip("missing_name");
      continue;
    }

    const energyRaw = valueAt(cols, energyIndex);
    if (!energyRaw) {
      skip("missing_energy");
      continue;
    }
    const kcalPer100g = Number(energyRaw);
    if (!Number.isFinite(kcalPer100g) || kcalPer100g < 0) {
      skip("invalid_energy");
      continue;
    }

    const nutrients: Record<string, number> = {};
    for (const column of nutrientColumns) {
      const amount = Number(valueAt(cols, column.index) ?? Number.NaN);
      if (Number.isFinite(amount) && amount >= 0) {
        nutrients[column.name] = amount;
      }
    }

    const fdcId = Number.parseInt(valueAt(cols, fdcIndex) ?? "", 10);
    records.push({
      name,
      kcalPer100g,
      source,
      fdcId: Number.isInteger(fdcId) ? fdcId : null,
      nutrients
    });
  }

  summary.imported = records.length;
  return { records, summary };
}

export function describeNutrient(nutrientKey: string): NutrientMeta {
  const unit = nutrientKey.endsWith("_ug") ? "µg" : nutrientKey.endsWith("_mg") ? "mg" : nutrientKey.endsWith("_g") ? "g" : "";
  return {
    nutrientKey,
    displayName: NUTRIENT_LABELS[nutrientKey] ?? nutrientKey,
    unit
  };
}

/** Comma-separated fields; double quotes wrap fields that contain commas, `""` escapes a quote. */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line.charAt(index);
    if (quoted) {
      if (char === '"' && line.charAt(index + 1) === '"') {
        current += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  fields.push(current.trim());
  return fields;
}

function firstIndex(indexByName: Map<string, number>, candidates: string[]): number | undefined {
  for (const candidate of candidates) {
    const index = indexByName.get(candidate);
    if (index !== undefined) {
      return index;
    }
  }
  return undefined;
}

function valueAt(values: string[], index: number | undefined): string | undefined {
  if (index == null || index < 0 || index >= values.length) {
    return undefined;
  }
  const value = values[index]?.trim();
  return value ? value : undefined;
}
