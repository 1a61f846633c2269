import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { AliasHit, Food, FoodNutrient, MatchMode, NutrientMeta, NutrientVector } from "../../types/contracts.js";
import type { AliasStore, FoodCatalog, FoodImportRecord } from "./types.js";

type SqliteFoodCatalogOptions = {
  dbPath: string;
};

type FoodRow = {
  id: number;
  name: string;
  kcal_per_100g: number;
  source: string;
  fdc_id: number | null;
};

type AliasRow = FoodRow & {
  alias: string;
  lang: string;
  weight: number;
};

type FoodNutrientRow = {
  nutrient_key: string;
  amount_per_100g: number;
  display_name: string | null;
  unit: string | null;
};

export class CatalogError extends Error {
  constructor(
    message: string,
    readonly code: "invalid_food" | "invalid_nutrient" | "invalid_alias" | "food_not_found"
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class SqliteFoodCatalog implements FoodCatalog, AliasStore {
  readonly dbPath: string;

  private readonly db: Database.Database;

  constructor(options: SqliteFoodCatalogOptions) {
    this.dbPath = options.dbPath;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.pragma("foreign_keys = ON");
    db.exec(`
      CREATE TABLE IF NOT EXISTS foods (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        kcal_per_100g REAL NOT NULL,
        source TEXT NOT NULL,
        fdc_id INTEGER,
        UNIQUE(source, fdc_id)
      );
      CREATE INDEX IF NOT EXISTS idx_foods_name ON foods(name);
      CREATE TABLE IF NOT EXISTS nutrient_meta (
        nutrient_key TEXT PRIMARY KEY,
        display_name TEXT NOT NULL,
        unit TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS food_nutrients (
        food_id INTEGER NOT NULL,
        nutrient_key TEXT NOT NULL,
        amount_per_100g REAL NOT NULL,
        PRIMARY KEY (food_id, nutrient_key),
        FOREIGN KEY (food_id) REFERENCES foods(id) ON DELETE CASCADE
      );
      CREATE TABLE IF NOT EXISTS food_aliases (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        food_id INTEGER NOT NULL,
        lang TEXT NOT NULL,
        alias TEXT NOT NULL,
        weight INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        FOREIGN KEY (food_id) REFERENCES foods(id) ON DELETE CASCADE,
        UNIQUE(lang, alias, food_id)
      );
      CREATE INDEX IF NOT EXISTS idx_food_aliases_lang_alias ON food_aliases(lang, alias);
    `);

    this.db = db;
  }

  lookup(id: number): Food | null {
    const row = this.db
      .prepare<[number], FoodRow>("SELECT id, name, kcal_per_100g, source, fdc_id FROM foods WHERE id = ?")
      .get(id);
    return row ? toFood(row) : null;
  }

  searchByTokens(tokens: string[], matchMode: MatchMode, limit: number, offset: number = 0): Food[] {
    const cleaned = tokens.map((token) => token.trim().toLowerCase()).filter((token) => token.length > 0);
    if (cleaned.length === 0 || limit <= 0) {
      return [];
    }

    const where = cleaned
      .map(() => "lower(name) LIKE ? ESCAPE '\\'")
      .join(matchMode === "all" ? " AND " : " OR ");
    const params: Array<string | number> = cleaned.map((token) => `%${escapeLike(token)}%`);
    params.push(Math.floor(limit), Math.max(0, Math.floor(offset)));

    const rows = this.db
      .prepare<Array<string | number>, FoodRow>(`
        SELECT id, name, kcal_per_100g, source, fdc_id
        FROM foods
        WHERE ${where}
        ORDER BY name COLLATE NOCASE ASC, id ASC
        LIMIT ? OFFSET ?
      `)
      .all(...params);
    return rows.map(toFood);
  }

  nutrientVector(foodId: number): NutrientVector {
    const food = this.lookup(foodId);
    if (!food) {
      return {};
    }

    const rows = this.db
      .prepare<[number], { nutrient_key: string; amount_per_100g: number }>(
        "SELECT nutrient_key, amount_per_100g FROM food_nutrients WHERE food_id = ?"
      )
      .all(foodId);

    const vector: NutrientVector = {};
    for (const row of rows) {
      vector[row.nutrient_key] = row.amount_per_100g;
    }
    vector.kcal = food.kcalPer100g;
    return vector;
  }

  foodNutrients(foodId: number): FoodNutrient[] {
    const rows = this.db
      .prepare<[number], FoodNutrientRow>(`
        SELECT fn.nutrient_key, fn.amount_per_100g, nm.display_name, nm.unit
        FROM food_nutrients AS fn
        LEFT JOIN nutrient_meta AS nm ON nm.nutrient_key = fn.nutrient_key
        WHERE fn.food_id = ?
        ORDER BY fn.nutrient_key ASC
      `)
      .all(foodId);

    return rows.map((row) => ({
      nutrientKey: row.nutrient_key,
      displayName: row.display_name ?? row.nutrient_key,
      unit: row.unit ?? "",
      amountPer100g: row.amount_per_100g
    }));
  }

  lookupByQuery(query: string, lang?: string, limit: number = 50): AliasHit[] {
    const normalizedQuery = query.trim().toLowerCase();
    if (!normalizedQuery || limit <= 0) {
      return [];
    }

    const normalizedLang = lang?.trim().toLowerCase();
    const params: Array<string | number> = [`%${escapeLike(normalizedQuery)}%`];
    if (normalizedLang) {
      params.push(normalizedLang);
    }
    params.push(Math.floor(limit));

    const rows = this.db
      .prepare<Array<string | number>, AliasRow>(`
        SELECT f.id, f.name, f.kcal_per_100g, f.source, f.fdc_id, a.alias, a.lang, a.weight
        FROM food_aliases AS a
        JOIN foods AS f ON f.id = a.food_id
        WHERE lower(a.alias) LIKE ? ESCAPE '\\'
        ${normalizedLang ? "AND a.lang = ?" : ""}
        ORDER BY a.weight DESC, a.alias ASC, f.name COLLATE NOCASE ASC, f.id ASC
        LIMIT ?
      `)
      .all(...params);

    return rows.map((row) => ({
      food: toFood(row),
      alias: row.alias,
      lang: row.lang,
      weight: row.weight
    }));
  }

  /** Inserts a food, or refreshes its energy when `(source, fdcId)` already exists. The stored name never changes. */
  upsertFood(input: { name: string; kcalPer100g: number; source: string; fdcId?: number | null }): number {
    const name = input.name.trim();
    if (!name) {
      throw new CatalogError("Food name cannot be empty", "invalid_food");
    }
    if (!Number.isFinite(input.kcalPer100g) || input.kcalPer100g < 0) {
      throw new CatalogError("kcalPer100g must be >= 0", "invalid_food");
    }
    const source = input.source.trim() || "manual";

    const row = this.db
      .prepare<[string, number, string, number | null], { id: number }>(`
        INSERT INTO foods (name, kcal_per_100g, source, fdc_id)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(source, fdc_id) DO UPDATE SET kcal_per_100g = excluded.kcal_per_100g
        RETURNING id
      `)
      .get(name, input.kcalPer100g, source, input.fdcId ?? null);
    if (!row) {
      throw new CatalogError(`Failed to store food "${name}"`, "invalid_food");
    }
    return row.id;
  }

  upsertNutrientMeta(meta: NutrientMeta): void {
    const key = meta.nutrientKey.trim();
    if (!key) {
      throw new CatalogError("nutrientKey cannot be empty", "invalid_nutrient");
    }
    this.db
      .prepare(`
        INSERT INTO nutrient_meta (nutrient_key, display_name, unit)
        VALUES (?, ?, ?)
        ON CONFLICT(nutrient_key) DO UPDATE SET
          display_name = excluded.display_name,
          unit = excluded.unit
      `)
      .run(key, meta.displayName.trim() || key, meta.unit.trim());
  }

  upsertFoodNutrient(foodId: number, nutrientKey: string, amountPer100g: number): void {
    const key = nutrientKey.trim();
    if (!key) {
      throw new CatalogError("nutrientKey cannot be empty", "invalid_nutrient");
    }
    if (!Number.isFinite(amountPer100g) || amountPer100g < 0) {
      throw new CatalogError(`Nutrient ${key} must be a non-negative amount`, "invalid_nutrient");
    }
    if (!this.lookup(foodId)) {
      throw new CatalogError(`Food ${foodId} does not exist`, "food_not_found");
    }
    this.db
      .prepare(`
        INSERT INTO food_nutrients (food_id, nutrient_key, amount_per_100g)
        VALUES (?, ?, ?)
        ON CONFLICT(food_id, nutrient_key) DO UPDATE SET amount_per_100g = excluded.amount_per_100g
      `)
      .run(foodId, key, amountPer100g);
  }

  addAlias(foodId: number, lang: string, alias: string, weight: number = 0): void {
    const normalizedAlias = alias.trim();
    const normalizedLang = lang.trim().toLowerCase();
    if (!normalizedAlias) {
      throw new CatalogError("alias cannot be empty", "invalid_alias");
    }
    if (!normalizedLang) {
      throw new CatalogError("lang cannot be empty", "invalid_alias");
    }
    if (!Number.isInteger(weight) || weight < 0) {
      throw new CatalogError("alias weight must be a non-negative integer", "invalid_alias");
    }
    if (!this.lookup(foodId)) {
      throw new CatalogError(`Food ${foodId} does not exist`, "food_not_found");
    }
    this.db
      .prepare(`
        INSERT INTO food_aliases (food_id, lang, alias, weight)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(lang, alias, food_id) DO UPDATE SET weight = excluded.weight
      `)
      .run(foodId, normalizedLang, normalizedAlias, weight);
  }

  importFoods(records: FoodImportRecord[]): number {
    const run = this.db.transaction((batch: FoodImportRecord[]) => {
      let imported = 0;
      for (const record of batch) {
        const foodId = this.upsertFood(record);
        for (const [key, amount] of Object.entries(record.nutrients)) {
          this.upsertFoodNutrient(foodId, key, amount);
        }
        imported += 1;
      }
      return imported;
    });
    return run(records);
  }

  countFoods(): number {
    const row = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM foods").get();
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function toFood(row: FoodRow): Food {
  return {
    id: row.id,
    name: row.name,
    kcalPer100g: row.kcal_per_100g,
    source: row.source,
    fdcId: row.fdc_id
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
