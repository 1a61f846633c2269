import test from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import express from "express";
import { z } from "zod";
import { errorHandler, notFoundHandler } from "../src/middleware/error.js";
import { createHealthRouter } from "../src/routes/health.js";
import { createV1Router } from "../src/routes/v1/index.js";
import { CatalogError } from "../src/services/catalog/sqliteFoodCatalog.js";
import { calculateRer } from "../src/services/energy.js";
import { createFixtureCatalog, createFixtureConfig } from "./helpers/foodFixtures.js";

const foodSchema = z.object({ id: z.number(), name: z.string() });
const errorSchema = z.object({
  error: z.string(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional()
});

type Fixture = ReturnType<typeof createFixtureCatalog>;

async function withServer<T>(run: (baseURL: string, fixture: Fixture) => Promise<T>): Promise<T> {
  const fixture = createFixtureCatalog();
  const services = { catalog: fixture.catalog, config: createFixtureConfig() };

  const app = express();
  app.use(express.json());
  app.use(createHealthRouter(services));
  app.use("/api/v1", createV1Router(services));
  app.get("/broken", () => {
    throw new CatalogError("Food 77 does not exist", "food_not_found");
  });
  app.use(notFoundHandler);
  app.use(errorHandler);

  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fixture.catalog.close();
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${address.port}`;
  try {
    return await run(baseURL, fixture);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fixture.catalog.close();
  }
}

function postJSON(url: string, body: unknown) {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });
}

test("GET /api/v1/foods/search ranks the requested cut first", async () => {
  await withServer(async (baseURL, { ids }) => {
    const response = await fetch(`${baseURL}/api/v1/foods/search?q=${encodeURIComponent("鸡胸肉")}`);

    assert.equal(response.status, 200);
    const payload = z.object({ items: z.array(foodSchema) }).parse(await response.json());
    assert.deepEqual(payload.items.map((item) => item.id), [ids.chickenBreast, ids.chickenDrumstick]);
  });
});

test("GET /api/v1/foods/search filters unsafe foods and validates the limit", async () => {
  await withServer(async (baseURL) => {
    const unsafe = await fetch(`${baseURL}/api/v1/foods/search?q=onion`);
    assert.equal(unsafe.status, 200);
    assert.deepEqual(await unsafe.json(), { items: [] });

    const invalid = await fetch(`${baseURL}/api/v1/foods/search?q=egg&limit=0`);
    assert.equal(invalid.status, 400);
    const payload = errorSchema.parse(await invalid.json());
    assert.equal(payload.error, "validation_error");
    assert.equal(payload.details?.[0]?.path, "limit");
  });
});

test("GET /api/v1/foods/expand shows the search terms", async () => {
  await withServer(async (baseURL) => {
    const response = await fetch(`${baseURL}/api/v1/foods/expand?q=${encodeURIComponent("鸡蛋")}`);

    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { terms: ["鸡蛋", "egg", "eggs", "whole egg"] });
  });
});

test("GET /api/v1/foods/:id returns nutrient rows or a 404", async () => {
  await withServer(async (baseURL, { ids }) => {
    const found = await fetch(`${baseURL}/api/v1/foods/${ids.eggWhole}`);
    assert.equal(found.status, 200);
    const food = foodSchema
      .extend({ kcalPer100g: z.number(), nutrients: z.array(z.object({ nutrientKey: z.string(), unit: z.string() })) })
      .parse(await found.json());
    assert.equal(food.name, "Egg, whole, raw, fresh");
    assert.equal(food.kcalPer100g, 143);
    assert.deepEqual(food.nutrients.map((row) => [row.nutrientKey, row.unit]), [["fat_g", "g"], ["protein_g", "g"]]);

    const missing = await fetch(`${baseURL}/api/v1/foods/9999`);
    assert.equal(missing.status, 404);
    assert.equal(errorSchema.parse(await missing.json()).error, "food_not_found");

    const malformed = await fetch(`${baseURL}/api/v1/foods/abc`);
    assert.equal(malformed.status, 400);
  });
});

test("POST /api/v1/requirements returns energy and daily requirements", async () => {
  await withServer(async (baseURL) => {
    const response = await postJSON(`${baseURL}/api/v1/requirements`, { weightKg: 10 });

    assert.equal(response.status, 200);
    const payload = z
      .object({ rer: z.number(), mer: z.number(), activityFactor: z.number(), requirements: z.array(z.unknown()) })
      .parse(await response.json());
    assert.equal(payload.rer, calculateRer(10));
    assert.equal(payload.activityFactor, 1.6);
    assert.equal(payload.mer, calculateRer(10) * 1.6);
    assert.equal(payload.requirements.length, 16);
  });
});

test("POST /api/v1/requirements rejects a zero weight", async () => {
  await withServer(async (baseURL) => {
    const response = await postJSON(`${baseURL}/api/v1/requirements`, { weightKg: 0 });

    assert.equal(response.status, 400);
    const payload = errorSchema.parse(await response.json());
    assert.deepEqual(payload.details, [{ path: "weightKg", message: "weightKg must be greater than 0" }]);
  });
});

test("POST /api/v1/formula solves a ration from the requested foods", async () => {
  await withServer(async (baseURL, { ids }) => {
    const feasible = await postJSON(`${baseURL}/api/v1/formula`, {
      profile: { weightKg: 5, activity: "low" },
      foodIds: [ids.supplement]
    });
    assert.equal(feasible.status, 200);
    const solved = z
      .object({ feasible: z.boolean(), reason: z.string(), items: z.array(z.object({ foodId: z.number() })) })
      .parse(await feasible.json());
    assert.equal(solved.feasible, true);
    assert.equal(solved.reason, "ok");
    assert.deepEqual(solved.items.map((item) => item.foodId), [ids.supplement]);

    const unsafe = await postJSON(`${baseURL}/api/v1/formula`, { profile: { weightKg: 5 }, foodIds: [ids.onion] });
    assert.equal(unsafe.status, 200);
    const rejected = z.object({ feasible: z.boolean(), reason: z.string() }).parse(await unsafe.json());
    assert.deepEqual(rejected, { feasible: false, reason: "no safe foods available" });

    const invalid = await postJSON(`${baseURL}/api/v1/formula`, { profile: { weightKg: 5 }, foodIds: "all" });
    assert.equal(invalid.status, 400);
  });
});

test("health routes report catalog readiness", async () => {
  await withServer(async (baseURL) => {
    const ready = await fetch(`${baseURL}/health/ready`);
    assert.equal(ready.status, 200);
    const payload = z.object({ ready: z.boolean(), foods: z.number() }).parse(await ready.json());
    assert.deepEqual(payload, { ready: true, foods: 11 });

    const live = await fetch(`${baseURL}/health/live`);
    assert.equal(live.status, 200);
  });
});

test("catalog errors and unknown routes map to JSON errors", async () => {
  await withServer(async (baseURL) => {
    const broken = await fetch(`${baseURL}/broken`);
    assert.equal(broken.status, 404);
    assert.equal(errorSchema.parse(await broken.json()).error, "food_not_found");

    const unknown = await fetch(`${baseURL}/api/v1/unknown`);
    assert.equal(unknown.status, 404);
    assert.equal(errorSchema.parse(await unknown.json()).error, "not_found");
  });
});
