import { Router } from "express";
import type { AppServices } from "../../services/appServices.js";
import { createFoodsRouter } from "./foods.js";
import { createNutritionRouter } from "./nutrition.js";

export function createV1Router(services: AppServices): Router {
  const router = Router();

  router.use("/", createFoodsRouter(services));
  router.use("/", createNutritionRouter(services));

  return router;
}
