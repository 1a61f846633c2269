import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Food catalog
  FOODS_DB_PATH: z.string().default("data/foods.sqlite"),
  ALIAS_EXPANSIONS_PATH: z.string().default("data/aliases/expansions.json"),
  ALIAS_SEED_PATH: z.string().default("data/aliases/zh_seed.csv"),

  // Search
  SEARCH_DEFAULT_LIMIT: z.coerce.number().int().min(1).default(20),
  SEARCH_MAX_LIMIT: z.coerce.number().int().min(1).default(100),

  // Optimizer
  OPTIMIZER_MAX_ITERATIONS: z.coerce.number().int().min(1).max(10_000).default(120),

  // Rate limiting
  API_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  API_RATE_MAX: z.coerce.number().default(120),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    console.log("Foods DB:", e.FOODS_DB_PATH);
  }

  return e;
}
