import express from "express";
import { initEnv } from "./config/env.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { logger, logRequestCompleted } from "./utils/logger.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import { createAppServices } from "./services/appServices.js";

const env = initEnv();
const services = createAppServices(env);

const app = express();

app.use(express.json({ limit: "64kb" }));

app.use(createHelmet());
app.use(createCors());

app.use((req, res, next) => {
  const startedAt = Date.now();
  res.on("finish", () =>
    logRequestCompleted({
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      responseTimeMs: Date.now() - startedAt,
      userAgent: req.get("user-agent"),
    })
  );
  next();
});

app.use(createHealthRouter(services));
app.use("/api/v1", createRateLimiter(), createV1Router(services));

app.use(notFoundHandler);
app.use(errorHandler);

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});

function gracefulShutdown(signal: string) {
  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    services.catalog.close();

    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    logger.info({
      msg: "Server closed gracefully",
    });
    process.exit(0);
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

export default app;
