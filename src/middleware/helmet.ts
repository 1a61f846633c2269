import helmet from "helmet";
import { getEnv } from "../config/env.js";

export function createHelmet() {
  const env = getEnv();

  // JSON-only API: nothing is ever rendered or embedded.
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: "cross-origin" },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
    } : false,
  });
}
