import test from "node:test";
import assert from "node:assert/strict";
import { createChildLogger, logger, requestLogLevel } from "../src/utils/logger.js";

test("createChildLogger binds the module and extra context", () => {
  const child = createChildLogger("foodSearch", { requestId: "req-1" });

  const bindings = child.bindings();
  assert.equal(bindings.module, "foodSearch");
  assert.equal(bindings.requestId, "req-1");
  assert.equal(child.level, logger.level);
});

test("requestLogLevel escalates with the status class", () => {
  assert.equal(requestLogLevel(200), "info");
  assert.equal(requestLogLevel(304), "info");
  assert.equal(requestLogLevel(404), "warn");
  assert.equal(requestLogLevel(503), "error");
});
