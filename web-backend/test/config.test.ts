// web-backend/test/config.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { loadServiceConfig } from "../config";
import { ProfileConfigError } from "../../depthcore/profile/ProfileTypes";

test("ServiceConfig: defaults apply to an empty environment", () => {
  assert.deepEqual(loadServiceConfig({}), {
    port: 5000,
    host: "0.0.0.0",
    corsOrigin: "*",
    pngDensity: 100,
    seed: 678,
  });
});

test("ServiceConfig: numeric settings are coerced from strings", () => {
  const cfg = loadServiceConfig({ PORT: "8080", PNG_DENSITY: "150", PROFILE_SEED: "12" });
  assert.equal(cfg.port, 8080);
  assert.equal(cfg.pngDensity, 150);
  assert.equal(cfg.seed, 12);
});

test("ServiceConfig: invalid values are a ProfileConfigError", () => {
  assert.throws(() => loadServiceConfig({ PORT: "not-a-port" }), ProfileConfigError);
  assert.throws(() => loadServiceConfig({ PORT: "70000" }), ProfileConfigError);
  assert.throws(() => loadServiceConfig({ PNG_DENSITY: "0" }), ProfileConfigError);
  assert.throws(() => loadServiceConfig({ PROFILE_SEED: "1.5" }), ProfileConfigError);
});
