//web-backend/index.ts

import dotenv from "dotenv";
import fs from "fs";
import path from "path";

import { Logger } from "../depthcore/utils/logger";
import { createApp } from "./app";
import { loadServiceConfig } from "./config";

const log = Logger.scope("WEB");

function tryLoadDotEnv(): void {
  const candidates = new Set<string>();

  // cwd search upward (works for workspace + repo-root starts)
  let cur = process.cwd();
  for (let i = 0; i < 6; i++) {
    candidates.add(path.join(cur, ".env"));
    candidates.add(path.join(cur, ".env.local"));
    const parent = path.dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }

  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p });
      log.info(`loaded env: ${p}`);
      return;
    }
  }

  // Final fallback: default dotenv behavior (cwd)
  dotenv.config();
}

tryLoadDotEnv();

function main(): void {
  const config = loadServiceConfig();
  const app = createApp(config);

  app.listen(config.port, config.host, () => {
    log.success(`Depth profile service listening on http://${config.host}:${config.port}`);
  });
}

try {
  main();
} catch (err) {
  log.error("startup failed", err);
  process.exit(1);
}
