//web-backend/app.ts

import express from "express";
import cors from "cors";

import { Logger } from "../depthcore/utils/logger";
import type { ServiceConfig } from "./config";
import { errorHandler } from "./middleware/errorHandler";
import { createDepthProfileRouter, type DepthProfileRouterDeps } from "./routes/depthProfile";

const log = Logger.scope("WEB");

export const LIVENESS_TEXT = "Earth depth profile generator is running.";

export function createApp(config: ServiceConfig, deps: DepthProfileRouterDeps = {}): express.Express {
  const app = express();

  app.use(
    cors({
      origin: config.corsOrigin,
    }),
  );
  // strict: false – any syntactically valid JSON document is accepted
  app.use(express.json({ strict: false }));

  app.use((req, _res, next) => {
    log.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get("/", (_req, res) => {
    res.type("text/plain").send(LIVENESS_TEXT);
  });

  app.get("/api/healthz", (_req, res) => {
    res.json({
      ok: true,
      service: "web-backend",
      pid: process.pid,
      uptimeMs: Math.floor(process.uptime() * 1000),
      now: new Date().toISOString(),
    });
  });

  app.use(createDepthProfileRouter(config, deps));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found", message: "No such route." });
  });

  app.use(errorHandler);

  return app;
}
