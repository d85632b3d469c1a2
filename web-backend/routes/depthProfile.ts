//web-backend/routes/depthProfile.ts

import { Router } from "express";

import { Logger } from "../../depthcore/utils/logger";
import { renderDepthProfile } from "../../depthcore/chart/DepthChart";
import { PdfEncoder } from "../../depthcore/chart/PdfEncoder";
import { PngEncoder } from "../../depthcore/chart/PngEncoder";
import type { ServiceConfig } from "../config";

const log = Logger.scope("WEB");

export const PDF_FILENAME = "earth_depth_profile.pdf";

export type ProfileRenderer = typeof renderDepthProfile;

export interface DepthProfileRouterDeps {
  render?: ProfileRenderer;
}

// The JSON body (if any) has already been parsed by express.json(), which
// rejects malformed payloads before these handlers run. Its content does not
// influence the chart.
export function createDepthProfileRouter(config: ServiceConfig, deps: DepthProfileRouterDeps = {}): Router {
  const router = Router();
  const render = deps.render ?? renderDepthProfile;
  const pdf = new PdfEncoder();
  const png = new PngEncoder({ density: config.pngDensity });

  // POST /generate-pdf – chart as a downloadable PDF
  router.post("/generate-pdf", async (_req, res, next) => {
    try {
      const chart = await render(pdf, { seed: config.seed });
      log.info(`generated PDF (${chart.bytes.length} bytes)`);
      res.status(200).attachment(PDF_FILENAME).type(chart.contentType).send(chart.bytes);
    } catch (err) {
      next(err);
    }
  });

  // POST /generate-image – chart as base64 PNG inside JSON
  router.post("/generate-image", async (_req, res, next) => {
    try {
      const chart = await render(png, { seed: config.seed });
      log.info(`generated PNG (${chart.bytes.length} bytes)`);
      res.status(200).json({ image: chart.bytes.toString("base64") });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
