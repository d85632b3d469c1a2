//web-backend/config.ts

// Service settings from the environment. Generation constants live in
// depthcore/config/profileConfig.ts; only what an operator may tune is here.

import { z } from "zod";

import { PROFILE_SEED } from "../depthcore/config/profileConfig";
import { ProfileConfigError } from "../depthcore/profile/ProfileTypes";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGIN: z.string().min(1).default("*"),
  // rasterization density for /generate-image, in dpi
  PNG_DENSITY: z.coerce.number().positive().max(600).default(100),
  PROFILE_SEED: z.coerce.number().int().default(PROFILE_SEED),
});

export interface ServiceConfig {
  port: number;
  host: string;
  corsOrigin: string;
  pngDensity: number;
  seed: number;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ProfileConfigError(`invalid service configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
    pngDensity: e.PNG_DENSITY,
    seed: e.PROFILE_SEED,
  };
}
