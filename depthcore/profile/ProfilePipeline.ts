//depthcore/profile/ProfilePipeline.ts

/**
 * Depth profile generation: sampler → zone synthesis → grid interpolation.
 *
 * Every call builds its own Rng from the seed, so concurrent callers never
 * share stream state and the same seed always yields the same field.
 */

import {
  PROFILE_DOMAIN,
  PROFILE_GRID_RESOLUTION,
  PROFILE_SAMPLE_COUNT,
  PROFILE_SEED,
} from "../config/profileConfig";
import { Logger } from "../utils/logger";
import { Rng } from "../utils/Rng";
import { GridInterpolationStage } from "./GridInterpolator";
import { PointSamplerStage } from "./PointSampler";
import { ZoneSynthesisStage, type ZoneRule } from "./ZoneRules";
import type {
  Domain,
  InterpolatedField,
  ProfileContext,
  ProfileLogger,
  ProfileSample,
} from "./ProfileTypes";

const log = Logger.scope("PROFILE");

export interface DepthProfileOptions {
  seed?: number | string;
  sampleCount?: number;
  resolution?: number;
  domain?: Domain;
  rules?: readonly ZoneRule[];
  logger?: ProfileLogger;
}

export interface DepthProfile {
  seed: number | string;
  domain: Domain;
  samples: ProfileSample[];
  field: InterpolatedField;
}

const sampler = new PointSamplerStage();
const synthesis = new ZoneSynthesisStage();
const interpolation = new GridInterpolationStage();

export function generateDepthProfile(options: DepthProfileOptions = {}): DepthProfile {
  const seed = options.seed ?? PROFILE_SEED;
  const domain = options.domain ?? PROFILE_DOMAIN;
  const count = options.sampleCount ?? PROFILE_SAMPLE_COUNT;
  const resolution = options.resolution ?? PROFILE_GRID_RESOLUTION;
  const context: ProfileContext = { logger: options.logger ?? log };

  const started = Date.now();
  const rng = new Rng(seed);

  const points = sampler.run({ domain, count, rng }, context);
  const samples = synthesis.run({ points, rng, rules: options.rules }, context);
  const field = interpolation.run({ samples, domain, resolution }, context);

  context.logger?.debug?.(`generated depth profile in ${Date.now() - started}ms`, {
    seed,
    count,
    resolution,
  });

  return { seed, domain, samples, field };
}
