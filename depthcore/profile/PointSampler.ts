//depthcore/profile/PointSampler.ts

import type { Rng } from "../utils/Rng";
import {
  ProfileConfigError,
  type Domain,
  type ProfileContext,
  type ProfilePoint,
  type ProfileStage,
} from "./ProfileTypes";

export interface PointSamplerInput {
  domain: Domain;
  count: number;
  rng: Rng;
}

/**
 * Draws `count` points uniformly over the domain.
 * All x coordinates are drawn first, then all z coordinates, so the stream
 * position after sampling depends only on `count`.
 */
export function samplePointCloud(domain: Domain, count: number, rng: Rng): ProfilePoint[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new ProfileConfigError(`sample count must be a positive integer, got ${count}`);
  }

  const xs = rng.uniforms(count, domain.xMin, domain.xMax);
  const zs = rng.uniforms(count, domain.zMin, domain.zMax);

  return xs.map((x, i) => ({ x, z: zs[i] }));
}

export class PointSamplerStage implements ProfileStage<PointSamplerInput, ProfilePoint[]> {
  public readonly name = "PointSampler";

  run(input: PointSamplerInput, context?: ProfileContext): ProfilePoint[] {
    const points = samplePointCloud(input.domain, input.count, input.rng);
    context?.logger?.debug?.(`[${this.name}] sampled ${points.length} points`);
    return points;
  }
}
