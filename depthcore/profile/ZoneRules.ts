//depthcore/profile/ZoneRules.ts

/**
 * Zone classifier & value synthesizer.
 *
 * Zoning is an ordered list of rules evaluated over the whole sample set.
 * A later rule overwrites what an earlier one assigned, so the last rule a
 * sample matches decides its zone and base value.
 *
 * Draw order is part of the contract: boundary noise for every sample, then
 * each rule in list order (retention draws for every sample if the rule has a
 * threshold, then one value draw per kept sample), then global noise.
 */

import type { Rng } from "../utils/Rng";
import { clamp } from "../utils/math";
import {
  BOUNDARY_CURVE,
  DEEPEST_LAYER_DEPTH,
  GLOBAL_NOISE_SCALE,
  POCKET_RETENTION_THRESHOLD,
} from "../config/profileConfig";
import {
  ProfileConfigError,
  type ProfileContext,
  type ProfilePoint,
  type ProfileSample,
  type ProfileStage,
  type ZoneId,
} from "./ProfileTypes";

/** A sample as rules see it: position plus its boundary depth. */
export interface ZonedPoint extends ProfilePoint {
  boundaryDepth: number;
}

/** Values drawn as offset + spread·U, U uniform in [0, 1). */
export interface ValueBand {
  offset: number;
  spread: number;
}

export interface ZoneRule {
  id: ZoneId;
  matches(point: ZonedPoint): boolean;
  band: ValueBand;
  /** Keep a matching sample only when a fresh uniform draw exceeds this. */
  retention?: number;
}

/** Noise-free part of the boundary between the hard-rock and deep regimes. */
export function boundaryCurveBase(x: number): number {
  const c = BOUNDARY_CURVE;
  return c.baseDepth + c.amplitude * Math.sin((x * Math.PI) / c.period);
}

/** Clipped boundary depth for a given standard-normal draw. */
export function boundaryDepthAt(x: number, normalDraw: number): number {
  const c = BOUNDARY_CURVE;
  return clamp(boundaryCurveBase(x) + c.noiseScale * normalDraw, c.minDepth, c.maxDepth);
}

const isDeep = (p: ZonedPoint): boolean => p.z >= p.boundaryDepth;

export const DEFAULT_ZONE_RULES: readonly ZoneRule[] = [
  {
    id: "hardRock",
    matches: (p) => p.z < p.boundaryDepth,
    band: { offset: 800, spread: 350 },
  },
  {
    id: "deep",
    matches: isDeep,
    band: { offset: 450, spread: 250 },
  },
  {
    // water pocket under the western hard-rock hump
    id: "pocket1",
    matches: (p) => isDeep(p) && p.x > 1.5 && p.x < 3.5 && p.z > 50 && p.z < 70,
    band: { offset: 50, spread: 70 },
    retention: POCKET_RETENTION_THRESHOLD,
  },
  {
    id: "pocket2",
    matches: (p) => isDeep(p) && p.x > 4.5 && p.x < 6.0 && p.z > 55 && p.z < 75,
    band: { offset: 100, spread: 100 },
    retention: POCKET_RETENTION_THRESHOLD,
  },
  {
    id: "deepestLayer",
    matches: (p) => p.z >= DEEPEST_LAYER_DEPTH,
    band: { offset: 600, spread: 300 },
  },
];

export interface SynthesisOptions {
  rules?: readonly ZoneRule[];
  noiseScale?: number;
}

export function synthesizeValues(
  points: readonly ProfilePoint[],
  rng: Rng,
  options: SynthesisOptions = {},
): ProfileSample[] {
  const rules = options.rules ?? DEFAULT_ZONE_RULES;
  const noiseScale = options.noiseScale ?? GLOBAL_NOISE_SCALE;

  const zoned: ZonedPoint[] = points.map((p) => ({
    x: p.x,
    z: p.z,
    boundaryDepth: boundaryDepthAt(p.x, rng.normal()),
  }));

  const zones: (ZoneId | null)[] = zoned.map(() => null);
  const baseValues = new Float64Array(zoned.length);

  for (const rule of rules) {
    const mask = zoned.map((p) => rule.matches(p));

    if (rule.retention !== undefined) {
      const threshold = rule.retention;
      const draws = rng.uniforms(zoned.length);
      for (let i = 0; i < mask.length; i++) {
        mask[i] = mask[i] && draws[i] > threshold;
      }
    }

    for (let i = 0; i < mask.length; i++) {
      if (!mask[i]) continue;
      baseValues[i] = rule.band.offset + rule.band.spread * rng.next();
      zones[i] = rule.id;
    }
  }

  return zoned.map((p, i) => {
    const zone = zones[i];
    if (zone === null) {
      throw new ProfileConfigError(`sample ${i} at (${p.x}, ${p.z}) matched no zone rule`);
    }
    return {
      ...p,
      zone,
      baseValue: baseValues[i],
      value: baseValues[i] + noiseScale * rng.normal(),
    };
  });
}

export interface ZoneSynthesisInput {
  points: readonly ProfilePoint[];
  rng: Rng;
  rules?: readonly ZoneRule[];
}

export class ZoneSynthesisStage implements ProfileStage<ZoneSynthesisInput, ProfileSample[]> {
  public readonly name = "ZoneSynthesis";

  run(input: ZoneSynthesisInput, context?: ProfileContext): ProfileSample[] {
    const samples = synthesizeValues(input.points, input.rng, { rules: input.rules });

    const counts: Partial<Record<ZoneId, number>> = {};
    for (const s of samples) counts[s.zone] = (counts[s.zone] ?? 0) + 1;
    context?.logger?.debug?.(`[${this.name}] zoned ${samples.length} samples`, counts);

    return samples;
  }
}
