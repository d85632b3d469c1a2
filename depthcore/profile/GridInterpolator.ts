//depthcore/profile/GridInterpolator.ts

import { VALUE_CEIL, VALUE_FLOOR } from "../config/profileConfig";
import { clamp } from "../utils/math";
import { triangulate } from "./Triangulation";
import {
  ProfileConfigError,
  type Domain,
  type GridAxes,
  type InterpolatedField,
  type ProfileContext,
  type ProfileStage,
} from "./ProfileTypes";

// Barycentric slack so nodes lying on a shared edge are not lost to rounding.
const EDGE_EPSILON = 1e-9;

export interface ScatteredValue {
  x: number;
  z: number;
  value: number;
}

export interface InterpolationOptions {
  valueRange?: { min: number; max: number };
}

export function linspace(start: number, stop: number, count: number): Float64Array {
  const out = new Float64Array(count);
  if (count === 1) {
    out[0] = start;
    return out;
  }
  const step = (stop - start) / (count - 1);
  for (let i = 0; i < count; i++) out[i] = start + step * i;
  // pin the endpoint exactly
  out[count - 1] = stop;
  return out;
}

export function buildGridAxes(domain: Domain, resolution: number): GridAxes {
  if (!Number.isInteger(resolution) || resolution < 2) {
    throw new ProfileConfigError(`grid resolution must be an integer >= 2, got ${resolution}`);
  }
  return {
    xs: linspace(domain.xMin, domain.xMax, resolution),
    zs: linspace(domain.zMin, domain.zMax, resolution),
  };
}

/** First index i with axis[i] >= v (axis ascending). */
function lowerIndex(axis: Float64Array, v: number): number {
  let lo = 0;
  let hi = axis.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (axis[mid] < v) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Last index i with axis[i] <= v, or -1. */
function upperIndex(axis: Float64Array, v: number): number {
  let lo = 0;
  let hi = axis.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (axis[mid] <= v) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}

/**
 * Linear interpolation of scattered values onto the lattice.
 *
 * Each triangle of the Delaunay mesh writes the nodes inside it; nodes outside
 * every triangle (beyond the convex hull) stay NaN. Defined values are clamped
 * into `valueRange`.
 */
export function interpolateToGrid(
  samples: readonly ScatteredValue[],
  domain: Domain,
  resolution: number,
  options: InterpolationOptions = {},
): InterpolatedField {
  const range = options.valueRange ?? { min: VALUE_FLOOR, max: VALUE_CEIL };
  const axes = buildGridAxes(domain, resolution);
  const { xs, zs } = axes;

  const mesh = triangulate(samples);
  const vertexValues = mesh.sourceIndex.map((i) => samples[i].value);

  const values = new Float64Array(resolution * resolution).fill(Number.NaN);

  for (const [ia, ib, ic] of mesh.triangles) {
    const a = mesh.points[ia];
    const b = mesh.points[ib];
    const c = mesh.points[ic];
    const va = vertexValues[ia];
    const vb = vertexValues[ib];
    const vc = vertexValues[ic];

    const det = (b.z - c.z) * (a.x - c.x) + (c.x - b.x) * (a.z - c.z);
    if (det === 0) continue;

    const col0 = lowerIndex(xs, Math.min(a.x, b.x, c.x) - EDGE_EPSILON);
    const col1 = upperIndex(xs, Math.max(a.x, b.x, c.x) + EDGE_EPSILON);
    const row0 = lowerIndex(zs, Math.min(a.z, b.z, c.z) - EDGE_EPSILON);
    const row1 = upperIndex(zs, Math.max(a.z, b.z, c.z) + EDGE_EPSILON);

    for (let row = row0; row <= row1; row++) {
      const z = zs[row];
      for (let col = col0; col <= col1; col++) {
        const idx = row * resolution + col;
        if (!Number.isNaN(values[idx])) continue;

        const x = xs[col];
        const wa = ((b.z - c.z) * (x - c.x) + (c.x - b.x) * (z - c.z)) / det;
        const wb = ((c.z - a.z) * (x - c.x) + (a.x - c.x) * (z - c.z)) / det;
        const wc = 1 - wa - wb;
        if (wa < -EDGE_EPSILON || wb < -EDGE_EPSILON || wc < -EDGE_EPSILON) continue;

        values[idx] = clamp(wa * va + wb * vb + wc * vc, range.min, range.max);
      }
    }
  }

  return { domain, resolution, axes, values, valueRange: { ...range } };
}

/** Number of nodes that received a value. */
export function countDefined(field: InterpolatedField): number {
  let n = 0;
  for (const v of field.values) if (!Number.isNaN(v)) n++;
  return n;
}

export interface GridInterpolationInput {
  samples: readonly ScatteredValue[];
  domain: Domain;
  resolution: number;
}

export class GridInterpolationStage implements ProfileStage<GridInterpolationInput, InterpolatedField> {
  public readonly name = "GridInterpolation";

  run(input: GridInterpolationInput, context?: ProfileContext): InterpolatedField {
    const field = interpolateToGrid(input.samples, input.domain, input.resolution);
    context?.logger?.debug?.(`[${this.name}] interpolated ${input.resolution}x${input.resolution} grid`, {
      defined: countDefined(field),
    });
    return field;
  }
}
