//depthcore/config/profileConfig.ts

// Fixed constants of the reproducible depth profile. Changing any of these
// changes every generated chart.

import type { Domain } from "../profile/ProfileTypes";

export const PROFILE_SEED = 678;
export const PROFILE_SAMPLE_COUNT = 800;
export const PROFILE_GRID_RESOLUTION = 80;

export const PROFILE_DOMAIN: Domain = {
  xMin: 1,
  xMax: 6,
  zMin: 0,
  zMax: 80,
};

// Interpolated values are clamped into this range before contouring.
export const VALUE_FLOOR = 55;
export const VALUE_CEIL = 1000;

export const CONTOUR_LEVEL_COUNT = 15;

// Draws at or below this are discarded for pocket overrides (~60% kept).
export const POCKET_RETENTION_THRESHOLD = 0.4;

// Standard deviation of the per-sample noise added after zoning.
export const GLOBAL_NOISE_SCALE = 100;

export const BOUNDARY_CURVE = {
  baseDepth: 40,
  amplitude: 15,
  period: 2.5,
  noiseScale: 5,
  minDepth: 25,
  maxDepth: 50,
};

export const DEEPEST_LAYER_DEPTH = 75;
