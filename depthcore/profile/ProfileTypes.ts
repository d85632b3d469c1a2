//depthcore/profile/ProfileTypes.ts

/**
 * Shared shapes for the depth profile generator.
 *
 * Each pass (sampling, zoning, interpolation) implements ProfileStage so the
 * pipeline can run, log and time them the same way.
 */

//////////////////////
// Shared Interfaces
//////////////////////

/** Rectangular (surface-position, depth) region the field is defined on. */
export interface Domain {
  xMin: number;
  xMax: number;
  zMin: number;
  zMax: number;
}

export interface ProfilePoint {
  x: number;
  z: number;
}

export type ZoneId = "hardRock" | "deep" | "pocket1" | "pocket2" | "deepestLayer";

/**
 * A scatter point with its synthesized value.
 * `baseValue` is what the last matching zone rule assigned; `value` adds the
 * global noise on top and is never clipped here.
 */
export interface ProfileSample extends ProfilePoint {
  boundaryDepth: number;
  zone: ZoneId;
  baseValue: number;
  value: number;
}

/** Evenly spaced node coordinates, bounds included on both axes. */
export interface GridAxes {
  xs: Float64Array;
  zs: Float64Array;
}

/**
 * Interpolated field on a resolution × resolution lattice.
 * Row-major: values[row * resolution + col], rows follow depth.
 * NaN marks a node outside the samples' convex hull.
 */
export interface InterpolatedField {
  domain: Domain;
  resolution: number;
  axes: GridAxes;
  values: Float64Array;
  valueRange: { min: number; max: number };
}

/**
 * Minimal logger contract so stages don't bind to a specific implementation.
 * utils/logger.ts satisfies it.
 */
export interface ProfileLogger {
  debug?(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

export interface ProfileContext {
  logger?: ProfileLogger;
}

export interface ProfileStage<I, O> {
  readonly name: string;
  run(input: I, context?: ProfileContext): O;
}

//////////////////////
// Errors
//////////////////////

/**
 * Base class for everything the pipeline throws on purpose.
 * `status` and `summary` are what the HTTP boundary may show to a caller;
 * `message` stays internal.
 */
export class ProfileError extends Error {
  readonly status: number = 500;
  readonly summary: string = "Failed to generate plot";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProfileError";
  }
}

export class InvalidRequestError extends ProfileError {
  override readonly status = 400;
  override readonly summary = "Invalid JSON data";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidRequestError";
  }
}

export class DegenerateInputError extends ProfileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DegenerateInputError";
  }
}

export class RenderingError extends ProfileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderingError";
  }
}

export class ProfileConfigError extends ProfileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProfileConfigError";
  }
}
