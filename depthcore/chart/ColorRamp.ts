//depthcore/chart/ColorRamp.ts

import { clamp, lerp } from "../utils/math";

export type RGB = { r: number; g: number; b: number };

/** Piecewise-linear channel: [position, value] stops, positions ascending in [0, 1]. */
type ChannelStops = ReadonlyArray<readonly [number, number]>;

// "jet": dark blue → cyan → yellow → dark red
const JET: { r: ChannelStops; g: ChannelStops; b: ChannelStops } = {
  r: [
    [0, 0],
    [0.35, 0],
    [0.66, 1],
    [0.89, 1],
    [1, 0.5],
  ],
  g: [
    [0, 0],
    [0.125, 0],
    [0.375, 1],
    [0.64, 1],
    [0.91, 0],
    [1, 0],
  ],
  b: [
    [0, 0.5],
    [0.11, 1],
    [0.34, 1],
    [0.65, 0],
    [1, 0],
  ],
};

function clampByte(x: number) {
  return Math.max(0, Math.min(255, Math.round(x)));
}

function sampleChannel(stops: ChannelStops, t: number): number {
  for (let i = 1; i < stops.length; i++) {
    const [p1, v1] = stops[i];
    if (t <= p1) {
      const [p0, v0] = stops[i - 1];
      return lerp(v0, v1, p1 === p0 ? 0 : (t - p0) / (p1 - p0));
    }
  }
  return stops[stops.length - 1][1];
}

export function jet(t: number): RGB {
  const u = clamp(Number.isFinite(t) ? t : 0, 0, 1);
  return {
    r: clampByte(sampleChannel(JET.r, u) * 255),
    g: clampByte(sampleChannel(JET.g, u) * 255),
    b: clampByte(sampleChannel(JET.b, u) * 255),
  };
}

export function rgbToHex(c: RGB): string {
  const hex = (n: number) => n.toString(16).padStart(2, "0");
  return `#${hex(c.r)}${hex(c.g)}${hex(c.b)}`;
}

export function jetHex(t: number): string {
  return rgbToHex(jet(t));
}

/** Ascending contour levels, endpoints included. */
export function contourLevels(min: number, max: number, count: number): number[] {
  if (count < 2) throw new Error(`need at least 2 contour levels, got ${count}`);
  const step = (max - min) / (count - 1);
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(i === count - 1 ? max : min + step * i);
  return out;
}

/**
 * One color per band between consecutive levels: the ramp at the band
 * midpoint, normalized over the full level span.
 */
export function bandColors(levels: readonly number[]): string[] {
  const lo = levels[0];
  const hi = levels[levels.length - 1];
  const colors: string[] = [];
  for (let k = 0; k < levels.length - 1; k++) {
    const mid = (levels[k] + levels[k + 1]) / 2;
    colors.push(jetHex((mid - lo) / (hi - lo)));
  }
  return colors;
}
