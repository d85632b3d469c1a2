//depthcore/profile/Triangulation.ts

/**
 * Delaunay triangulation (Bowyer–Watson) for scattered profile points.
 *
 * The outside of the mesh is a single vertex at infinity: every hull edge
 * carries a ghost triangle, and a point beyond that edge conflicts with it.
 * Real triangles therefore always tile the convex hull of the points.
 *
 * Output triangles index into the deduplicated point list returned alongside
 * them and are wound counter-clockwise.
 */

import { DegenerateInputError, type ProfilePoint } from "./ProfileTypes";

export type Triangle = readonly [number, number, number];

export interface Triangulation {
  points: ProfilePoint[];
  /** Index of each kept point in the caller's original list. */
  sourceIndex: number[];
  triangles: Triangle[];
}

/** Stands for the vertex at infinity. */
const GHOST = -1;

/**
 * Counter-clockwise a, b, c. A ghost triangle has c === GHOST and the
 * outside of the hull to the left of a → b.
 */
interface WorkingTriangle {
  a: number;
  b: number;
  c: number;
  cx: number;
  cz: number;
  r2: number;
}

/** Twice the signed area of abc; positive when counter-clockwise. */
export function orient(a: ProfilePoint, b: ProfilePoint, c: ProfilePoint): number {
  return (b.x - a.x) * (c.z - a.z) - (b.z - a.z) * (c.x - a.x);
}

/** Drops exact duplicates, keeping the first occurrence. */
export function uniquePoints(points: readonly ProfilePoint[]): { points: ProfilePoint[]; sourceIndex: number[] } {
  const seen = new Set<string>();
  const out: ProfilePoint[] = [];
  const sourceIndex: number[] = [];

  points.forEach((p, i) => {
    const key = `${p.x}:${p.z}`;
    if (seen.has(key)) return;
    seen.add(key);
    out.push({ x: p.x, z: p.z });
    sourceIndex.push(i);
  });

  return { points: out, sourceIndex };
}

function isCollinear(points: readonly ProfilePoint[]): boolean {
  let minX = Infinity;
  let maxX = -Infinity;
  let minZ = Infinity;
  let maxZ = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    maxX = Math.max(maxX, p.x);
    minZ = Math.min(minZ, p.z);
    maxZ = Math.max(maxZ, p.z);
  }
  const span = Math.max(maxX - minX, maxZ - minZ);
  const tolerance = span * span * 1e-12;

  const a = points[0];
  const b = points[1];
  for (let i = 2; i < points.length; i++) {
    if (Math.abs(orient(a, b, points[i])) > tolerance) return false;
  }
  return true;
}

function makeTriangle(pts: readonly ProfilePoint[], a: number, b: number, c: number): WorkingTriangle {
  // rotate the ghost into the last slot; rotation keeps the winding
  if (a === GHOST) return { a: b, b: c, c: GHOST, cx: 0, cz: 0, r2: 0 };
  if (b === GHOST) return { a: c, b: a, c: GHOST, cx: 0, cz: 0, r2: 0 };
  if (c === GHOST) return { a, b, c: GHOST, cx: 0, cz: 0, r2: 0 };

  const pa = pts[a];
  const pb = pts[b];
  const pc = pts[c];

  const d = 2 * (pa.x * (pb.z - pc.z) + pb.x * (pc.z - pa.z) + pc.x * (pa.z - pb.z));
  const a2 = pa.x * pa.x + pa.z * pa.z;
  const b2 = pb.x * pb.x + pb.z * pb.z;
  const c2 = pc.x * pc.x + pc.z * pc.z;

  if (d === 0) {
    // Degenerate sliver: an infinite circumcircle swallows every later point,
    // so the cavity always removes it.
    return { a, b, c, cx: 0, cz: 0, r2: Infinity };
  }

  const cx = (a2 * (pb.z - pc.z) + b2 * (pc.z - pa.z) + c2 * (pa.z - pb.z)) / d;
  const cz = (a2 * (pc.x - pb.x) + b2 * (pa.x - pc.x) + c2 * (pb.x - pa.x)) / d;
  const dx = pa.x - cx;
  const dz = pa.z - cz;

  return { a, b, c, cx, cz, r2: dx * dx + dz * dz };
}

/** p lies strictly between a and b on their common line. */
function withinSegment(a: ProfilePoint, b: ProfilePoint, p: ProfilePoint): boolean {
  const ab = { x: b.x - a.x, z: b.z - a.z };
  return (p.x - a.x) * ab.x + (p.z - a.z) * ab.z > 0 && (p.x - b.x) * -ab.x + (p.z - b.z) * -ab.z > 0;
}

function inConflict(pts: readonly ProfilePoint[], t: WorkingTriangle, p: ProfilePoint): boolean {
  if (t.c === GHOST) {
    const side = orient(pts[t.a], pts[t.b], p);
    if (side !== 0) return side > 0;
    return withinSegment(pts[t.a], pts[t.b], p);
  }
  const dx = p.x - t.cx;
  const dz = p.z - t.cz;
  return dx * dx + dz * dz < t.r2;
}

function edgeKey(u: number, v: number): string {
  return u < v ? `${u}:${v}` : `${v}:${u}`;
}

/** Indices of a well-shaped first triangle, counter-clockwise. */
function seedTriangle(points: readonly ProfilePoint[]): [number, number, number] {
  let best = 2;
  let bestArea = 0;
  for (let i = 2; i < points.length; i++) {
    const area = Math.abs(orient(points[0], points[1], points[i]));
    if (area > bestArea) {
      best = i;
      bestArea = area;
    }
  }
  return orient(points[0], points[1], points[best]) > 0 ? [0, 1, best] : [0, best, 1];
}

export function triangulate(input: readonly ProfilePoint[]): Triangulation {
  const { points, sourceIndex } = uniquePoints(input);

  if (points.length < 3) {
    throw new DegenerateInputError(
      `cannot triangulate ${points.length} distinct point(s); at least 3 are required`,
    );
  }
  if (isCollinear(points)) {
    throw new DegenerateInputError(`cannot triangulate ${points.length} collinear points`);
  }

  const [s0, s1, s2] = seedTriangle(points);
  let triangles: WorkingTriangle[] = [
    makeTriangle(points, s0, s1, s2),
    makeTriangle(points, s1, s0, GHOST),
    makeTriangle(points, s2, s1, GHOST),
    makeTriangle(points, s0, s2, GHOST),
  ];

  for (let i = 0; i < points.length; i++) {
    if (i === s0 || i === s1 || i === s2) continue;
    const p = points[i];
    const keep: WorkingTriangle[] = [];
    const edgeCount = new Map<string, { u: number; v: number; count: number }>();

    for (const t of triangles) {
      if (!inConflict(points, t, p)) {
        keep.push(t);
        continue;
      }
      for (const [u, v] of [
        [t.a, t.b],
        [t.b, t.c],
        [t.c, t.a],
      ]) {
        const key = edgeKey(u, v);
        const entry = edgeCount.get(key);
        if (entry) entry.count += 1;
        else edgeCount.set(key, { u, v, count: 1 });
      }
    }

    for (const { u, v, count } of edgeCount.values()) {
      if (count === 1) keep.push(makeTriangle(points, u, v, i));
    }
    triangles = keep;
  }

  const result: Triangle[] = [];
  for (const t of triangles) {
    if (t.c === GHOST) continue;
    if (orient(points[t.a], points[t.b], points[t.c]) <= 0) continue;
    result.push([t.a, t.b, t.c]);
  }

  if (result.length === 0) {
    throw new DegenerateInputError("triangulation produced no triangles");
  }

  return { points, sourceIndex, triangles: result };
}
