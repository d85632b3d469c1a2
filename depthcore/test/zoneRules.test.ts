// depthcore/test/zoneRules.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { PROFILE_DOMAIN } from "../config/profileConfig";
import { samplePointCloud } from "../profile/PointSampler";
import { ProfileConfigError, type ProfilePoint } from "../profile/ProfileTypes";
import {
  boundaryCurveBase,
  boundaryDepthAt,
  synthesizeValues,
  type ZoneRule,
} from "../profile/ZoneRules";
import { Rng } from "../utils/Rng";

function pointsIn(seed: number, count: number, x: [number, number], z: [number, number]): ProfilePoint[] {
  const rng = new Rng(seed);
  return Array.from({ length: count }, () => ({ x: rng.range(x[0], x[1]), z: rng.range(z[0], z[1]) }));
}

test("ZoneRules: boundary curve peaks at x=1.25 and is clipped to [25, 50]", () => {
  assert.equal(boundaryCurveBase(1.25), 55);
  assert.equal(boundaryDepthAt(1.25, 0), 50);
  assert.equal(boundaryDepthAt(3.75, 0), 25);
  assert.equal(boundaryDepthAt(2, 100), 50);
  assert.equal(boundaryDepthAt(2, -100), 25);
  assert.ok(Math.abs(boundaryDepthAt(2.5, 0) - 40) < 1e-9);
  // 5 depth units per unit of noise
  assert.ok(Math.abs(boundaryDepthAt(2.5, 1) - 45) < 1e-9);
});

test("ZoneRules: deepest layer wins for z >= 75 regardless of seed", () => {
  for (const seed of [1, 2, 3, 678]) {
    const rng = new Rng(seed);
    const points = samplePointCloud(PROFILE_DOMAIN, 2000, rng);
    const samples = synthesizeValues(points, rng);

    const deepest = samples.filter((s) => s.z >= 75);
    assert.ok(deepest.length > 0);
    for (const s of deepest) {
      assert.equal(s.zone, "deepestLayer");
      assert.ok(s.baseValue >= 600 && s.baseValue < 900, `base ${s.baseValue}`);
    }
  }
});

test("ZoneRules: base values fall in each zone's band", () => {
  const rng = new Rng(678);
  const samples = synthesizeValues(samplePointCloud(PROFILE_DOMAIN, 3000, rng), rng);

  const bands = {
    hardRock: [800, 1150],
    deep: [450, 700],
    pocket1: [50, 120],
    pocket2: [100, 200],
    deepestLayer: [600, 900],
  } as const;

  for (const s of samples) {
    const [lo, hi] = bands[s.zone];
    assert.ok(s.baseValue >= lo && s.baseValue < hi, `${s.zone} base ${s.baseValue}`);
  }
});

test("ZoneRules: boundary split follows z < boundaryDepth above the deepest layer", () => {
  const rng = new Rng(44);
  const samples = synthesizeValues(samplePointCloud(PROFILE_DOMAIN, 1500, rng), rng);

  for (const s of samples) {
    assert.ok(s.boundaryDepth >= 25 && s.boundaryDepth <= 50);
    if (s.z >= 75) continue;
    if (s.zone === "hardRock") assert.ok(s.z < s.boundaryDepth);
    else assert.ok(s.z >= s.boundaryDepth, `${s.zone} at z=${s.z} above boundary ${s.boundaryDepth}`);
  }
});

test("ZoneRules: pocket 1 keeps about 60% of qualifying samples", () => {
  // z > 50 is always below the boundary, so every point qualifies
  const points = pointsIn(7, 2000, [1.6, 3.4], [51, 69]);
  const samples = synthesizeValues(points, new Rng(42));

  const kept = samples.filter((s) => s.zone === "pocket1").length / samples.length;
  assert.ok(Math.abs(kept - 0.6) <= 0.05, `retention ${kept}`);
  for (const s of samples) assert.ok(s.zone === "pocket1" || s.zone === "deep");
});

test("ZoneRules: pocket 2 keeps about 60% of qualifying samples", () => {
  const points = pointsIn(8, 2000, [4.6, 5.9], [56, 74]);
  const samples = synthesizeValues(points, new Rng(43));

  const kept = samples.filter((s) => s.zone === "pocket2").length / samples.length;
  assert.ok(Math.abs(kept - 0.6) <= 0.05, `retention ${kept}`);
});

test("ZoneRules: global noise sits on top of the base value", () => {
  const rng = new Rng(3);
  const points = samplePointCloud(PROFILE_DOMAIN, 400, rng);

  const quiet = synthesizeValues(points, new Rng(3), { noiseScale: 0 });
  for (const s of quiet) assert.equal(s.value, s.baseValue);

  const noisy = synthesizeValues(points, new Rng(3));
  assert.ok(noisy.some((s) => s.value !== s.baseValue));
  // noise is the last stage, so zoning is unchanged
  assert.deepEqual(
    noisy.map((s) => s.baseValue),
    quiet.map((s) => s.baseValue),
  );
});

test("ZoneRules: draws boundary noise first, then rule values in index order", () => {
  const everything: ZoneRule = { id: "deep", matches: () => true, band: { offset: 0, spread: 1 } };
  const points: ProfilePoint[] = [
    { x: 2, z: 10 },
    { x: 3, z: 20 },
    { x: 4, z: 30 },
    { x: 5, z: 40 },
  ];

  const ref = new Rng(3);
  for (let i = 0; i < points.length; i++) ref.normal();
  const expected = [ref.next(), ref.next(), ref.next(), ref.next()];

  const samples = synthesizeValues(points, new Rng(3), { rules: [everything], noiseScale: 0 });
  assert.deepEqual(
    samples.map((s) => s.baseValue),
    expected,
  );
});

test("ZoneRules: retention draws are consumed for every sample, even with no match", () => {
  const never: ZoneRule = {
    id: "pocket1",
    matches: () => false,
    band: { offset: 0, spread: 1 },
    retention: 0.4,
  };
  const everything: ZoneRule = { id: "deep", matches: () => true, band: { offset: 0, spread: 1 } };
  const points: ProfilePoint[] = [
    { x: 2, z: 60 },
    { x: 3, z: 60 },
  ];

  const ref = new Rng(12);
  ref.normal();
  ref.normal();
  ref.next();
  ref.next();
  const expected = [ref.next(), ref.next()];

  const samples = synthesizeValues(points, new Rng(12), { rules: [never, everything], noiseScale: 0 });
  assert.deepEqual(
    samples.map((s) => s.baseValue),
    expected,
  );
  assert.deepEqual(
    samples.map((s) => s.zone),
    ["deep", "deep"],
  );
});

test("ZoneRules: later rules override earlier ones", () => {
  const first: ZoneRule = { id: "deep", matches: () => true, band: { offset: 0, spread: 1 } };
  const second: ZoneRule = { id: "pocket2", matches: (p) => p.x > 3, band: { offset: 100, spread: 0 } };
  const points: ProfilePoint[] = [
    { x: 2, z: 60 },
    { x: 4, z: 60 },
  ];

  const samples = synthesizeValues(points, new Rng(1), { rules: [first, second], noiseScale: 0 });
  assert.equal(samples[0].zone, "deep");
  assert.equal(samples[1].zone, "pocket2");
  assert.equal(samples[1].baseValue, 100);
});

test("ZoneRules: a rule set that leaves a sample unzoned is rejected", () => {
  const shallowOnly: ZoneRule = { id: "hardRock", matches: (p) => p.z < 10, band: { offset: 800, spread: 1 } };
  assert.throws(
    () => synthesizeValues([{ x: 2, z: 60 }], new Rng(1), { rules: [shallowOnly] }),
    ProfileConfigError,
  );
});
