// depthcore/test/profilePipeline.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { countDefined } from "../profile/GridInterpolator";
import { generateDepthProfile } from "../profile/ProfilePipeline";
import { DegenerateInputError, ProfileConfigError } from "../profile/ProfileTypes";

const nullable = (values: Float64Array) => Array.from(values, (v) => (Number.isNaN(v) ? null : v));

test("ProfilePipeline: fixed seed reproduces samples and grid exactly", () => {
  const a = generateDepthProfile();
  const b = generateDepthProfile();

  assert.equal(a.seed, 678);
  assert.deepEqual(a.samples, b.samples);
  assert.deepEqual(nullable(a.field.values), nullable(b.field.values));
});

test("ProfilePipeline: field is 80x80 over the declared domain", () => {
  const { field, samples } = generateDepthProfile();

  assert.equal(samples.length, 800);
  assert.equal(field.resolution, 80);
  assert.equal(field.values.length, 80 * 80);
  assert.deepEqual(field.domain, { xMin: 1, xMax: 6, zMin: 0, zMax: 80 });
  assert.equal(field.axes.xs[0], 1);
  assert.equal(field.axes.xs[79], 6);
  assert.equal(field.axes.zs[0], 0);
  assert.equal(field.axes.zs[79], 80);
});

test("ProfilePipeline: every defined node lies in [55, 1000]", () => {
  const { field } = generateDepthProfile();

  for (const v of field.values) {
    if (Number.isNaN(v)) continue;
    assert.ok(v >= 55 && v <= 1000, `value ${v}`);
  }
  // hull of 800 uniform points covers most of the lattice, never the corners
  assert.ok(countDefined(field) > 5000);
  assert.ok(Number.isNaN(field.values[0]));
});

test("ProfilePipeline: raw sample values are not clipped", () => {
  const { samples } = generateDepthProfile();
  assert.ok(samples.some((s) => s.value < 55 || s.value > 1000));
});

test("ProfilePipeline: grid shape does not depend on sample count", () => {
  const small = generateDepthProfile({ sampleCount: 100 });
  assert.equal(small.field.values.length, 80 * 80);
  assert.deepEqual(Array.from(small.field.axes.xs), Array.from(generateDepthProfile().field.axes.xs));
});

test("ProfilePipeline: another seed yields another field", () => {
  const a = generateDepthProfile({ seed: 678 });
  const b = generateDepthProfile({ seed: 679 });
  assert.notDeepEqual(nullable(a.field.values), nullable(b.field.values));
});

test("ProfilePipeline: one or two samples fail as DegenerateInputError", () => {
  assert.throws(() => generateDepthProfile({ sampleCount: 1 }), DegenerateInputError);
  assert.throws(() => generateDepthProfile({ sampleCount: 2 }), DegenerateInputError);
});

test("ProfilePipeline: invalid resolution is a ProfileConfigError", () => {
  assert.throws(() => generateDepthProfile({ resolution: 1 }), ProfileConfigError);
});
