// depthcore/test/rng.test.ts
import test from "node:test";
import assert from "node:assert/strict";

import { Rng } from "../utils/Rng";

test("Rng: same seed replays the same stream", () => {
  const a = new Rng(678);
  const b = new Rng(678);
  const seqA = Array.from({ length: 16 }, () => a.next());
  const seqB = Array.from({ length: 16 }, () => b.next());
  assert.deepEqual(seqA, seqB);
});

test("Rng: different seeds diverge", () => {
  const a = new Rng(678);
  const b = new Rng(679);
  assert.notEqual(a.next(), b.next());
});

test("Rng: string seeds are deterministic", () => {
  assert.equal(new Rng("depth").next(), new Rng("depth").next());
});

test("Rng: next() stays in [0, 1) and range() in [min, max)", () => {
  const rng = new Rng(1);
  for (let i = 0; i < 5000; i++) {
    const u = rng.next();
    assert.ok(u >= 0 && u < 1);
    const r = rng.range(1, 6);
    assert.ok(r >= 1 && r < 6);
  }
});

test("Rng: normal() pairs consume two uniforms", () => {
  const a = new Rng(5);
  a.normal();
  a.normal();

  const b = new Rng(5);
  b.next();
  b.next();

  assert.equal(a.next(), b.next());
});

test("Rng: normal() has zero mean and unit spread", () => {
  const rng = new Rng(2024);
  const n = 20000;
  let sum = 0;
  let sumSq = 0;
  for (let i = 0; i < n; i++) {
    const v = rng.normal();
    sum += v;
    sumSq += v * v;
  }
  const mean = sum / n;
  const sd = Math.sqrt(sumSq / n - mean * mean);
  assert.ok(Math.abs(mean) < 0.05, `mean ${mean}`);
  assert.ok(Math.abs(sd - 1) < 0.05, `sd ${sd}`);
});

test("Rng: uniforms() draws in order", () => {
  const a = new Rng(9);
  const b = new Rng(9);
  assert.deepEqual(a.uniforms(3, 0, 80), [b.range(0, 80), b.range(0, 80), b.range(0, 80)]);
});
