import assert from "node:assert/strict";
import seedrandom from "seedrandom";
import { Affine2, normalizeAngle } from "../src/index.js";

export type Rng = () => number;

export function createRng(seed: string): Rng {
  return seedrandom(seed);
}

/** Uniform in [min, max). */
export function between(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

export function randomAffine(rng: Rng, range = 5): Affine2 {
  return Affine2.create(
    between(rng, -range, range),
    between(rng, -range, range),
    between(rng, -range, range),
    between(rng, -range, range),
    between(rng, -range * 10, range * 10),
    between(rng, -range * 10, range * 10)
  );
}

export function near(a: number, b: number, eps: number) {
  assert.ok(Math.abs(a - b) <= eps, `expected ${a} ~ ${b} (eps=${eps})`);
}

export function nearPoint(p: { x: number; y: number }, q: { x: number; y: number }, eps: number) {
  const d = Math.hypot(p.x - q.x, p.y - q.y);
  assert.ok(d <= eps, `expected dist<=${eps}, got ${d} p=${JSON.stringify(p)} q=${JSON.stringify(q)}`);
}

export function nearAngle(a: number, b: number, eps: number) {
  const diff = normalizeAngle(a - b);
  assert.ok(Math.abs(diff) <= eps, `angles ${a} and ${b} differ by ${diff} (eps=${eps})`);
}

export function nearAffine(actual: Affine2, expected: Affine2, eps: number) {
  assert.ok(
    Affine2.approxEq(actual, expected, { epsilon: eps }),
    `expected ${Affine2.format(expected, 9)}, got ${Affine2.format(actual, 9)} (eps=${eps})`
  );
}
