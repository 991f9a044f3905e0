import test from "node:test";
import assert from "node:assert/strict";
import {
  Affine2,
  Point2,
  Rect2,
  Size2,
  Vec2,
  clamp,
  degreesToRadians,
  nearlyEqual,
  normalizeAngle,
  radiansToDegrees,
} from "../src/index.js";
import { near } from "./helpers.js";

test("Vec2: arithmetic", () => {
  assert.deepEqual(Vec2.add({ x: 1, y: 2 }, { x: 3, y: 4 }), { x: 4, y: 6 });
  assert.deepEqual(Vec2.mul({ x: 1, y: -2 }, 3), { x: 3, y: -6 });
  assert.equal(Vec2.dot({ x: 1, y: 2 }, { x: 3, y: 4 }), 11);
  assert.equal(Vec2.cross({ x: 1, y: 0 }, { x: 0, y: 1 }), 1);
  assert.equal(Vec2.len({ x: 3, y: 4 }), 5);
  assert.deepEqual(Vec2.normalize({ x: 0, y: 0 }), { x: 0, y: 0 });
  assert.deepEqual(Vec2.normalize({ x: 0, y: -5 }), { x: 0, y: -1 });
  assert.deepEqual(Vec2.toSize({ x: 2, y: 3 }), { width: 2, height: 3 });
});

test("Point2: point minus point is a vector, point plus vector is a point", () => {
  const a = Point2.create(5, 5);
  const b = Point2.create(2, 1);
  const v = Point2.sub(a, b);
  assert.deepEqual(v, { x: 3, y: 4 });
  assert.deepEqual(Point2.add(b, v), a);
  assert.deepEqual(Point2.offset(a, v), b);
  assert.equal(Point2.distance(a, b), 5);
  assert.deepEqual(Point2.midpoint(a, b), { x: 3.5, y: 3 });
  assert.deepEqual(Point2.lerp(a, b, 0), a);
});

test("Point2.approxEq: strict tolerance", () => {
  assert.equal(Point2.approxEq({ x: 1, y: 1 }, { x: 1 + 1e-7, y: 1 }), true);
  assert.equal(Point2.approxEq({ x: 1, y: 1 }, { x: 1.1, y: 1 }, { epsilon: 0.1 + 1e-9 }), true);
  assert.equal(Point2.approxEq({ x: 1, y: 1 }, { x: 1.5, y: 1 }, { epsilon: 0.1 }), false);
});

test("Size2: area and emptiness", () => {
  assert.equal(Size2.area(Size2.create(3, 4)), 12);
  assert.equal(Size2.isEmpty(Size2.create(0, 4)), true);
  assert.equal(Size2.isEmpty(Size2.create(NaN, 4)), true);
  assert.equal(Size2.isEmpty(Size2.create(1, 4)), false);
});

test("Rect2.fromPoints normalizes", () => {
  assert.deepEqual(Rect2.fromPoints({ x: 4, y: 1 }, { x: 0, y: 3 }), Rect2.create(0, 1, 4, 3));
});

test("Rect2.normalized swaps inverted edges", () => {
  assert.deepEqual(Rect2.normalized(Rect2.create(10, 8, 2, 4)), Rect2.create(2, 4, 10, 8));
});

test("Rect2: size, center and corners", () => {
  const r = Rect2.create(0, 0, 10, 4);
  assert.deepEqual(Rect2.size(r), { width: 10, height: 4 });
  assert.deepEqual(Rect2.center(r), { x: 5, y: 2 });
  assert.deepEqual(Rect2.halfExtent(r), { x: 5, y: 2 });
  assert.deepEqual(Rect2.corner(r, "bottomLeft"), { x: 0, y: 4 });
  assert.deepEqual(Rect2.fromCenterSize({ x: 5, y: 2 }, { width: 10, height: 4 }), r);
  assert.deepEqual(Rect2.fromCenterHalfExtent({ x: 5, y: 2 }, { x: 5, y: 2 }), r);
});

test("Rect2.containsPoint is inclusive", () => {
  const r = Rect2.create(0, 0, 10, 10);
  assert.equal(Rect2.containsPoint(r, { x: 10, y: 0 }), true);
  assert.equal(Rect2.containsPoint(r, { x: 10.01, y: 5 }), false);
});

test("Rect2.intersects: touching edges intersect, empty bounds never do", () => {
  const a = Rect2.create(0, 0, 10, 10);
  assert.equal(Rect2.intersects(a, Rect2.create(10, 2, 12, 8)), true);
  assert.equal(Rect2.intersects(a, Rect2.create(11, 0, 20, 10)), false);
  assert.equal(Rect2.intersects(Rect2.fromPointList([]), a), false);
});

test("Rect2: expand, shrink, translate and combine", () => {
  const r = Rect2.create(0, 0, 10, 10);
  assert.deepEqual(Rect2.expandedBy(r, 2), Rect2.create(-2, -2, 12, 12));
  assert.deepEqual(Rect2.shrunkenBy(r, { left: 1, top: 2, right: 3, bottom: 4 }), Rect2.create(1, 2, 7, 6));
  assert.deepEqual(Rect2.translatedBy(r, { x: 5, y: -5 }), Rect2.create(5, -5, 15, 5));
  assert.deepEqual(Rect2.combinedWith(r, Rect2.create(20, 12, 15, -3)), Rect2.create(0, -3, 20, 12));
});

test("scalar helpers", () => {
  assert.equal(clamp(12, 0, 10), 10);
  assert.equal(nearlyEqual(1, 1 + 1e-9), true);
  assert.equal(normalizeAngle(-Math.PI), Math.PI);
  near(normalizeAngle((5 * Math.PI) / 2), Math.PI / 2, 1e-12);
  near(normalizeAngle(-3), -3, 1e-12);
  near(degreesToRadians(180), Math.PI, 1e-12);
  near(radiansToDegrees(Math.PI / 2), 90, 1e-12);
  near(radiansToDegrees(degreesToRadians(-135)), -135, 1e-12);
});

test("shared constants are frozen", () => {
  const up: Vec2 = Vec2.UP;
  const everywhere: Rect2 = Rect2.INFINITE;
  const identity: { m11: number } = Affine2.IDENTITY;

  assert.throws(() => {
    up.y = 1;
  }, TypeError);
  assert.throws(() => {
    everywhere.left = 0;
  }, TypeError);
  assert.throws(() => {
    identity.m11 = 2;
  }, TypeError);

  assert.deepEqual(Vec2.UP, { x: 0, y: -1 });
  assert.equal(Rect2.INFINITE.left, -Infinity);
  assert.equal(Affine2.IDENTITY.m11, 1);
});

test("namespace objects reject replaced members", () => {
  assert.equal(Reflect.set(Point2, "ORIGIN", { x: 1, y: 1 }), false);
  assert.equal(Reflect.set(Affine2, "IDENTITY", Affine2.scaling(2)), false);
  assert.deepEqual(Point2.ORIGIN, { x: 0, y: 0 });
});
