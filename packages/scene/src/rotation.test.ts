import { describe, it, expect } from "vitest";
import {
  degToRad,
  quatFromAxisAngle,
  quatFromEuler,
  quatMultiply,
  quatNormalize,
  quatRotateVector,
  quatToAxisAngle,
  radToDeg,
} from "./rotation.js";

describe("degToRad", () => {
  it("converts 180 degrees to PI radians", () => {
    expect(degToRad(180)).toBeCloseTo(Math.PI, 10);
  });

  it("converts negative degrees", () => {
    expect(degToRad(-45)).toBeCloseTo(-Math.PI / 4, 10);
  });
});

describe("radToDeg", () => {
  it("round-trips with degToRad", () => {
    expect(radToDeg(degToRad(42))).toBeCloseTo(42, 10);
  });
});

describe("quaternions", () => {
  it("multiplies by identity without change", () => {
    const q = quatFromAxisAngle([0, 1, 0], 0.7);
    const r = quatMultiply(q, [0, 0, 0, 1]);
    r.forEach((value, index) => expect(value).toBeCloseTo(q[index] ?? 0, 12));
  });

  it("normalizes a zero quaternion to identity", () => {
    expect(quatNormalize([0, 0, 0, 0])).toEqual([0, 0, 0, 1]);
  });

  it("rotates +X onto +Y with a quarter turn about Z", () => {
    const v = quatRotateVector(quatFromAxisAngle([0, 0, 1], Math.PI / 2), [1, 0, 0]);
    expect(v[0]).toBeCloseTo(0, 12);
    expect(v[1]).toBeCloseTo(1, 12);
    expect(v[2]).toBeCloseTo(0, 12);
  });

  it("applies Euler X before Z", () => {
    // X quarter turn sends +Y to +Z; the Z turn leaves +Z alone.
    const q = quatFromEuler(Math.PI / 2, 0, Math.PI / 2);
    const v = quatRotateVector(q, [0, 1, 0]);
    expect(v[0]).toBeCloseTo(0, 12);
    expect(v[1]).toBeCloseTo(0, 12);
    expect(v[2]).toBeCloseTo(1, 12);
  });

  it("extracts axis and angle", () => {
    const { angle, axis } = quatToAxisAngle(quatFromAxisAngle([0, 2, 0], degToRad(30)));
    expect(radToDeg(angle)).toBeCloseTo(30, 10);
    expect(axis[0]).toBeCloseTo(0, 12);
    expect(axis[1]).toBeCloseTo(1, 12);
    expect(axis[2]).toBeCloseTo(0, 12);
  });

  it("reports the identity as a zero angle about +Z", () => {
    expect(quatToAxisAngle([0, 0, 0, 1])).toEqual({ angle: 0, axis: [0, 0, 1] });
  });

  it("picks the short arc for negative w", () => {
    const { angle } = quatToAxisAngle([0, 0, -Math.SQRT1_2, -Math.SQRT1_2]);
    expect(radToDeg(angle)).toBeCloseTo(90, 10);
  });
});
