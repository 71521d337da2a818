import type { Quat, Vec3 } from "./types.js";

/**
 * Convert degrees to radians.
 */
export function degToRad(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Convert radians to degrees.
 */
export function radToDeg(radians: number): number {
  return radians * (180 / Math.PI);
}

/** Hamilton product `a * b`: applying the result rotates by `b` first, then `a`. */
export function quatMultiply(a: Readonly<Quat>, b: Readonly<Quat>): Quat {
  const [ax, ay, az, aw] = a;
  const [bx, by, bz, bw] = b;
  return [
    aw * bx + ax * bw + ay * bz - az * by,
    aw * by - ax * bz + ay * bw + az * bx,
    aw * bz + ax * by - ay * bx + az * bw,
    aw * bw - ax * bx - ay * by - az * bz,
  ];
}

export function quatNormalize(q: Readonly<Quat>): Quat {
  const length = Math.hypot(q[0], q[1], q[2], q[3]);
  if (length === 0) return [0, 0, 0, 1];
  return [q[0] / length, q[1] / length, q[2] / length, q[3] / length];
}

export function quatConjugate(q: Readonly<Quat>): Quat {
  return [-q[0], -q[1], -q[2], q[3]];
}

export function quatFromAxisAngle(axis: Readonly<Vec3>, radians: number): Quat {
  const length = Math.hypot(axis[0], axis[1], axis[2]);
  if (length === 0) return [0, 0, 0, 1];
  const s = Math.sin(radians / 2) / length;
  return [axis[0] * s, axis[1] * s, axis[2] * s, Math.cos(radians / 2)];
}

/**
 * Quaternion for an XYZ Euler rotation in radians: X is applied first, then Y, then Z.
 */
export function quatFromEuler(x: number, y: number, z: number): Quat {
  const qx = quatFromAxisAngle([1, 0, 0], x);
  const qy = quatFromAxisAngle([0, 1, 0], y);
  const qz = quatFromAxisAngle([0, 0, 1], z);
  return quatMultiply(qz, quatMultiply(qy, qx));
}

/**
 * Angle in radians and unit axis of a rotation. The identity maps to angle 0 about +Z.
 */
export function quatToAxisAngle(q: Readonly<Quat>): { angle: number; axis: Vec3 } {
  let [x, y, z, w] = quatNormalize(q);
  if (w < 0) {
    x = -x;
    y = -y;
    z = -z;
    w = -w;
  }
  const s = Math.hypot(x, y, z);
  if (s < 1e-12) {
    return { angle: 0, axis: [0, 0, 1] };
  }
  return { angle: 2 * Math.atan2(s, w), axis: [x / s, y / s, z / s] };
}

export function quatRotateVector(q: Readonly<Quat>, v: Readonly<Vec3>): Vec3 {
  const p = quatMultiply(quatMultiply(q, [v[0], v[1], v[2], 0]), quatConjugate(q));
  return [p[0], p[1], p[2]];
}
