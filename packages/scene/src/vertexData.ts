import type { TrianglePrimitives, Vec3, VertexArray } from "./types.js";

export interface QuantizedArray {
  array: VertexArray;
  scale: number;
  bias: Vec3;
}

export interface QuantizeOptions {
  componentSize?: 1 | 2;
  /** Texture coordinates: store `1 - v` for the second component. */
  flipV?: boolean;
  name?: string;
}

/**
 * Quantize float positions or texture coordinates into an integer vertex array.
 *
 * One scale covers all components (the widest component range); each component gets its own
 * bias at the midpoint of its range. Values are truncated toward zero, so the stored integers
 * stay within the signed range of the component size.
 */
export function quantizeVertexArray(
  floats: ArrayLike<number>,
  componentCount: 2 | 3,
  options: QuantizeOptions = {},
): QuantizedArray {
  const componentSize = options.componentSize ?? 2;
  if (floats.length % componentCount !== 0) {
    throw new RangeError(`float count ${floats.length} is not a multiple of ${componentCount}`);
  }
  const source = Array.from(floats, (value, index) =>
    options.flipV && index % componentCount === 1 ? 1 - value : value);

  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];
  source.forEach((value, index) => {
    if (!Number.isFinite(value)) throw new RangeError(`float at ${index} is not finite`);
    const c = index % componentCount;
    min[c] = Math.min(min[c] ?? Infinity, value);
    max[c] = Math.max(max[c] ?? -Infinity, value);
  });

  const bias: Vec3 = [0, 0, 0];
  let range = 0;
  for (let c = 0; c < componentCount; c += 1) {
    const lo = min[c] ?? 0;
    const hi = max[c] ?? 0;
    if (lo > hi) continue;
    bias[c] = (lo + hi) / 2;
    range = Math.max(range, hi - lo);
  }
  const steps = 2 ** (8 * componentSize) - 2;
  const scale = range > 0 ? range / steps : 1;

  const values = source.map((value, index) => Math.trunc((value - (bias[index % componentCount] ?? 0)) / scale));
  const array: VertexArray = {
    kind: "vertexArray",
    componentCount,
    componentSize,
    values,
  };
  if (options.name !== undefined) array.name = options.name;
  return { array, scale, bias };
}

/** Unit normals to signed bytes, 127 per unit. */
export function quantizeNormals(floats: ArrayLike<number>): VertexArray {
  if (floats.length % 3 !== 0) {
    throw new RangeError(`float count ${floats.length} is not a multiple of 3`);
  }
  return {
    kind: "vertexArray",
    componentCount: 3,
    componentSize: 1,
    values: Array.from(floats, (value) => clamp(Math.round(value * 127), -127, 127)),
  };
}

/** Colors in 0..1 to unsigned bytes. */
export function quantizeColors(floats: ArrayLike<number>, componentCount: 3 | 4): VertexArray {
  if (floats.length % componentCount !== 0) {
    throw new RangeError(`float count ${floats.length} is not a multiple of ${componentCount}`);
  }
  return {
    kind: "vertexArray",
    componentCount,
    componentSize: 1,
    values: Array.from(floats, (value) => clamp(Math.round(value * 255), 0, 255)),
  };
}

/**
 * Numeric user ID encoded in an object name as `"<label>#<digits>"`, e.g. `"Cube#42"` → 42.
 */
export function userIdFromName(name: string): number | undefined {
  const match = /#(\d+)$/.exec(name);
  if (!match?.[1]) return undefined;
  const id = Number(match[1]);
  return id <= 0xffffffff ? id : undefined;
}

export function linearToSrgb(channel: number): number {
  const c = clamp(channel, 0, 1);
  return c <= 0.0031308 ? c * 12.92 : 1.055 * c ** (1 / 2.4) - 0.055;
}

/**
 * Pack a linear RGB color as `0xRRGGBB`, or `0xAARRGGBB` when alpha is given.
 * Alpha is stored linearly.
 */
export function srgbColorFromLinear(rgb: Readonly<Vec3>, alpha?: number): number {
  const [r, g, b] = rgb.map((channel) => Math.round(linearToSrgb(channel) * 255));
  const packed = ((r ?? 0) << 16) | ((g ?? 0) << 8) | (b ?? 0);
  if (alpha === undefined) return packed;
  return ((Math.round(clamp(alpha, 0, 1) * 255) << 24) | packed) >>> 0;
}

/**
 * Fan-triangulate polygon faces into an indexed triangle list.
 */
export function triangleList(faces: ReadonlyArray<readonly number[]>): TrianglePrimitives {
  const indices: number[] = [];
  faces.forEach((face, faceIndex) => {
    if (face.length < 3) {
      throw new RangeError(`face ${faceIndex} has ${face.length} vertices`);
    }
    const [first] = face;
    for (let i = 1; i + 1 < face.length; i += 1) {
      indices.push(first ?? 0, face[i] ?? 0, face[i + 1] ?? 0);
    }
  });
  return { type: "triangles", indices };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
