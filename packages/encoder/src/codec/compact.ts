import { INDEX_ENCODING } from "../constants.js";

export type IndexLayout =
  | { kind: "implicit"; encoding: number; firstIndex: number }
  | { kind: "explicit"; encoding: number; width: 1 | 2 | 4 };

/**
 * Narrowest layout for an index list: a consecutive run becomes an implicit start index,
 * anything else an explicit array of the smallest width that holds the largest index.
 */
export function chooseIndexLayout(indices: readonly number[]): IndexLayout {
  const first = indices[0] ?? 0;
  const consecutive = indices.length > 0 && indices.every((value, i) => value === first + i);
  if (consecutive) {
    return { kind: "implicit", encoding: implicitEncoding(first), firstIndex: first };
  }
  const max = indices.reduce((acc, value) => Math.max(acc, value), 0);
  if (max <= 0xff) return { kind: "explicit", encoding: INDEX_ENCODING.explicitByte, width: 1 };
  if (max <= 0xffff) return { kind: "explicit", encoding: INDEX_ENCODING.explicitShort, width: 2 };
  return { kind: "explicit", encoding: INDEX_ENCODING.explicitInt, width: 4 };
}

export function implicitEncoding(firstIndex: number): number {
  if (firstIndex <= 0xff) return INDEX_ENCODING.implicitByte;
  if (firstIndex <= 0xffff) return INDEX_ENCODING.implicitShort;
  return INDEX_ENCODING.implicitInt;
}

/**
 * Per-vertex differences, wrapped to the component width. The first vertex is kept as is
 * (wrapped the same way); decoding adds each row to the previous one modulo 2^(8·size).
 */
export function deltaEncode(values: ArrayLike<number>, componentCount: number, componentSize: 1 | 2): number[] {
  const modulus = componentSize === 1 ? 0x100 : 0x10000;
  const out: number[] = [];
  for (let i = 0; i < values.length; i += 1) {
    const previous = i >= componentCount ? (values[i - componentCount] ?? 0) : 0;
    const delta = (values[i] ?? 0) - previous;
    out.push(((delta % modulus) + modulus) % modulus);
  }
  return out;
}
