import type {
  ScaledVertexArray,
  TrianglePrimitives,
  TriangleStripArray,
  VertexArray,
  VertexBuffer,
} from "@m3gkit/scene";
import { chooseIndexLayout, deltaEncode, implicitEncoding } from "../codec/compact.js";
import { INDEX_ENCODING, VERTEX_ENCODING } from "../constants.js";
import { writeObject3D } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

export function vertexCountOf(array: VertexArray): number {
  return Math.floor(array.values.length / array.componentCount);
}

/** Vertex count shared by the arrays of a buffer, or 0 when it has none. */
export function bufferVertexCount(buffer: VertexBuffer): number {
  const first = buffer.positions?.array ?? buffer.normals ?? buffer.colors ?? buffer.texCoords?.[0]?.array;
  return first ? vertexCountOf(first) : 0;
}

export function writeVertexArray(w: ObjectWriter, array: VertexArray): void {
  writeObject3D(w, array);
  const { componentCount, componentSize, values } = array;
  if (values.length % componentCount !== 0) {
    throw w.invalid(`${values.length} values do not split into ${componentCount}-component vertices`, "values");
  }
  const min = componentSize === 1 ? -0x80 : -0x8000;
  const max = componentSize === 1 ? 0xff : 0x7fff;
  for (let i = 0; i < values.length; i += 1) {
    const value = values[i] ?? 0;
    if (!Number.isInteger(value) || value < min || value > max) {
      throw w.overflow(`values[${i}]`, `value ${value} does not fit a ${componentSize}-byte component`);
    }
  }

  const delta = array.encoding === "delta";
  w.byte("componentSize", componentSize);
  w.byte("componentCount", componentCount);
  w.byte("encoding", delta ? VERTEX_ENCODING.delta : VERTEX_ENCODING.raw);
  w.uint16("vertexCount", vertexCountOf(array));

  const stored = delta ? deltaEncode(values, componentCount, componentSize) : Array.from(values);
  stored.forEach((value, i) => {
    if (componentSize === 1) {
      w.byte(`values[${i}]`, value & 0xff);
    } else if (delta) {
      w.uint16(`values[${i}]`, value);
    } else {
      w.int16(`values[${i}]`, value);
    }
  });
}

export function writeVertexBuffer(w: ObjectWriter, buffer: VertexBuffer): void {
  writeObject3D(w, buffer);
  const vertexCount = bufferVertexCount(buffer);
  const check = (field: string, array: VertexArray | undefined, counts: readonly number[]): void => {
    if (array === undefined) return;
    if (!counts.includes(array.componentCount)) {
      throw w.invalid(`${field} must have ${counts.join(" or ")} components`, field);
    }
    if (vertexCountOf(array) !== vertexCount) {
      throw w.invalid(`${field} has ${vertexCountOf(array)} vertices, expected ${vertexCount}`, field);
    }
  };
  check("positions", buffer.positions?.array, [3]);
  check("normals", buffer.normals, [3]);
  check("colors", buffer.colors, [3, 4]);
  if (buffer.colors && buffer.colors.componentSize !== 1) {
    throw w.invalid("colors must use 1-byte components", "colors");
  }
  buffer.texCoords?.forEach((entry, i) => check(`texCoords[${i}]`, entry.array, [2, 3]));

  w.colorRGBA("defaultColor", buffer.defaultColor ?? 0xffffffff);
  writeScaled(w, "positions", buffer.positions);
  w.ref("normals", buffer.normals);
  w.ref("colors", buffer.colors);
  const texCoords = buffer.texCoords ?? [];
  w.uint32("texCoords.length", texCoords.length);
  texCoords.forEach((entry, i) => writeScaled(w, `texCoords[${i}]`, entry));
}

function writeScaled(w: ObjectWriter, field: string, entry: ScaledVertexArray | undefined): void {
  w.ref(field, entry?.array);
  w.vector3(`${field}.bias`, entry?.bias ?? [0, 0, 0]);
  w.float32(`${field}.scale`, entry?.scale ?? 1);
}

/** Strip lengths and explicit indices (when any) of a primitive list, after arity checks. */
export function normalizePrimitives(
  w: ObjectWriter,
  primitives: TrianglePrimitives,
): { indices?: number[]; firstIndex?: number; stripLengths: number[] } {
  if (primitives.type === "triangles") {
    if (primitives.indices.length === 0 || primitives.indices.length % 3 !== 0) {
      throw w.invalid(`triangle list has ${primitives.indices.length} indices, expected a positive multiple of 3`, "primitives.indices");
    }
    return { indices: primitives.indices, stripLengths: Array.from({ length: primitives.indices.length / 3 }, () => 3) };
  }
  const { stripLengths } = primitives;
  if (stripLengths.length === 0) {
    throw w.invalid("index buffer has no strips", "primitives.stripLengths");
  }
  stripLengths.forEach((length, i) => {
    if (!Number.isInteger(length) || length < 3) {
      throw w.invalid(`strip length ${length} is below 3`, `primitives.stripLengths[${i}]`);
    }
  });
  if (primitives.type === "strips") {
    const total = stripLengths.reduce((sum, length) => sum + length, 0);
    if (total !== primitives.indices.length) {
      throw w.invalid(`strip lengths sum to ${total}, index count is ${primitives.indices.length}`, "primitives.stripLengths");
    }
    return { indices: primitives.indices, stripLengths };
  }
  return { firstIndex: primitives.firstIndex, stripLengths };
}

/** Largest vertex index a primitive list touches. */
export function maxIndexOf(primitives: TrianglePrimitives): number {
  if (primitives.type === "implicitStrips") {
    return primitives.firstIndex + primitives.stripLengths.reduce((sum, length) => sum + length, 0) - 1;
  }
  return primitives.indices.reduce((acc, value) => Math.max(acc, value), -1);
}

export function writeTriangleStripArray(w: ObjectWriter, strips: TriangleStripArray): void {
  writeObject3D(w, strips);
  const { indices, firstIndex, stripLengths } = normalizePrimitives(w, strips.primitives);

  if (indices === undefined) {
    const start = firstIndex ?? 0;
    writeImplicit(w, implicitEncoding(start), start);
  } else {
    indices.forEach((index, i) => {
      if (!Number.isInteger(index) || index < 0) {
        throw w.invalid(`index ${index} is not a vertex index`, `primitives.indices[${i}]`);
      }
    });
    const layout = chooseIndexLayout(indices);
    if (layout.kind === "implicit") {
      writeImplicit(w, layout.encoding, layout.firstIndex);
    } else {
      w.byte("encoding", layout.encoding);
      w.uint32("indices.length", indices.length);
      indices.forEach((index, i) => {
        if (layout.width === 1) w.byte(`indices[${i}]`, index);
        else if (layout.width === 2) w.uint16(`indices[${i}]`, index);
        else w.uint32(`indices[${i}]`, index);
      });
    }
  }

  w.uint32("stripLengths.length", stripLengths.length);
  stripLengths.forEach((length, i) => w.uint32(`stripLengths[${i}]`, length));
}

function writeImplicit(w: ObjectWriter, encoding: number, start: number): void {
  w.byte("encoding", encoding);
  if (encoding === INDEX_ENCODING.implicitByte) w.byte("startIndex", start);
  else if (encoding === INDEX_ENCODING.implicitShort) w.uint16("startIndex", start);
  else w.uint32("startIndex", start);
}
