import {
  isSceneNode,
  quatConjugate,
  quatMultiply,
  quatNormalize,
  quatToAxisAngle,
  radToDeg,
  type AnimationProperty,
  type Keyframe,
  type KeyframeSequence,
  type Quat,
  type SourceTransform,
  type TransformableObject,
  type UpAxis,
  type Vec3,
} from "@m3gkit/scene";
import { TRS_PROPERTIES } from "./constants.js";
import { InputValidationError } from "./errors.js";
import type { ObjectTable } from "./objectTable.js";

/** −90° about X: source +Z up becomes target +Y up. */
const UP_CONVERSION_QUAT: Quat = [-Math.SQRT1_2, 0, 0, Math.SQRT1_2];

/** Row-major matrix of the same rotation. */
const UP_CONVERSION_MATRIX: readonly number[] = [
  1, 0, 0, 0,
  0, 0, 1, 0,
  0, -1, 0, 0,
  0, 0, 0, 1,
];

export interface ComponentTransform {
  translation: Vec3;
  scale: Vec3;
  /** Degrees. */
  angle: number;
  axis: Vec3;
}

export interface ComposeOptions {
  /** The node hangs directly below the World. */
  parentIsWorld: boolean;
  /** The transform belongs to the World itself. */
  isWorld?: boolean;
  sourceUpAxis: UpAxis;
  /** The object carries translation, orientation or scale tracks. */
  animated: boolean;
}

/**
 * How the up-axis change applies to one transform: `basis` prepends it (nodes below the World),
 * `conjugate` re-expresses the transform in the target frame (the World itself).
 */
export type UpConversion = "none" | "basis" | "conjugate";

/** A transform expressed in the file's coordinate convention; produced by composeNodeTransform. */
class TargetTransform {
  constructor(
    readonly component: ComponentTransform | undefined,
    readonly general: readonly number[] | undefined,
  ) {}
}

export type { TargetTransform };

/**
 * The single place where the source up-axis is converted. Nodes directly below the World get the
 * basis change; their descendants inherit it through the hierarchy. The World's own transform is
 * conjugated so that it applies in the target frame.
 */
export function composeNodeTransform(source: SourceTransform | undefined, options: ComposeOptions): TargetTransform {
  const translation: Vec3 = source?.translation ?? [0, 0, 0];
  const rotation = quatNormalize(source?.rotation ?? [0, 0, 0, 1]);
  const scale: Vec3 = source?.scale ?? [1, 1, 1];
  const conversion = upConversionOf(options);
  const convert = conversion !== "none";

  if (!options.animated) {
    const local = composeMatrix(translation, rotation, scale);
    if (conversion === "basis") return new TargetTransform(undefined, clean(multiplyMatrices(UP_CONVERSION_MATRIX, local)));
    if (conversion === "conjugate") {
      const conjugated = multiplyMatrices(multiplyMatrices(UP_CONVERSION_MATRIX, local), transpose(UP_CONVERSION_MATRIX));
      return new TargetTransform(undefined, clean(conjugated));
    }
    return new TargetTransform(undefined, clean(local));
  }

  const t = convert ? convertVector(translation) : translation;
  const q = convert ? convertQuat(rotation) : rotation;
  const s = convert ? convertScale(scale) : scale;
  const { angle, axis } = quatToAxisAngle(q);
  const component: ComponentTransform = {
    translation: cleanVec(t),
    scale: cleanVec(s),
    angle: cleanNumber(radToDeg(angle)),
    axis: cleanVec(axis),
  };
  return new TargetTransform(component, conversion === "basis" ? clean(UP_CONVERSION_MATRIX) : undefined);
}

export function upConversionOf(options: Pick<ComposeOptions, "parentIsWorld" | "isWorld" | "sourceUpAxis">): UpConversion {
  if (options.sourceUpAxis !== "z") return "none";
  if (options.isWorld) return "conjugate";
  return options.parentIsWorld ? "basis" : "none";
}

/** `T · R · S`, row-major, translation in the last column. */
export function composeMatrix(translation: Readonly<Vec3>, rotation: Readonly<Quat>, scale: Readonly<Vec3>): number[] {
  const [x, y, z, w] = quatNormalize(rotation);
  const [sx, sy, sz] = scale;
  return [
    (1 - 2 * (y * y + z * z)) * sx, 2 * (x * y - z * w) * sy, 2 * (x * z + y * w) * sz, translation[0],
    2 * (x * y + z * w) * sx, (1 - 2 * (x * x + z * z)) * sy, 2 * (y * z - x * w) * sz, translation[1],
    2 * (x * z - y * w) * sx, 2 * (y * z + x * w) * sy, (1 - 2 * (x * x + y * y)) * sz, translation[2],
    0, 0, 0, 1,
  ];
}

export function multiplyMatrices(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  for (let row = 0; row < 4; row += 1) {
    for (let col = 0; col < 4; col += 1) {
      let sum = 0;
      for (let k = 0; k < 4; k += 1) {
        sum += (a[row * 4 + k] ?? 0) * (b[k * 4 + col] ?? 0);
      }
      out.push(sum);
    }
  }
  return out;
}

function transpose(m: readonly number[]): number[] {
  return Array.from({ length: 16 }, (_, i) => m[(i % 4) * 4 + Math.floor(i / 4)] ?? 0);
}

function convertVector(v: Readonly<Vec3>): Vec3 {
  return [v[0], v[2], -v[1]];
}

function convertQuat(q: Readonly<Quat>): Quat {
  return quatMultiply(quatMultiply(UP_CONVERSION_QUAT, q), quatConjugate(UP_CONVERSION_QUAT));
}

function convertScale(s: Readonly<Vec3>): Vec3 {
  return [s[0], s[2], s[1]];
}

function cleanNumber(value: number): number {
  return value === 0 ? 0 : value;
}

function cleanVec(v: readonly number[]): Vec3 {
  return [cleanNumber(v[0] ?? 0), cleanNumber(v[1] ?? 0), cleanNumber(v[2] ?? 0)];
}

function clean(values: readonly number[]): number[] {
  return values.map(cleanNumber);
}

/** Keyframe value rewrite applied to a sequence animating a converted node. */
type KeyframeConversion = "none" | "translation" | "orientation" | "scale";

export interface TransformPlan {
  transforms: Map<TransformableObject, TargetTransform>;
  /** Replacement keyframes for sequences whose values had to be converted. */
  keyframes: Map<KeyframeSequence, Keyframe[]>;
}

/**
 * Resolves the target transform of every transformable in the table and converts the
 * keyframes of TRS tracks on converted nodes in the same step.
 */
export function resolveTransforms(table: ObjectTable, sourceUpAxis: UpAxis): TransformPlan {
  const transforms = new Map<TransformableObject, TargetTransform>();
  const conversions = new Map<KeyframeSequence, { conversion: KeyframeConversion; field: string }>();

  for (const object of table.objects) {
    if (object.kind === "externalReference") continue;
    const tracks = object.animationTracks ?? [];
    const animated = tracks.some((track) => TRS_PROPERTIES.has(track.property));
    let convert = false;

    if (object.kind === "texture2D") {
      transforms.set(object, composeNodeTransform(object.transform, { parentIsWorld: false, sourceUpAxis, animated }));
    } else if (isSceneNode(object)) {
      const isWorld = object === table.world;
      const parentIsWorld = table.parent(object) === table.world;
      convert = upConversionOf({ parentIsWorld, isWorld, sourceUpAxis }) !== "none";
      transforms.set(object, composeNodeTransform(object.transform, { parentIsWorld, isWorld, sourceUpAxis, animated }));
    }

    tracks.forEach((track, i) => {
      const conversion: KeyframeConversion = convert && TRS_PROPERTIES.has(track.property)
        ? trsConversion(track.property)
        : "none";
      const sequence = track.keyframeSequence;
      const previous = conversions.get(sequence);
      if (previous && previous.conversion !== conversion) {
        throw new InputValidationError(
          `keyframe sequence is shared by tracks that need different coordinate conversions (${previous.field})`,
          { ...table.contextOf(sequence), field: `animationTracks[${i}]` },
        );
      }
      conversions.set(sequence, { conversion, field: previous?.field ?? `${object.kind}.animationTracks[${i}]` });
    });
  }

  const keyframes = new Map<KeyframeSequence, Keyframe[]>();
  for (const [sequence, { conversion }] of conversions) {
    if (conversion === "none") continue;
    keyframes.set(sequence, sequence.keyframes.map((keyframe) => ({
      time: keyframe.time,
      value: convertKeyframeValue(keyframe.value, conversion),
    })));
  }
  return { transforms, keyframes };
}

function trsConversion(property: AnimationProperty): KeyframeConversion {
  if (property === "translation") return "translation";
  if (property === "orientation") return "orientation";
  return "scale";
}

function convertKeyframeValue(value: number[], conversion: KeyframeConversion): number[] {
  switch (conversion) {
    case "translation":
      return value.length === 3 ? cleanVec(convertVector([value[0] ?? 0, value[1] ?? 0, value[2] ?? 0])) : value;
    case "orientation": {
      if (value.length !== 4) return value;
      const q = convertQuat([value[0] ?? 0, value[1] ?? 0, value[2] ?? 0, value[3] ?? 1]);
      return q.map(cleanNumber);
    }
    case "scale":
      return value.length === 3 ? convertScale([value[0] ?? 1, value[1] ?? 1, value[2] ?? 1]) : value;
    case "none":
      return value;
  }
}
