import type {
  AlignmentTarget,
  AnimationProperty,
  CompositingBlending,
  ImageFormat,
  ImageMode,
  KeyframeInterpolation,
  LightMode,
  ObjectKind,
  TextureBlending,
} from "@m3gkit/scene";

export const FILE_IDENTIFIER = Uint8Array.of(0xab, 0x4a, 0x53, 0x52, 0x31, 0x38, 0x34, 0xbb, 0x0d, 0x0a, 0x1a, 0x0a);

export const HEADER_OBJECT_TYPE = 0;
export const HEADER_INDEX = 1;
export const FIRST_OBJECT_INDEX = 2;

export const COMPRESSION_NONE = 0;
export const COMPRESSION_ZLIB = 1;

/** Byte count of a section around its payload: scheme, two lengths, checksum. */
export const SECTION_OVERHEAD = 13;

export const OBJECT_TYPE_TAGS: Readonly<Record<ObjectKind, number>> = {
  animationController: 1,
  animationTrack: 2,
  appearance: 3,
  background: 4,
  camera: 5,
  compositingMode: 6,
  fog: 7,
  polygonMode: 8,
  group: 9,
  image2D: 10,
  triangleStripArray: 11,
  light: 12,
  material: 13,
  mesh: 14,
  skinnedMesh: 16,
  texture2D: 17,
  keyframeSequence: 19,
  vertexArray: 20,
  vertexBuffer: 21,
  world: 22,
  externalReference: 255,
};

export const ALIGNMENT_TARGET: Readonly<Record<AlignmentTarget, number>> = {
  none: 144,
  origin: 145,
  xAxis: 146,
  yAxis: 147,
  zAxis: 148,
};

export const IMAGE_MODE: Readonly<Record<ImageMode, number>> = {
  border: 32,
  repeat: 33,
};

export const PROJECTION = {
  generic: 48,
  parallel: 49,
  perspective: 50,
} as const;

export const COMPOSITING_BLENDING: Readonly<Record<CompositingBlending, number>> = {
  alpha: 64,
  alphaAdd: 65,
  modulate: 66,
  modulateX2: 67,
  replace: 68,
};

export const FOG_MODE = {
  exponential: 80,
  linear: 81,
} as const;

export const IMAGE_FORMAT: Readonly<Record<ImageFormat, number>> = {
  alpha: 96,
  luminance: 97,
  luminanceAlpha: 98,
  rgb: 99,
  rgba: 100,
};

/** Bytes per pixel of each image format. */
export const IMAGE_FORMAT_BYTES: Readonly<Record<ImageFormat, number>> = {
  alpha: 1,
  luminance: 1,
  luminanceAlpha: 2,
  rgb: 3,
  rgba: 4,
};

export const LIGHT_MODE: Readonly<Record<LightMode, number>> = {
  ambient: 128,
  directional: 129,
  omni: 130,
  spot: 131,
};

export const CULLING = { back: 160, front: 161, none: 162 } as const;
export const SHADING = { flat: 164, smooth: 165 } as const;
export const WINDING = { ccw: 168, cw: 169 } as const;

export const INTERPOLATION: Readonly<Record<KeyframeInterpolation, number>> = {
  linear: 176,
  slerp: 177,
  spline: 178,
  squad: 179,
  step: 180,
};

export const REPEAT_MODE = { constant: 192, loop: 193 } as const;

export const LEVEL_FILTER = { base: 208, linear: 209, nearest: 210 } as const;
export const IMAGE_FILTER = { linear: 209, nearest: 210 } as const;

export const TEXTURE_BLENDING: Readonly<Record<TextureBlending, number>> = {
  add: 224,
  blend: 225,
  decal: 226,
  modulate: 227,
  replace: 228,
};

export const WRAP = { clamp: 240, repeat: 241 } as const;

/** Index buffer encodings. */
export const INDEX_ENCODING = {
  implicitInt: 0,
  implicitByte: 1,
  implicitShort: 2,
  explicitInt: 128,
  explicitByte: 129,
  explicitShort: 130,
} as const;

export const VERTEX_ENCODING = { raw: 0, delta: 1 } as const;

export const KEYFRAME_ENCODING_RAW = 0;

const NODE: readonly ObjectKind[] = ["world", "group", "mesh", "skinnedMesh", "camera", "light"];
const TRANSFORMABLE: readonly ObjectKind[] = [...NODE, "texture2D"];

export interface AnimationPropertyInfo {
  id: number;
  targets: readonly ObjectKind[];
  /** Allowed keyframe component counts. */
  components: readonly number[];
}

export const ANIMATION_PROPERTIES: Readonly<Record<AnimationProperty, AnimationPropertyInfo>> = {
  alpha: { id: 256, targets: [...NODE, "background", "material"], components: [1] },
  ambientColor: { id: 257, targets: ["material"], components: [3] },
  color: { id: 258, targets: ["light", "background", "fog", "texture2D"], components: [3] },
  crop: { id: 259, targets: ["background"], components: [2, 4] },
  density: { id: 260, targets: ["fog"], components: [1] },
  diffuseColor: { id: 261, targets: ["material"], components: [3] },
  emissiveColor: { id: 262, targets: ["material"], components: [3] },
  farDistance: { id: 263, targets: ["camera", "fog"], components: [1] },
  fieldOfView: { id: 264, targets: ["camera"], components: [1] },
  intensity: { id: 265, targets: ["light"], components: [1] },
  nearDistance: { id: 267, targets: ["camera", "fog"], components: [1] },
  orientation: { id: 268, targets: TRANSFORMABLE, components: [4] },
  pickability: { id: 269, targets: NODE, components: [1] },
  scale: { id: 270, targets: TRANSFORMABLE, components: [1, 3] },
  shininess: { id: 271, targets: ["material"], components: [1] },
  specularColor: { id: 272, targets: ["material"], components: [3] },
  spotAngle: { id: 273, targets: ["light"], components: [1] },
  spotExponent: { id: 274, targets: ["light"], components: [1] },
  translation: { id: 275, targets: TRANSFORMABLE, components: [3] },
  visibility: { id: 276, targets: NODE, components: [1] },
};

/** Properties whose animation replaces the static TRS of a transformable. */
export const TRS_PROPERTIES: ReadonlySet<AnimationProperty> = new Set<AnimationProperty>([
  "translation",
  "orientation",
  "scale",
]);
