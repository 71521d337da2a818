import { z } from "zod";

export const SCENE_DOCUMENT_FORMAT = "m3g-scene";
export const SCENE_DOCUMENT_VERSION = 1;

const IdSchema = z.string().min(1);
const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);
const QuatSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);
const ColorSchema = z.number().int().min(0).max(0xffffffff);
const UInt32Schema = z.number().int().min(0).max(0xffffffff);
const UnitSchema = z.number().min(0).max(1);

const object3DShape = {
  id: IdSchema,
  name: z.string().optional(),
  userId: UInt32Schema.optional(),
  animationTracks: z.array(IdSchema).optional(),
  userParameters: z
    .array(
      z.object({
        id: UInt32Schema,
        value: z.union([z.string(), z.array(z.number().int().min(0).max(255))]),
      }),
    )
    .optional(),
};

const transformableShape = {
  ...object3DShape,
  transform: z
    .object({
      translation: Vec3Schema.optional(),
      rotation: QuatSchema.optional(),
      scale: Vec3Schema.optional(),
    })
    .optional(),
};

const AlignmentTargetSchema = z.enum(["none", "origin", "xAxis", "yAxis", "zAxis"]);

const nodeShape = {
  ...transformableShape,
  renderingEnabled: z.boolean().optional(),
  pickingEnabled: z.boolean().optional(),
  alphaFactor: UnitSchema.optional(),
  scope: UInt32Schema.optional(),
  alignment: z
    .object({
      zTarget: AlignmentTargetSchema,
      yTarget: AlignmentTargetSchema,
      zReference: IdSchema.optional(),
      yReference: IdSchema.optional(),
    })
    .optional(),
};

const SubmeshSchema = z.object({
  indexBuffer: IdSchema,
  appearance: IdSchema.optional(),
});

const ScaledArraySchema = z.object({
  array: IdSchema,
  scale: z.number().optional(),
  bias: Vec3Schema.optional(),
});

export const WorldDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("world"),
  children: z.array(IdSchema).default([]),
  activeCamera: IdSchema.optional(),
  background: IdSchema.optional(),
});

export const GroupDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("group"),
  children: z.array(IdSchema).default([]),
});

export const MeshDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("mesh"),
  vertexBuffer: IdSchema,
  submeshes: z.array(SubmeshSchema),
});

export const SkinnedMeshDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("skinnedMesh"),
  vertexBuffer: IdSchema,
  submeshes: z.array(SubmeshSchema),
  skeleton: IdSchema,
  bones: z.array(
    z.object({
      node: IdSchema,
      firstVertex: UInt32Schema,
      vertexCount: UInt32Schema,
      weight: z.number().int(),
    }),
  ),
});

export const CameraDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("camera"),
  projection: z.discriminatedUnion("type", [
    z.object({
      type: z.enum(["perspective", "parallel"]),
      fovy: z.number(),
      aspectRatio: z.number(),
      near: z.number(),
      far: z.number(),
    }),
    z.object({
      type: z.literal("generic"),
      matrix: z.array(z.number()).length(16),
    }),
  ]),
});

export const LightDocSchema = z.object({
  ...nodeShape,
  kind: z.literal("light"),
  mode: z.enum(["ambient", "directional", "omni", "spot"]),
  color: ColorSchema.optional(),
  intensity: z.number().optional(),
  attenuation: z
    .object({ constant: z.number(), linear: z.number(), quadratic: z.number() })
    .optional(),
  spotAngle: z.number().optional(),
  spotExponent: z.number().optional(),
});

const ImageModeSchema = z.enum(["border", "repeat"]);

export const BackgroundDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("background"),
  color: ColorSchema.optional(),
  image: IdSchema.optional(),
  imageModeX: ImageModeSchema.optional(),
  imageModeY: ImageModeSchema.optional(),
  crop: z
    .object({ x: z.number().int(), y: z.number().int(), width: z.number().int(), height: z.number().int() })
    .optional(),
  depthClearEnabled: z.boolean().optional(),
  colorClearEnabled: z.boolean().optional(),
});

export const FogDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("fog"),
  color: ColorSchema.optional(),
  mode: z.discriminatedUnion("type", [
    z.object({ type: z.literal("linear"), near: z.number(), far: z.number() }),
    z.object({ type: z.literal("exponential"), density: z.number() }),
  ]),
});

export const AppearanceDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("appearance"),
  layer: z.number().int().min(-63).max(63).optional(),
  compositingMode: IdSchema.optional(),
  fog: IdSchema.optional(),
  polygonMode: IdSchema.optional(),
  material: IdSchema.optional(),
  textures: z.array(IdSchema).optional(),
});

export const MaterialDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("material"),
  ambientColor: ColorSchema.optional(),
  diffuseColor: ColorSchema.optional(),
  emissiveColor: ColorSchema.optional(),
  specularColor: ColorSchema.optional(),
  shininess: z.number().min(0).max(128).optional(),
  vertexColorTrackingEnabled: z.boolean().optional(),
});

export const PolygonModeDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("polygonMode"),
  culling: z.enum(["back", "front", "none"]).optional(),
  shading: z.enum(["flat", "smooth"]).optional(),
  winding: z.enum(["ccw", "cw"]).optional(),
  twoSidedLightingEnabled: z.boolean().optional(),
  localCameraLightingEnabled: z.boolean().optional(),
  perspectiveCorrectionEnabled: z.boolean().optional(),
});

export const CompositingModeDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("compositingMode"),
  depthTestEnabled: z.boolean().optional(),
  depthWriteEnabled: z.boolean().optional(),
  colorWriteEnabled: z.boolean().optional(),
  alphaWriteEnabled: z.boolean().optional(),
  blending: z.enum(["alpha", "alphaAdd", "modulate", "modulateX2", "replace"]).optional(),
  alphaThreshold: UnitSchema.optional(),
  depthOffset: z.object({ factor: z.number(), units: z.number() }).optional(),
});

export const Texture2DDocSchema = z.object({
  ...transformableShape,
  kind: z.literal("texture2D"),
  image: IdSchema,
  blendColor: ColorSchema.optional(),
  blending: z.enum(["add", "blend", "decal", "modulate", "replace"]).optional(),
  wrapS: z.enum(["clamp", "repeat"]).optional(),
  wrapT: z.enum(["clamp", "repeat"]).optional(),
  levelFilter: z.enum(["base", "linear", "nearest"]).optional(),
  imageFilter: z.enum(["linear", "nearest"]).optional(),
});

const ByteArraySchema = z.array(z.number().int().min(0).max(255));

export const Image2DDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("image2D"),
  format: z.enum(["alpha", "luminance", "luminanceAlpha", "rgb", "rgba"]),
  width: UInt32Schema,
  height: UInt32Schema,
  mutable: z.boolean().optional(),
  palette: ByteArraySchema.optional(),
  pixels: ByteArraySchema.optional(),
});

export const ExternalReferenceDocSchema = z.object({
  id: IdSchema,
  kind: z.literal("externalReference"),
  name: z.string().optional(),
  uri: z.string().min(1),
});

export const VertexArrayDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("vertexArray"),
  componentCount: z.union([z.literal(2), z.literal(3), z.literal(4)]),
  componentSize: z.union([z.literal(1), z.literal(2)]),
  encoding: z.enum(["raw", "delta"]).optional(),
  /** Integer components. Exactly one of `values` and `floats` is given. */
  values: z.array(z.number().int()).optional(),
  /** Float components, quantized on load. */
  floats: z.array(z.number()).optional(),
  flipV: z.boolean().optional(),
});

export const VertexBufferDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("vertexBuffer"),
  defaultColor: ColorSchema.optional(),
  positions: ScaledArraySchema.optional(),
  normals: IdSchema.optional(),
  colors: IdSchema.optional(),
  texCoords: z.array(ScaledArraySchema).optional(),
});

const IndexSchema = z.number().int().min(0);

export const TriangleStripArrayDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("triangleStripArray"),
  primitives: z.discriminatedUnion("type", [
    z.object({ type: z.literal("triangles"), indices: z.array(IndexSchema) }),
    z.object({ type: z.literal("strips"), indices: z.array(IndexSchema), stripLengths: z.array(IndexSchema) }),
    z.object({ type: z.literal("implicitStrips"), firstIndex: IndexSchema, stripLengths: z.array(IndexSchema) }),
  ]),
});

export const AnimationControllerDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("animationController"),
  speed: z.number().optional(),
  weight: z.number().optional(),
  activeInterval: z.object({ start: z.number().int(), end: z.number().int() }).optional(),
  referenceSequenceTime: z.number().optional(),
  referenceWorldTime: z.number().int().optional(),
});

export const AnimationTrackDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("animationTrack"),
  keyframeSequence: IdSchema,
  controller: IdSchema.optional(),
  property: z.enum([
    "alpha",
    "ambientColor",
    "color",
    "crop",
    "density",
    "diffuseColor",
    "emissiveColor",
    "farDistance",
    "fieldOfView",
    "intensity",
    "nearDistance",
    "orientation",
    "pickability",
    "scale",
    "shininess",
    "specularColor",
    "spotAngle",
    "spotExponent",
    "translation",
    "visibility",
  ]),
});

export const KeyframeSequenceDocSchema = z.object({
  ...object3DShape,
  kind: z.literal("keyframeSequence"),
  interpolation: z.enum(["linear", "slerp", "spline", "squad", "step"]),
  repeatMode: z.enum(["constant", "loop"]).optional(),
  duration: UInt32Schema.min(1),
  validRange: z.object({ first: UInt32Schema, last: UInt32Schema }).optional(),
  componentCount: z.number().int().min(1),
  keyframes: z.array(z.object({ time: z.number().int().min(0).max(0x7fffffff), value: z.array(z.number()) })).min(1),
});

export const SceneObjectDocSchema = z.discriminatedUnion("kind", [
  WorldDocSchema,
  GroupDocSchema,
  MeshDocSchema,
  SkinnedMeshDocSchema,
  CameraDocSchema,
  LightDocSchema,
  BackgroundDocSchema,
  FogDocSchema,
  AppearanceDocSchema,
  MaterialDocSchema,
  PolygonModeDocSchema,
  CompositingModeDocSchema,
  Texture2DDocSchema,
  Image2DDocSchema,
  ExternalReferenceDocSchema,
  VertexArrayDocSchema,
  VertexBufferDocSchema,
  TriangleStripArrayDocSchema,
  AnimationControllerDocSchema,
  AnimationTrackDocSchema,
  KeyframeSequenceDocSchema,
]);

export const SceneDocumentSchema = z.object({
  format: z.literal(SCENE_DOCUMENT_FORMAT),
  version: z.literal(SCENE_DOCUMENT_VERSION),
  upAxis: z.enum(["y", "z"]).default("y"),
  root: IdSchema,
  objects: z.array(SceneObjectDocSchema),
});

export type SceneObjectDoc = z.infer<typeof SceneObjectDocSchema>;
export type SceneDocument = z.infer<typeof SceneDocumentSchema>;
