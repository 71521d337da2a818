export type Vec3 = [number, number, number];

/** Quaternion as [x, y, z, w]. */
export type Quat = [number, number, number, number];

/** Coordinate convention of the producer: which source axis points up. */
export type UpAxis = "y" | "z";

/**
 * Local transform of a node in the producer's coordinate convention.
 * Missing components default to identity.
 */
export interface SourceTransform {
  translation?: Vec3;
  rotation?: Quat;
  scale?: Vec3;
}

export interface UserParameter {
  id: number;
  value: Uint8Array | string;
}

export interface Object3DFields {
  name?: string;
  userId?: number;
  animationTracks?: AnimationTrack[];
  userParameters?: UserParameter[];
}

export interface TransformableFields extends Object3DFields {
  transform?: SourceTransform;
}

export type AlignmentTarget = "none" | "origin" | "xAxis" | "yAxis" | "zAxis";

export interface NodeAlignment {
  zTarget: AlignmentTarget;
  yTarget: AlignmentTarget;
  zReference?: SceneNode;
  yReference?: SceneNode;
}

export interface NodeFields extends TransformableFields {
  renderingEnabled?: boolean;
  pickingEnabled?: boolean;
  /** 0..1, written as a byte. */
  alphaFactor?: number;
  scope?: number;
  alignment?: NodeAlignment;
}

export interface World extends NodeFields {
  kind: "world";
  children: SceneNode[];
  activeCamera?: Camera;
  background?: Background;
}

export interface Group extends NodeFields {
  kind: "group";
  children: SceneNode[];
}

export interface Submesh {
  indexBuffer: TriangleStripArray;
  appearance?: Appearance;
}

export interface Mesh extends NodeFields {
  kind: "mesh";
  vertexBuffer: VertexBuffer;
  submeshes: Submesh[];
}

export interface BoneBinding {
  node: SceneNode;
  firstVertex: number;
  vertexCount: number;
  weight: number;
}

export interface SkinnedMesh extends NodeFields {
  kind: "skinnedMesh";
  vertexBuffer: VertexBuffer;
  submeshes: Submesh[];
  skeleton: Group;
  bones: BoneBinding[];
}

export type CameraProjection =
  | { type: "perspective" | "parallel"; fovy: number; aspectRatio: number; near: number; far: number }
  | { type: "generic"; matrix: number[] };

export interface Camera extends NodeFields {
  kind: "camera";
  projection: CameraProjection;
}

export type LightMode = "ambient" | "directional" | "omni" | "spot";

export interface Light extends NodeFields {
  kind: "light";
  mode: LightMode;
  /** 0xRRGGBB */
  color?: number;
  intensity?: number;
  attenuation?: { constant: number; linear: number; quadratic: number };
  spotAngle?: number;
  spotExponent?: number;
}

export type ImageMode = "border" | "repeat";

export interface Background extends Object3DFields {
  kind: "background";
  /** 0xAARRGGBB */
  color?: number;
  image?: ImageSource;
  imageModeX?: ImageMode;
  imageModeY?: ImageMode;
  crop?: { x: number; y: number; width: number; height: number };
  depthClearEnabled?: boolean;
  colorClearEnabled?: boolean;
}

export type FogMode =
  | { type: "linear"; near: number; far: number }
  | { type: "exponential"; density: number };

export interface Fog extends Object3DFields {
  kind: "fog";
  /** 0xRRGGBB */
  color?: number;
  mode: FogMode;
}

export interface Appearance extends Object3DFields {
  kind: "appearance";
  layer?: number;
  compositingMode?: CompositingMode;
  fog?: Fog;
  polygonMode?: PolygonMode;
  material?: Material;
  textures?: Texture2D[];
}

export interface Material extends Object3DFields {
  kind: "material";
  ambientColor?: number;
  /** 0xAARRGGBB */
  diffuseColor?: number;
  emissiveColor?: number;
  specularColor?: number;
  shininess?: number;
  vertexColorTrackingEnabled?: boolean;
}

export interface PolygonMode extends Object3DFields {
  kind: "polygonMode";
  culling?: "back" | "front" | "none";
  shading?: "flat" | "smooth";
  winding?: "ccw" | "cw";
  twoSidedLightingEnabled?: boolean;
  localCameraLightingEnabled?: boolean;
  perspectiveCorrectionEnabled?: boolean;
}

export type CompositingBlending = "alpha" | "alphaAdd" | "modulate" | "modulateX2" | "replace";

export interface CompositingMode extends Object3DFields {
  kind: "compositingMode";
  depthTestEnabled?: boolean;
  depthWriteEnabled?: boolean;
  colorWriteEnabled?: boolean;
  alphaWriteEnabled?: boolean;
  blending?: CompositingBlending;
  /** 0..1, written as a byte. */
  alphaThreshold?: number;
  depthOffset?: { factor: number; units: number };
}

export type TextureBlending = "add" | "blend" | "decal" | "modulate" | "replace";

export interface Texture2D extends TransformableFields {
  kind: "texture2D";
  image: ImageSource;
  blendColor?: number;
  blending?: TextureBlending;
  wrapS?: "clamp" | "repeat";
  wrapT?: "clamp" | "repeat";
  levelFilter?: "base" | "linear" | "nearest";
  imageFilter?: "linear" | "nearest";
}

export type ImageFormat = "alpha" | "luminance" | "luminanceAlpha" | "rgb" | "rgba";

export interface Image2D extends Object3DFields {
  kind: "image2D";
  format: ImageFormat;
  width: number;
  height: number;
  mutable?: boolean;
  /** Palette entries, one pixel-sized group per entry; pixels are then palette indices. */
  palette?: ArrayLike<number>;
  pixels?: ArrayLike<number>;
}

/** An image stored next to the file and referenced by URI. */
export interface ExternalReference {
  kind: "externalReference";
  name?: string;
  uri: string;
}

export type ImageSource = Image2D | ExternalReference;

export interface VertexArray extends Object3DFields {
  kind: "vertexArray";
  componentCount: 2 | 3 | 4;
  componentSize: 1 | 2;
  /** "delta" stores each vertex as the difference from the previous one. */
  encoding?: "raw" | "delta";
  /** Integer components, interleaved per vertex. */
  values: ArrayLike<number>;
}

export interface ScaledVertexArray {
  array: VertexArray;
  scale?: number;
  bias?: Vec3;
}

export interface VertexBuffer extends Object3DFields {
  kind: "vertexBuffer";
  /** 0xAARRGGBB */
  defaultColor?: number;
  positions?: ScaledVertexArray;
  normals?: VertexArray;
  colors?: VertexArray;
  texCoords?: ScaledVertexArray[];
}

export type TrianglePrimitives =
  | { type: "triangles"; indices: number[] }
  | { type: "strips"; indices: number[]; stripLengths: number[] }
  | { type: "implicitStrips"; firstIndex: number; stripLengths: number[] };

export interface TriangleStripArray extends Object3DFields {
  kind: "triangleStripArray";
  primitives: TrianglePrimitives;
}

export interface AnimationController extends Object3DFields {
  kind: "animationController";
  speed?: number;
  weight?: number;
  activeInterval?: { start: number; end: number };
  referenceSequenceTime?: number;
  referenceWorldTime?: number;
}

export type AnimationProperty =
  | "alpha"
  | "ambientColor"
  | "color"
  | "crop"
  | "density"
  | "diffuseColor"
  | "emissiveColor"
  | "farDistance"
  | "fieldOfView"
  | "intensity"
  | "nearDistance"
  | "orientation"
  | "pickability"
  | "scale"
  | "shininess"
  | "specularColor"
  | "spotAngle"
  | "spotExponent"
  | "translation"
  | "visibility";

export interface AnimationTrack extends Object3DFields {
  kind: "animationTrack";
  keyframeSequence: KeyframeSequence;
  controller?: AnimationController;
  property: AnimationProperty;
}

export type KeyframeInterpolation = "linear" | "slerp" | "spline" | "squad" | "step";

export interface Keyframe {
  /** Milliseconds. */
  time: number;
  value: number[];
}

export interface KeyframeSequence extends Object3DFields {
  kind: "keyframeSequence";
  interpolation: KeyframeInterpolation;
  repeatMode?: "constant" | "loop";
  duration: number;
  validRange?: { first: number; last: number };
  componentCount: number;
  keyframes: Keyframe[];
}

export type SceneNode = World | Group | Mesh | SkinnedMesh | Camera | Light;

export type SceneObject =
  | SceneNode
  | Background
  | Fog
  | Appearance
  | Material
  | PolygonMode
  | CompositingMode
  | Texture2D
  | Image2D
  | ExternalReference
  | VertexArray
  | VertexBuffer
  | TriangleStripArray
  | AnimationController
  | AnimationTrack
  | KeyframeSequence;

export type ObjectKind = SceneObject["kind"];

export type TransformableObject = SceneNode | Texture2D;

export const NODE_KINDS: ReadonlySet<ObjectKind> = new Set<ObjectKind>([
  "world",
  "group",
  "mesh",
  "skinnedMesh",
  "camera",
  "light",
]);

export function isSceneNode(object: SceneObject): object is SceneNode {
  return NODE_KINDS.has(object.kind);
}

/** Every object with Object3D fields, i.e. everything except external references. */
export type Object3D = Exclude<SceneObject, ExternalReference>;
