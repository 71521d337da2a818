import { SceneDocumentSchema, type SceneObjectDoc } from "./sceneSchema.js";
import type {
  NodeFields,
  Object3DFields,
  ObjectKind,
  SceneNode,
  SceneObject,
  TransformableFields,
  UpAxis,
  UserParameter,
  Vec3,
  VertexArray,
  World,
} from "./types.js";
import { quantizeColors, quantizeNormals, quantizeVertexArray } from "./vertexData.js";

export class SceneDocumentError extends Error {
  readonly code = "M3G_ERR_SCENE_DOCUMENT";
  readonly path: string;

  constructor(path: string, message: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "SceneDocumentError";
    this.path = path;
  }
}

export interface LoadedScene {
  world: World;
  upAxis: UpAxis;
  /** Document ids not reachable from the root. */
  unusedIds: string[];
}

type ObjectOfKind<K extends ObjectKind> = Extract<SceneObject, { kind: K }>;
type DocOfKind<K extends SceneObjectDoc["kind"]> = Extract<SceneObjectDoc, { kind: K }>;

const NODE_REFERENCE_KINDS: readonly SceneNode["kind"][] = ["world", "group", "mesh", "skinnedMesh", "camera", "light"];
const CHILD_KINDS: readonly SceneNode["kind"][] = ["group", "mesh", "skinnedMesh", "camera", "light"];
const IMAGE_KINDS = ["image2D", "externalReference"] as const;

interface DocEntry {
  doc: SceneObjectDoc;
  path: string;
}

/** How a `floats` vertex array is quantized, decided by the vertex buffer slot that uses it. */
type FloatRole = "scaled" | "normals" | "colors";

const FLOAT_ROLE_LABELS: Record<FloatRole, string> = {
  scaled: "positions or texture coordinates",
  normals: "normals",
  colors: "colors",
};

interface FloatUse {
  role: FloatRole;
  path: string;
}

/**
 * Parse a JSON scene document and resolve it into a scene graph rooted at a World.
 */
export function parseSceneDocument(json: string): LoadedScene {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new SceneDocumentError("", `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return loadSceneDocument(data);
}

export function loadSceneDocument(data: unknown): LoadedScene {
  const parsed = SceneDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SceneDocumentError(formatPath(issue?.path ?? []), issue?.message ?? "invalid scene document");
  }
  const document = parsed.data;
  const resolver = new DocumentResolver(document.objects);
  const world = resolver.resolve(document.root, "root", ["world"]);
  return {
    world,
    upAxis: document.upAxis,
    unusedIds: document.objects.map((doc) => doc.id).filter((id) => !resolver.isResolved(id)),
  };
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === "number") return `${acc}[${segment}]`;
    return acc ? `${acc}.${segment}` : segment;
  }, "");
}

function isKind<K extends ObjectKind>(kind: ObjectKind, kinds: readonly K[]): kind is K {
  return kinds.some((candidate) => candidate === kind);
}

function hasKind<K extends ObjectKind>(object: SceneObject, kinds: readonly K[]): object is ObjectOfKind<K> {
  return isKind(object.kind, kinds);
}

class DocumentResolver {
  private readonly entries = new Map<string, DocEntry>();
  private readonly resolved = new Map<string, SceneObject>();
  private readonly inProgress = new Set<string>();
  private readonly quantized = new Map<VertexArray, { scale: number; bias: Vec3 }>();
  private readonly floatUses = new Map<string, FloatUse>();

  constructor(objects: SceneObjectDoc[]) {
    objects.forEach((doc, index) => {
      const path = `objects[${index}]`;
      if (this.entries.has(doc.id)) {
        throw new SceneDocumentError(`${path}.id`, `duplicate id "${doc.id}"`);
      }
      this.entries.set(doc.id, { doc, path });
    });
    objects.forEach((doc, index) => {
      if (doc.kind !== "vertexBuffer") return;
      const path = `objects[${index}]`;
      if (doc.positions) this.useFloats(doc.positions.array, `${path}.positions.array`, "scaled");
      if (doc.normals) this.useFloats(doc.normals, `${path}.normals`, "normals");
      if (doc.colors) this.useFloats(doc.colors, `${path}.colors`, "colors");
      doc.texCoords?.forEach((entry, i) => this.useFloats(entry.array, `${path}.texCoords[${i}].array`, "scaled"));
    });
  }

  /** Normals and colors carry no scale or bias, so a float array cannot serve both kinds of slot. */
  private useFloats(id: string, path: string, role: FloatRole): void {
    const doc = this.entries.get(id)?.doc;
    if (doc?.kind !== "vertexArray" || doc.floats === undefined) return;
    const previous = this.floatUses.get(id);
    if (previous && previous.role !== role) {
      throw new SceneDocumentError(path, `"${id}" is already used as ${FLOAT_ROLE_LABELS[previous.role]} at ${previous.path}`);
    }
    if (!previous) this.floatUses.set(id, { role, path });
  }

  isResolved(id: string): boolean {
    return this.resolved.has(id);
  }

  resolve<K extends ObjectKind>(id: string, path: string, kinds: readonly K[]): ObjectOfKind<K> {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new SceneDocumentError(path, `unknown id "${id}"`);
    }
    if (!isKind(entry.doc.kind, kinds)) {
      throw new SceneDocumentError(path, `"${id}" is a ${entry.doc.kind}, expected ${kinds.join(" or ")}`);
    }
    let object = this.resolved.get(id);
    if (!object) {
      if (this.inProgress.has(id)) {
        throw new SceneDocumentError(path, `reference cycle through "${id}"`);
      }
      this.inProgress.add(id);
      object = this.build(entry);
      this.inProgress.delete(id);
      this.resolved.set(id, object);
    }
    if (!hasKind(object, kinds)) {
      throw new SceneDocumentError(path, `"${id}" is a ${object.kind}, expected ${kinds.join(" or ")}`);
    }
    return object;
  }

  private optional<K extends ObjectKind>(
    id: string | undefined,
    path: string,
    kinds: readonly K[],
  ): ObjectOfKind<K> | undefined {
    return id === undefined ? undefined : this.resolve(id, path, kinds);
  }

  private list<K extends ObjectKind>(ids: string[] | undefined, path: string, kinds: readonly K[]): ObjectOfKind<K>[] {
    return (ids ?? []).map((id, index) => this.resolve(id, `${path}[${index}]`, kinds));
  }

  private build({ doc, path }: DocEntry): SceneObject {
    switch (doc.kind) {
      case "world":
        return {
          ...this.nodeFields(doc, path),
          kind: "world",
          children: this.list(doc.children, `${path}.children`, CHILD_KINDS),
          activeCamera: this.optional(doc.activeCamera, `${path}.activeCamera`, ["camera"]),
          background: this.optional(doc.background, `${path}.background`, ["background"]),
        };
      case "group":
        return {
          ...this.nodeFields(doc, path),
          kind: "group",
          children: this.list(doc.children, `${path}.children`, CHILD_KINDS),
        };
      case "mesh":
        return {
          ...this.nodeFields(doc, path),
          kind: "mesh",
          vertexBuffer: this.resolve(doc.vertexBuffer, `${path}.vertexBuffer`, ["vertexBuffer"]),
          submeshes: this.submeshes(doc, path),
        };
      case "skinnedMesh":
        return {
          ...this.nodeFields(doc, path),
          kind: "skinnedMesh",
          vertexBuffer: this.resolve(doc.vertexBuffer, `${path}.vertexBuffer`, ["vertexBuffer"]),
          submeshes: this.submeshes(doc, path),
          skeleton: this.resolve(doc.skeleton, `${path}.skeleton`, ["group"]),
          bones: doc.bones.map((bone, index) => ({
            node: this.resolve(bone.node, `${path}.bones[${index}].node`, CHILD_KINDS),
            firstVertex: bone.firstVertex,
            vertexCount: bone.vertexCount,
            weight: bone.weight,
          })),
        };
      case "camera":
        return { ...this.nodeFields(doc, path), kind: "camera", projection: doc.projection };
      case "light":
        return {
          ...this.nodeFields(doc, path),
          kind: "light",
          mode: doc.mode,
          color: doc.color,
          intensity: doc.intensity,
          attenuation: doc.attenuation,
          spotAngle: doc.spotAngle,
          spotExponent: doc.spotExponent,
        };
      case "background":
        return {
          ...this.object3DFields(doc, path),
          kind: "background",
          color: doc.color,
          image: this.optional(doc.image, `${path}.image`, IMAGE_KINDS),
          imageModeX: doc.imageModeX,
          imageModeY: doc.imageModeY,
          crop: doc.crop,
          depthClearEnabled: doc.depthClearEnabled,
          colorClearEnabled: doc.colorClearEnabled,
        };
      case "fog":
        return { ...this.object3DFields(doc, path), kind: "fog", color: doc.color, mode: doc.mode };
      case "appearance":
        return {
          ...this.object3DFields(doc, path),
          kind: "appearance",
          layer: doc.layer,
          compositingMode: this.optional(doc.compositingMode, `${path}.compositingMode`, ["compositingMode"]),
          fog: this.optional(doc.fog, `${path}.fog`, ["fog"]),
          polygonMode: this.optional(doc.polygonMode, `${path}.polygonMode`, ["polygonMode"]),
          material: this.optional(doc.material, `${path}.material`, ["material"]),
          textures: this.list(doc.textures, `${path}.textures`, ["texture2D"]),
        };
      case "material": {
        const { id: _id, animationTracks: _tracks, userParameters: _params, ...rest } = doc;
        return { ...rest, ...this.object3DFields(doc, path) };
      }
      case "polygonMode": {
        const { id: _id, animationTracks: _tracks, userParameters: _params, ...rest } = doc;
        return { ...rest, ...this.object3DFields(doc, path) };
      }
      case "compositingMode": {
        const { id: _id, animationTracks: _tracks, userParameters: _params, ...rest } = doc;
        return { ...rest, ...this.object3DFields(doc, path) };
      }
      case "texture2D":
        return {
          ...this.transformableFields(doc, path),
          kind: "texture2D",
          image: this.resolve(doc.image, `${path}.image`, IMAGE_KINDS),
          blendColor: doc.blendColor,
          blending: doc.blending,
          wrapS: doc.wrapS,
          wrapT: doc.wrapT,
          levelFilter: doc.levelFilter,
          imageFilter: doc.imageFilter,
        };
      case "image2D":
        return {
          ...this.object3DFields(doc, path),
          kind: "image2D",
          format: doc.format,
          width: doc.width,
          height: doc.height,
          mutable: doc.mutable,
          palette: doc.palette,
          pixels: doc.pixels,
        };
      case "externalReference":
        return { kind: "externalReference", name: doc.name, uri: doc.uri };
      case "vertexArray":
        return this.vertexArray(doc, path);
      case "vertexBuffer":
        return {
          ...this.object3DFields(doc, path),
          kind: "vertexBuffer",
          defaultColor: doc.defaultColor,
          positions: doc.positions && this.scaledArray(doc.positions, `${path}.positions`),
          normals: this.optional(doc.normals, `${path}.normals`, ["vertexArray"]),
          colors: this.optional(doc.colors, `${path}.colors`, ["vertexArray"]),
          texCoords: (doc.texCoords ?? []).map((entry, index) => this.scaledArray(entry, `${path}.texCoords[${index}]`)),
        };
      case "triangleStripArray":
        return { ...this.object3DFields(doc, path), kind: "triangleStripArray", primitives: doc.primitives };
      case "animationController":
        return {
          ...this.object3DFields(doc, path),
          kind: "animationController",
          speed: doc.speed,
          weight: doc.weight,
          activeInterval: doc.activeInterval,
          referenceSequenceTime: doc.referenceSequenceTime,
          referenceWorldTime: doc.referenceWorldTime,
        };
      case "animationTrack":
        return {
          ...this.object3DFields(doc, path),
          kind: "animationTrack",
          keyframeSequence: this.resolve(doc.keyframeSequence, `${path}.keyframeSequence`, ["keyframeSequence"]),
          controller: this.optional(doc.controller, `${path}.controller`, ["animationController"]),
          property: doc.property,
        };
      case "keyframeSequence":
        return {
          ...this.object3DFields(doc, path),
          kind: "keyframeSequence",
          interpolation: doc.interpolation,
          repeatMode: doc.repeatMode,
          duration: doc.duration,
          validRange: doc.validRange,
          componentCount: doc.componentCount,
          keyframes: doc.keyframes,
        };
    }
  }

  private object3DFields(doc: Exclude<SceneObjectDoc, DocOfKind<"externalReference">>, path: string): Object3DFields {
    return {
      name: doc.name,
      userId: doc.userId,
      animationTracks: this.list(doc.animationTracks, `${path}.animationTracks`, ["animationTrack"]),
      userParameters: doc.userParameters?.map((parameter): UserParameter => ({
        id: parameter.id,
        value: typeof parameter.value === "string" ? parameter.value : Uint8Array.from(parameter.value),
      })),
    };
  }

  private transformableFields(doc: DocOfKind<SceneNode["kind"] | "texture2D">, path: string): TransformableFields {
    return { ...this.object3DFields(doc, path), transform: doc.transform };
  }

  private nodeFields(doc: DocOfKind<SceneNode["kind"]>, path: string): NodeFields {
    const alignment = doc.alignment;
    return {
      ...this.transformableFields(doc, path),
      renderingEnabled: doc.renderingEnabled,
      pickingEnabled: doc.pickingEnabled,
      alphaFactor: doc.alphaFactor,
      scope: doc.scope,
      alignment: alignment && {
        zTarget: alignment.zTarget,
        yTarget: alignment.yTarget,
        zReference: this.optional(alignment.zReference, `${path}.alignment.zReference`, NODE_REFERENCE_KINDS),
        yReference: this.optional(alignment.yReference, `${path}.alignment.yReference`, NODE_REFERENCE_KINDS),
      },
    };
  }

  private submeshes(doc: DocOfKind<"mesh" | "skinnedMesh">, path: string) {
    return doc.submeshes.map((submesh, index) => ({
      indexBuffer: this.resolve(submesh.indexBuffer, `${path}.submeshes[${index}].indexBuffer`, ["triangleStripArray"]),
      appearance: this.optional(submesh.appearance, `${path}.submeshes[${index}].appearance`, ["appearance"]),
    }));
  }

  private scaledArray(entry: { array: string; scale?: number; bias?: Vec3 }, path: string) {
    const array = this.resolve(entry.array, `${path}.array`, ["vertexArray"]);
    const quantized = this.quantized.get(array);
    return {
      array,
      scale: entry.scale ?? quantized?.scale,
      bias: entry.bias ?? quantized?.bias,
    };
  }

  private vertexArray(doc: DocOfKind<"vertexArray">, path: string): VertexArray {
    const fields = this.object3DFields(doc, path);
    if ((doc.values === undefined) === (doc.floats === undefined)) {
      throw new SceneDocumentError(path, "exactly one of values and floats must be given");
    }
    if (doc.values !== undefined) {
      return {
        ...fields,
        kind: "vertexArray",
        componentCount: doc.componentCount,
        componentSize: doc.componentSize,
        encoding: doc.encoding,
        values: doc.values,
      };
    }
    const role = this.floatUses.get(doc.id)?.role ?? "scaled";
    const floats = doc.floats ?? [];
    if (role !== "scaled") {
      if (doc.componentSize !== 1) {
        throw new SceneDocumentError(`${path}.componentSize`, `floats used as ${role} need componentSize 1`);
      }
      const componentCount = doc.componentCount;
      if (role === "normals" && componentCount !== 3) {
        throw new SceneDocumentError(`${path}.componentCount`, "floats used as normals need componentCount 3");
      }
      if (componentCount === 2) {
        throw new SceneDocumentError(`${path}.componentCount`, "floats used as colors need componentCount 3 or 4");
      }
      let values: VertexArray;
      try {
        values = role === "normals" ? quantizeNormals(floats) : quantizeColors(floats, componentCount);
      } catch (error) {
        throw new SceneDocumentError(`${path}.floats`, error instanceof Error ? error.message : String(error));
      }
      return { ...values, ...fields, encoding: doc.encoding };
    }

    const componentCount = doc.componentCount;
    if (componentCount === 4) {
      throw new SceneDocumentError(`${path}.floats`, "floats require componentCount 2 or 3");
    }
    let quantized: ReturnType<typeof quantizeVertexArray>;
    try {
      quantized = quantizeVertexArray(floats, componentCount, {
        componentSize: doc.componentSize,
        flipV: doc.flipV,
      });
    } catch (error) {
      throw new SceneDocumentError(`${path}.floats`, error instanceof Error ? error.message : String(error));
    }
    const array: VertexArray = { ...quantized.array, ...fields, encoding: doc.encoding };
    this.quantized.set(array, { scale: quantized.scale, bias: quantized.bias });
    return array;
  }
}
