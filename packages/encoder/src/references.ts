import type { SceneNode, SceneObject } from "@m3gkit/scene";

export interface ReferenceSlot {
  field: string;
  target: SceneObject;
  /** Set when the target is attached below the referencing node in the hierarchy. */
  parent?: SceneNode;
}

/**
 * Outgoing references of an object, in the order their fields appear in the encoded layout.
 */
export function referencesOf(object: SceneObject): ReferenceSlot[] {
  if (object.kind === "externalReference") return [];

  const slots: ReferenceSlot[] = [];
  const add = (field: string, target: SceneObject | undefined, parent?: SceneNode): void => {
    if (target !== undefined) slots.push(parent ? { field, target, parent } : { field, target });
  };

  object.animationTracks?.forEach((track, i) => add(`animationTracks[${i}]`, track));

  switch (object.kind) {
    case "world":
    case "group":
    case "mesh":
    case "skinnedMesh":
    case "camera":
    case "light":
      add("alignment.zReference", object.alignment?.zReference);
      add("alignment.yReference", object.alignment?.yReference);
      break;
    default:
      break;
  }

  switch (object.kind) {
    case "world":
      object.children.forEach((child, i) => add(`children[${i}]`, child, object));
      add("activeCamera", object.activeCamera);
      add("background", object.background);
      break;
    case "group":
      object.children.forEach((child, i) => add(`children[${i}]`, child, object));
      break;
    case "mesh":
    case "skinnedMesh":
      add("vertexBuffer", object.vertexBuffer);
      object.submeshes.forEach((submesh, i) => {
        add(`submeshes[${i}].indexBuffer`, submesh.indexBuffer);
        add(`submeshes[${i}].appearance`, submesh.appearance);
      });
      if (object.kind === "skinnedMesh") {
        add("skeleton", object.skeleton, object);
        object.bones.forEach((bone, i) => add(`bones[${i}].node`, bone.node));
      }
      break;
    case "background":
      add("image", object.image);
      break;
    case "appearance":
      add("compositingMode", object.compositingMode);
      add("fog", object.fog);
      add("polygonMode", object.polygonMode);
      add("material", object.material);
      object.textures?.forEach((texture, i) => add(`textures[${i}]`, texture));
      break;
    case "texture2D":
      add("image", object.image);
      break;
    case "vertexBuffer":
      add("positions", object.positions?.array);
      add("normals", object.normals);
      add("colors", object.colors);
      object.texCoords?.forEach((entry, i) => add(`texCoords[${i}]`, entry.array));
      break;
    case "animationTrack":
      add("keyframeSequence", object.keyframeSequence);
      add("controller", object.controller);
      break;
    default:
      break;
  }
  return slots;
}
