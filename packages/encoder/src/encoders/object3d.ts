import type { Object3D, SceneNode, TransformableObject } from "@m3gkit/scene";
import { ALIGNMENT_TARGET, ANIMATION_PROPERTIES } from "../constants.js";
import type { ObjectWriter } from "./objectWriter.js";

const utf8 = new TextEncoder();

export function writeObject3D(w: ObjectWriter, object: Object3D): void {
  w.uint32("userId", object.userId ?? 0);

  const tracks = object.animationTracks ?? [];
  w.uint32("animationTracks.length", tracks.length);
  tracks.forEach((track, i) => {
    const field = `animationTracks[${i}]`;
    const info = ANIMATION_PROPERTIES[track.property];
    if (!info.targets.includes(object.kind)) {
      throw w.invalid(`property ${track.property} cannot animate a ${object.kind}`, field);
    }
    if (!info.components.includes(track.keyframeSequence.componentCount)) {
      throw w.invalid(
        `property ${track.property} takes ${info.components.join(" or ")} components, ` +
          `sequence has ${track.keyframeSequence.componentCount}`,
        field,
      );
    }
    w.ref(field, track);
  });

  const parameters = object.userParameters ?? [];
  const seen = new Set<number>();
  w.uint32("userParameters.length", parameters.length);
  parameters.forEach((parameter, i) => {
    if (seen.has(parameter.id)) {
      throw w.invalid(`duplicate user parameter id ${parameter.id}`, `userParameters[${i}].id`);
    }
    seen.add(parameter.id);
    w.uint32(`userParameters[${i}].id`, parameter.id);
    const value = typeof parameter.value === "string" ? utf8.encode(parameter.value) : parameter.value;
    w.byteArray(`userParameters[${i}].value`, value);
  });
}

export function writeTransformable(w: ObjectWriter, object: TransformableObject): void {
  writeObject3D(w, object);
  const transform = w.encode.transforms.transforms.get(object);
  if (transform === undefined) {
    throw new Error(`no resolved transform for ${object.kind}`);
  }
  const { component, general } = transform;
  w.boolean("hasComponentTransform", component !== undefined);
  if (component) {
    w.vector3("transform.translation", component.translation);
    w.vector3("transform.scale", component.scale);
    w.float32("transform.orientationAngle", component.angle);
    w.vector3("transform.orientationAxis", component.axis);
  }
  w.boolean("hasGeneralTransform", general !== undefined);
  if (general) {
    w.matrix("transform.matrix", general);
  }
}

export function writeNode(w: ObjectWriter, node: SceneNode): void {
  writeTransformable(w, node);
  w.boolean("renderingEnabled", node.renderingEnabled ?? true);
  w.boolean("pickingEnabled", node.pickingEnabled ?? true);
  w.byte("alphaFactor", Math.round((node.alphaFactor ?? 1) * 255));
  w.uint32("scope", node.scope ?? 0xffffffff);

  const alignment = node.alignment;
  w.boolean("hasAlignment", alignment !== undefined);
  if (alignment) {
    w.byte("alignment.zTarget", ALIGNMENT_TARGET[alignment.zTarget]);
    w.byte("alignment.yTarget", ALIGNMENT_TARGET[alignment.yTarget]);
    w.ref("alignment.zReference", alignment.zReference);
    w.ref("alignment.yReference", alignment.yReference);
  }
}
