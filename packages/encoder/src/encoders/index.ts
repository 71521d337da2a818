import type { SceneObject } from "@m3gkit/scene";
import { OBJECT_TYPE_TAGS } from "../constants.js";
import { writeAnimationController, writeAnimationTrack, writeKeyframeSequence } from "./animation.js";
import { writeAppearance, writeCompositingMode, writeMaterial, writePolygonMode } from "./appearance.js";
import { writeBackground, writeFog } from "./environment.js";
import { writeTriangleStripArray, writeVertexArray, writeVertexBuffer } from "./geometry.js";
import { writeExternalReference, writeImage2D, writeTexture2D } from "./images.js";
import { writeCamera, writeGroup, writeLight, writeMesh, writeSkinnedMesh, writeWorld } from "./nodes.js";
import { ObjectWriter, type EncodeContext } from "./objectWriter.js";

export interface EncodedObject {
  typeTag: number;
  data: Uint8Array;
  /** Table indices written into `data`, in field order. */
  references: number[];
}

/** Encode one object into its block data. Pure apart from the errors it raises. */
export function encodeObject(object: SceneObject, encode: EncodeContext): EncodedObject {
  const w = new ObjectWriter(encode, encode.table.contextOf(object));
  switch (object.kind) {
    case "world":
      writeWorld(w, object);
      break;
    case "group":
      writeGroup(w, object);
      break;
    case "mesh":
      writeMesh(w, object);
      break;
    case "skinnedMesh":
      writeSkinnedMesh(w, object);
      break;
    case "camera":
      writeCamera(w, object);
      break;
    case "light":
      writeLight(w, object);
      break;
    case "background":
      writeBackground(w, object);
      break;
    case "fog":
      writeFog(w, object);
      break;
    case "appearance":
      writeAppearance(w, object);
      break;
    case "material":
      writeMaterial(w, object);
      break;
    case "polygonMode":
      writePolygonMode(w, object);
      break;
    case "compositingMode":
      writeCompositingMode(w, object);
      break;
    case "texture2D":
      writeTexture2D(w, object);
      break;
    case "image2D":
      writeImage2D(w, object);
      break;
    case "externalReference":
      writeExternalReference(w, object);
      break;
    case "vertexArray":
      writeVertexArray(w, object);
      break;
    case "vertexBuffer":
      writeVertexBuffer(w, object);
      break;
    case "triangleStripArray":
      writeTriangleStripArray(w, object);
      break;
    case "animationController":
      writeAnimationController(w, object);
      break;
    case "animationTrack":
      writeAnimationTrack(w, object);
      break;
    case "keyframeSequence":
      writeKeyframeSequence(w, object);
      break;
  }
  return { typeTag: OBJECT_TYPE_TAGS[object.kind], data: w.toUint8Array(), references: w.references };
}

export type { EncodeContext } from "./objectWriter.js";
