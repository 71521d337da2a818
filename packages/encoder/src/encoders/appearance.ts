import type { Appearance, CompositingMode, Material, PolygonMode } from "@m3gkit/scene";
import { COMPOSITING_BLENDING, CULLING, SHADING, WINDING } from "../constants.js";
import { writeObject3D } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

export function writeAppearance(w: ObjectWriter, appearance: Appearance): void {
  writeObject3D(w, appearance);
  w.int8("layer", appearance.layer ?? 0);
  w.ref("compositingMode", appearance.compositingMode);
  w.ref("fog", appearance.fog);
  w.ref("polygonMode", appearance.polygonMode);
  w.ref("material", appearance.material);
  const textures = appearance.textures ?? [];
  w.uint32("textures.length", textures.length);
  textures.forEach((texture, i) => w.ref(`textures[${i}]`, texture));
}

export function writeMaterial(w: ObjectWriter, material: Material): void {
  writeObject3D(w, material);
  w.colorRGB("ambientColor", material.ambientColor ?? 0x333333);
  w.colorRGBA("diffuseColor", material.diffuseColor ?? 0xffcccccc);
  w.colorRGB("emissiveColor", material.emissiveColor ?? 0x000000);
  w.colorRGB("specularColor", material.specularColor ?? 0x000000);
  const shininess = material.shininess ?? 0;
  if (shininess < 0 || shininess > 128) {
    throw w.invalid(`shininess ${shininess} is outside 0..128`, "shininess");
  }
  w.float32("shininess", shininess);
  w.boolean("vertexColorTrackingEnabled", material.vertexColorTrackingEnabled ?? false);
}

export function writePolygonMode(w: ObjectWriter, mode: PolygonMode): void {
  writeObject3D(w, mode);
  w.byte("culling", CULLING[mode.culling ?? "back"]);
  w.byte("shading", SHADING[mode.shading ?? "smooth"]);
  w.byte("winding", WINDING[mode.winding ?? "ccw"]);
  w.boolean("twoSidedLightingEnabled", mode.twoSidedLightingEnabled ?? false);
  w.boolean("localCameraLightingEnabled", mode.localCameraLightingEnabled ?? false);
  w.boolean("perspectiveCorrectionEnabled", mode.perspectiveCorrectionEnabled ?? false);
}

export function writeCompositingMode(w: ObjectWriter, mode: CompositingMode): void {
  writeObject3D(w, mode);
  w.boolean("depthTestEnabled", mode.depthTestEnabled ?? true);
  w.boolean("depthWriteEnabled", mode.depthWriteEnabled ?? true);
  w.boolean("colorWriteEnabled", mode.colorWriteEnabled ?? true);
  w.boolean("alphaWriteEnabled", mode.alphaWriteEnabled ?? true);
  w.byte("blending", COMPOSITING_BLENDING[mode.blending ?? "replace"]);
  w.byte("alphaThreshold", Math.round((mode.alphaThreshold ?? 0) * 255));
  w.float32("depthOffset.factor", mode.depthOffset?.factor ?? 0);
  w.float32("depthOffset.units", mode.depthOffset?.units ?? 0);
}
