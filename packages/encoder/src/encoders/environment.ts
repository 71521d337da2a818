import type { Background, Fog } from "@m3gkit/scene";
import { FOG_MODE, IMAGE_MODE } from "../constants.js";
import { UnsupportedInVersionError } from "../errors.js";
import { writeObject3D } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

export function writeBackground(w: ObjectWriter, background: Background): void {
  writeObject3D(w, background);
  w.colorRGBA("color", background.color ?? 0x00000000);
  w.ref("image", background.image);
  w.byte("imageModeX", IMAGE_MODE[background.imageModeX ?? "border"]);
  w.byte("imageModeY", IMAGE_MODE[background.imageModeY ?? "border"]);
  const image = background.image;
  const crop = background.crop ?? {
    x: 0,
    y: 0,
    width: image?.kind === "image2D" ? image.width : 0,
    height: image?.kind === "image2D" ? image.height : 0,
  };
  w.int32("crop.x", crop.x);
  w.int32("crop.y", crop.y);
  w.int32("crop.width", crop.width);
  w.int32("crop.height", crop.height);
  w.boolean("depthClearEnabled", background.depthClearEnabled ?? true);
  w.boolean("colorClearEnabled", background.colorClearEnabled ?? true);
}

export function writeFog(w: ObjectWriter, fog: Fog): void {
  if (w.encode.version === "1.0") {
    throw new UnsupportedInVersionError("fog cannot be written in version 1.0", w.context);
  }
  writeObject3D(w, fog);
  w.colorRGB("color", fog.color ?? 0x000000);
  const { mode } = fog;
  w.byte("mode", FOG_MODE[mode.type]);
  if (mode.type === "exponential") {
    w.float32("density", mode.density);
  } else {
    w.float32("near", mode.near);
    w.float32("far", mode.far);
  }
}
