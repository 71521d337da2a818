import type { ExternalReference, Image2D, Texture2D } from "@m3gkit/scene";
import { IMAGE_FILTER, IMAGE_FORMAT, IMAGE_FORMAT_BYTES, LEVEL_FILTER, TEXTURE_BLENDING, WRAP } from "../constants.js";
import { writeObject3D, writeTransformable } from "./object3d.js";
import type { ObjectWriter } from "./objectWriter.js";

function isPowerOfTwo(value: number): boolean {
  return value > 0 && (value & (value - 1)) === 0;
}

export function writeImage2D(w: ObjectWriter, image: Image2D): void {
  writeObject3D(w, image);
  const mutable = image.mutable ?? false;
  w.byte("format", IMAGE_FORMAT[image.format]);
  w.boolean("isMutable", mutable);
  w.uint32("width", image.width);
  w.uint32("height", image.height);
  if (mutable) return;

  const bytesPerPixel = IMAGE_FORMAT_BYTES[image.format];
  const pixelCount = image.width * image.height;
  const palette = image.palette ?? [];
  const pixels = image.pixels ?? [];
  if (palette.length > 0) {
    if (palette.length % bytesPerPixel !== 0 || palette.length / bytesPerPixel > 256) {
      throw w.invalid(
        `palette of ${palette.length} bytes is not up to 256 ${image.format} entries`,
        "palette",
      );
    }
    if (pixels.length !== pixelCount) {
      throw w.invalid(`expected ${pixelCount} palette indices, got ${pixels.length}`, "pixels");
    }
  } else if (pixels.length !== pixelCount * bytesPerPixel) {
    throw w.invalid(
      `expected ${pixelCount * bytesPerPixel} bytes of ${image.format} pixels, got ${pixels.length}`,
      "pixels",
    );
  }
  w.byteArray("palette", palette);
  w.byteArray("pixels", pixels);
}

export function writeTexture2D(w: ObjectWriter, texture: Texture2D): void {
  const { image } = texture;
  if (image.kind === "image2D" && (!isPowerOfTwo(image.width) || !isPowerOfTwo(image.height))) {
    throw w.invalid(`texture image ${image.width}x${image.height} is not a power of two`, "image");
  }
  writeTransformable(w, texture);
  w.ref("image", image);
  w.colorRGB("blendColor", texture.blendColor ?? 0x000000);
  w.byte("blending", TEXTURE_BLENDING[texture.blending ?? "modulate"]);
  w.byte("wrapS", WRAP[texture.wrapS ?? "repeat"]);
  w.byte("wrapT", WRAP[texture.wrapT ?? "repeat"]);
  w.byte("levelFilter", LEVEL_FILTER[texture.levelFilter ?? "base"]);
  w.byte("imageFilter", IMAGE_FILTER[texture.imageFilter ?? "nearest"]);
}

export function writeExternalReference(w: ObjectWriter, reference: ExternalReference): void {
  if (reference.uri.length === 0) {
    throw w.invalid("external reference has an empty URI", "uri");
  }
  w.string("uri", reference.uri);
}
