export * from "./errors.js";
export * from "./constants.js";
export { adler32 } from "./adler32.js";
export { BlockWriter } from "./codec/blockWriter.js";
export { ByteWriter } from "./codec/byteWriter.js";
export { chooseIndexLayout, deltaEncode, type IndexLayout } from "./codec/compact.js";
export { ObjectTable } from "./objectTable.js";
export { referencesOf, type ReferenceSlot } from "./references.js";
export {
  composeMatrix,
  composeNodeTransform,
  resolveTransforms,
  upConversionOf,
  type ComponentTransform,
  type ComposeOptions,
  type TargetTransform,
  type TransformPlan,
  type UpConversion,
} from "./transform.js";
export { encodeObject, type EncodeContext, type EncodedObject } from "./encoders/index.js";
export { frameSection, type CompressionLevel, type SectionOptions } from "./section.js";
export {
  detectFeatures,
  selectVersion,
  VERSION_BYTES,
  type FormatVersion,
  type SceneFeatures,
  type VersionRequest,
} from "./versionPolicy.js";
export {
  assemble,
  encodeScene,
  type EncodeOptions,
  type EncodeReport,
  type EncodeResult,
  type SectionReport,
} from "./container.js";
