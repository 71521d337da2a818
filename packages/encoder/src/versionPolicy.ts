import type { ObjectTable } from "./objectTable.js";
import { IncompatibleFeatureError } from "./errors.js";

export type FormatVersion = "1.0" | "1.1";
export type VersionRequest = FormatVersion | "auto";

export const VERSION_BYTES: Readonly<Record<FormatVersion, readonly [number, number]>> = {
  "1.0": [1, 0],
  "1.1": [1, 1],
};

/** Scene features that decide the format version. */
export interface SceneFeatures {
  fogCount: number;
}

export function detectFeatures(table: ObjectTable): SceneFeatures {
  return { fogCount: table.objects.filter((object) => object.kind === "fog").length };
}

/**
 * Auto picks the lowest version that can hold every feature. A pinned version that cannot
 * hold the scene fails here, before any bytes are produced.
 */
export function selectVersion(features: SceneFeatures, request: VersionRequest): FormatVersion {
  const required: FormatVersion = features.fogCount > 0 ? "1.1" : "1.0";
  if (request === "auto") return required;
  if (request === "1.0" && required === "1.1") {
    throw new IncompatibleFeatureError(
      `scene uses fog (${features.fogCount} object${features.fogCount === 1 ? "" : "s"}), which needs version 1.1`,
      { kind: "fog" },
    );
  }
  return request;
}
