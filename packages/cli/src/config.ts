import { resolve } from "node:path";
import type { CompressionLevel, VersionRequest } from "@m3gkit/encoder";
import type { UpAxis } from "@m3gkit/scene";

export interface ExportCliConfig {
  inputPath?: string;
  /** Defaults to the input path with a .m3g extension. */
  outputPath?: string;
  version: VersionRequest;
  /** Overrides the document's own upAxis when set. */
  upAxis?: UpAxis;
  compress: boolean;
  compressionLevel: CompressionLevel;
  maxObjectsPerSection?: number;
  authoring: string;
}

export interface ParsedCliConfig {
  config: ExportCliConfig;
  error?: string;
}

export const DEFAULT_EXPORT_CONFIG: ExportCliConfig = {
  version: "auto",
  compress: false,
  compressionLevel: 6,
  authoring: "",
};

function isVersionRequest(value: string): value is VersionRequest {
  return value === "auto" || value === "1.0" || value === "1.1";
}

function isUpAxis(value: string): value is UpAxis {
  return value === "y" || value === "z";
}

function isCompressionLevel(value: number): value is CompressionLevel {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

export function defaultOutputPath(inputPath: string): string {
  return inputPath.replace(/\.json$/i, "") + ".m3g";
}

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: ExportCliConfig = {
    ...DEFAULT_EXPORT_CONFIG,
  };

  if (env.M3GKIT_VERSION) {
    if (!isVersionRequest(env.M3GKIT_VERSION)) {
      return { config, error: `Invalid M3GKIT_VERSION value "${env.M3GKIT_VERSION}".` };
    }
    config.version = env.M3GKIT_VERSION;
  }
  if (env.M3GKIT_UP_AXIS) {
    if (!isUpAxis(env.M3GKIT_UP_AXIS)) {
      return { config, error: `Invalid M3GKIT_UP_AXIS value "${env.M3GKIT_UP_AXIS}".` };
    }
    config.upAxis = env.M3GKIT_UP_AXIS;
  }
  if (env.M3GKIT_COMPRESS === "1") config.compress = true;
  if (env.M3GKIT_AUTHORING) config.authoring = env.M3GKIT_AUTHORING;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (arg === "--") {
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return {
        config,
        error: "help",
      };
    }
    if (arg === "--compress") {
      config.compress = true;
      continue;
    }
    if (arg === "--out") {
      const value = argv[index + 1];
      if (!value) {
        return {
          config,
          error: "--out requires a value.",
        };
      }
      config.outputPath = resolve(value);
      index += 1;
      continue;
    }
    if (arg === "--version") {
      const value = argv[index + 1] ?? "";
      if (!isVersionRequest(value)) {
        return {
          config,
          error: `Invalid --version value "${value}".`,
        };
      }
      config.version = value;
      index += 1;
      continue;
    }
    if (arg === "--up-axis") {
      const value = argv[index + 1] ?? "";
      if (!isUpAxis(value)) {
        return {
          config,
          error: `Invalid --up-axis value "${value}".`,
        };
      }
      config.upAxis = value;
      index += 1;
      continue;
    }
    if (arg === "--compression-level") {
      const value = argv[index + 1];
      const parsed = Number(value);
      if (!value || !isCompressionLevel(parsed)) {
        return {
          config,
          error: `Invalid --compression-level value "${value ?? ""}".`,
        };
      }
      config.compressionLevel = parsed;
      index += 1;
      continue;
    }
    if (arg === "--max-objects-per-section") {
      const value = argv[index + 1];
      const parsed = Number(value);
      if (!value || !Number.isInteger(parsed) || parsed <= 0) {
        return {
          config,
          error: `Invalid --max-objects-per-section value "${value ?? ""}".`,
        };
      }
      config.maxObjectsPerSection = parsed;
      index += 1;
      continue;
    }
    if (arg === "--authoring") {
      const value = argv[index + 1];
      if (value === undefined) {
        return {
          config,
          error: "--authoring requires a value.",
        };
      }
      config.authoring = value;
      index += 1;
      continue;
    }
    if (arg.startsWith("-")) {
      return {
        config,
        error: `Unknown flag "${arg}".`,
      };
    }
    if (config.inputPath !== undefined) {
      return {
        config,
        error: `Unexpected argument "${arg}".`,
      };
    }
    config.inputPath = resolve(arg);
  }

  return { config };
}

export function renderHelpText() {
  return [
    "m3g-export",
    "",
    "Usage:",
    "  m3g-export scene.json",
    "  m3g-export scene.json --out scene.m3g --compress",
    "",
    "Flags:",
    "  --out <path>                    Output file (default: input name with .m3g).",
    "  --version auto|1.0|1.1          File format version (default: auto).",
    "  --up-axis y|z                   Up axis of the scene (default: from the document).",
    "  --compress                      Store content sections zlib-compressed.",
    "  --compression-level <0-9>       zlib level (default: 6).",
    "  --max-objects-per-section <n>   Split content into sections of at most n objects.",
    "  --authoring <text>              Header authoring field.",
    "  -h, --help                      Show help.",
    "",
    "Environment:",
    "  M3GKIT_VERSION, M3GKIT_UP_AXIS, M3GKIT_COMPRESS=1, M3GKIT_AUTHORING",
  ].join("\n");
}
