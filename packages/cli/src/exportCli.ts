import { randomBytes } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join, basename } from "node:path";
import { asEncodeError, encodeScene, type EncodeResult } from "@m3gkit/encoder";
import { SceneDocumentError, parseSceneDocument, type LoadedScene } from "@m3gkit/scene";
import { defaultOutputPath, parseCliConfig, renderHelpText, type ExportCliConfig } from "./config.js";
import { sha256HexFromBytes } from "./hash.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

export const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

const PROGRAM = "m3g-export";

/** Writes through a sibling temp file so a failed export never leaves a partial file. */
export async function writeFileAtomic(path: string, bytes: Uint8Array): Promise<void> {
  const temp = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);
  try {
    await writeFile(temp, bytes);
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

export function renderSummary(outputPath: string, result: EncodeResult): string[] {
  const { report } = result;
  const kinds = Object.entries(report.kinds)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([kind, count]) => `${kind}=${count}`)
    .join(" ");
  return [
    `output: ${outputPath}`,
    `version: ${report.version}`,
    `objects: ${report.objectCount} (${kinds})`,
    `sections: ${report.sections.length}`,
    `bytes: ${report.totalSize}`,
    `sha256: ${sha256HexFromBytes(result.bytes)}`,
  ];
}

function encode(loaded: LoadedScene, config: ExportCliConfig): EncodeResult {
  return encodeScene(loaded.world, {
    version: config.version,
    sourceUpAxis: config.upAxis ?? loaded.upAxis,
    compress: config.compress,
    compressionLevel: config.compressionLevel,
    maxObjectsPerSection: config.maxObjectsPerSection,
    authoring: config.authoring,
  });
}

export async function runExportCli(
  argv: string[],
  io: CliIo = defaultIo,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const parsed = parseCliConfig(argv, env);
  if (parsed.error === "help") {
    io.writeStdout(renderHelpText());
    return 0;
  }
  if (parsed.error) {
    io.writeStderr(`${PROGRAM}: ${parsed.error}`);
    io.writeStderr(renderHelpText());
    return 2;
  }
  const { config } = parsed;
  if (!config.inputPath) {
    io.writeStderr(`${PROGRAM}: a scene document path is required.`);
    io.writeStderr(renderHelpText());
    return 2;
  }
  const outputPath = config.outputPath ?? defaultOutputPath(config.inputPath);

  let json: string;
  try {
    json = await readFile(config.inputPath, "utf8");
  } catch (error) {
    io.writeStderr(`${PROGRAM}: failed to read input file: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  let result: EncodeResult;
  try {
    const loaded = parseSceneDocument(json);
    if (loaded.unusedIds.length > 0) {
      io.writeStderr(`${PROGRAM}: warning: not reachable from the root: ${loaded.unusedIds.join(", ")}`);
    }
    result = encode(loaded, config);
  } catch (error) {
    const reported = error instanceof SceneDocumentError ? error : asEncodeError(error);
    io.writeStderr(`${PROGRAM}: ${reported.code}: ${reported.message}`);
    return 1;
  }

  try {
    await writeFileAtomic(outputPath, result.bytes);
  } catch (error) {
    io.writeStderr(`${PROGRAM}: failed to write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  renderSummary(outputPath, result).forEach((line) => io.writeStdout(line));
  return 0;
}
