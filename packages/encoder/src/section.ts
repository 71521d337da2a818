import { zlibSync } from "fflate";
import { ByteWriter } from "./codec/byteWriter.js";
import { adler32 } from "./adler32.js";
import { COMPRESSION_NONE, COMPRESSION_ZLIB, SECTION_OVERHEAD } from "./constants.js";
import { SectionTooLargeError } from "./errors.js";

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface SectionOptions {
  compress: boolean;
  level?: CompressionLevel;
  /** Upper bound for totalSectionLength; defaults to the UInt32 limit. */
  maxSectionLength?: number;
  /** Section number, for error messages. */
  ordinal?: number;
}

const UINT32_MAX = 0xffffffff;

/**
 * Frame a payload as a section: scheme byte, total and uncompressed lengths, the stored
 * payload, then the Adler-32 of every byte before the checksum.
 */
export function frameSection(payload: Uint8Array, options: SectionOptions): Uint8Array {
  const label = options.ordinal === undefined ? "section" : `section ${options.ordinal}`;
  if (payload.length > UINT32_MAX) {
    throw new SectionTooLargeError(`${label} payload of ${payload.length} bytes exceeds the UInt32 length field`);
  }
  const stored = options.compress ? zlibSync(payload, { level: options.level ?? 6 }) : payload;
  const totalLength = SECTION_OVERHEAD + stored.length;
  const limit = Math.min(options.maxSectionLength ?? UINT32_MAX, UINT32_MAX);
  if (totalLength > limit) {
    throw new SectionTooLargeError(`${label} of ${totalLength} bytes exceeds the limit of ${limit}`);
  }

  const out = new ByteWriter();
  out.writeUint8(options.compress ? COMPRESSION_ZLIB : COMPRESSION_NONE);
  out.writeUint32(totalLength);
  out.writeUint32(payload.length);
  out.writeBytes(stored);
  out.writeUint32(adler32(out.toUint8Array()));
  return out.toUint8Array();
}
