import { createHash } from "node:crypto";

export function sha256HexFromBytes(input: Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}
