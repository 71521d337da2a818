#!/usr/bin/env node
import { defaultIo, runExportCli } from "./exportCli.js";

async function main() {
  process.exitCode = await runExportCli(process.argv.slice(2), defaultIo);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`m3g-export failed: ${message}\n`);
  process.exitCode = 1;
});
