export { DEFAULT_EXPORT_CONFIG, defaultOutputPath, parseCliConfig, renderHelpText, type ExportCliConfig, type ParsedCliConfig } from "./config.js";
export { defaultIo, renderSummary, runExportCli, writeFileAtomic, type CliIo } from "./exportCli.js";
export { sha256HexFromBytes } from "./hash.js";
