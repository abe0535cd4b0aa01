/**
 * Centralised configuration. Values come from the environment (or a .env file
 * loaded by the CLI); command-line flags override them.
 */
import { availableParallelism } from "node:os";

function positiveInt(raw: string | undefined): number | undefined {
  const n = parseInt(raw || "", 10);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

export const SCAN_CONFIG = {
  savePath: process.env.SAVE_PATH || "",
  outputDir: process.env.OUTPUT_DIR || ".",
  /** Region files scanned at once; one per CPU core unless overridden */
  concurrency: positiveInt(process.env.SCAN_CONCURRENCY) ?? availableParallelism(),
};

/** Sector size and grid width of the Anvil region format */
export const REGION_FORMAT = {
  sectorBytes: 4096,
  chunksPerSide: 32,
};
