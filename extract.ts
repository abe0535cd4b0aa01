#!/usr/bin/env node
/**
 * Minecraft save text extractor CLI
 *
 * Reads a Java Edition save folder and writes every sign and
 * writable/written book it can recover to two text reports.
 *
 * Usage:
 *   npx tsx extract.ts --save /path/to/saves/MyWorld [--out ./reports]
 *
 * Environment variables (or .env file):
 *   SAVE_PATH (alternative to --save)
 *   OUTPUT_DIR (alternative to --out, default: current directory)
 *   SCAN_CONCURRENCY (default: number of CPU cores)
 *   LOG_LEVEL (debug|info|warn|error, default: info)
 */
import "dotenv/config";
import path from "node:path";
import { SaveError } from "./src/errors.js";
import { writeReports } from "./src/report-writer.js";
import { scanSave, type ScanResult } from "./src/save-scanner.js";
import { SCAN_CONFIG } from "./src/utils/config.js";
import logger from "./src/utils/logger.js";

// ── Parse CLI args ──────────────────────────────────────────
function parseArgs(): { savePath: string; outDir: string } {
  const args = process.argv.slice(2);
  let savePath = SCAN_CONFIG.savePath;
  let outDir = SCAN_CONFIG.outputDir;

  for (let i = 0; i < args.length; i++) {
    if ((args[i] === "--save" || args[i] === "-s") && args[i + 1]) {
      savePath = args[++i];
    } else if ((args[i] === "--out" || args[i] === "-o") && args[i + 1]) {
      outDir = args[++i];
    } else if (args[i] === "--help" || args[i] === "-h") {
      console.log(`
Minecraft save text extractor — signs & books → text reports

Usage:
  npx tsx extract.ts --save /path/to/save

Options:
  --save, -s <path>   Minecraft save folder (the one holding level.dat)
  --out, -o <dir>     Where to write signs-<save>.txt and books-<save>.txt
  --help, -h          Show this help

Environment:
  SAVE_PATH           Alternative to --save
  OUTPUT_DIR          Alternative to --out (default: .)
  SCAN_CONCURRENCY    Region files scanned at once (default: CPU cores)
  LOG_LEVEL           debug | info | warn | error (default: info)
`);
      process.exit(0);
    }
  }

  if (!savePath) {
    console.log("Error: save folder required. Use --save <path> or set SAVE_PATH env var.");
    process.exit(1);
  }

  return { savePath, outDir };
}

// ── Main ────────────────────────────────────────────────────
async function main() {
  const { savePath, outDir } = parseArgs();
  const saveName = path.basename(path.resolve(savePath));
  const startTime = Date.now();

  let result: ScanResult;
  try {
    result = await scanSave(savePath, { onProgress: (msg) => logger.info(msg) });
  } catch (e) {
    if (e instanceof SaveError) {
      console.log(e.message);
      process.exit(1);
    }
    throw e;
  }

  const { signsPath, booksPath } = await writeReports(result, saveName, outDir);

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  const { stats } = result;
  logger.info(`Scanned ${stats.regionFiles} region files, ${stats.chunks} chunks in ${duration}s`);
  logger.info(`   Signs: ${result.signs.length} → ${signsPath}`);
  logger.info(`   Books: ${result.books.length} → ${booksPath}`);
  if (stats.skippedChunks || stats.failedRegionFiles) {
    logger.warn(`   Skipped: ${stats.skippedChunks} chunks, ${stats.failedRegionFiles} region files`);
  }
  logger.info("done!");
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
