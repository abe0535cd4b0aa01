/**
 * SaveScanner — drives a full scan of one save folder
 *
 *   level.dat → world version → chunk format
 *   region/r.X.Z.mca → one work unit per file (bounded concurrency)
 *   → merge → stable sort by (x, z, y)
 *
 * Only a missing save root or unreadable level.dat is fatal (SaveError).
 * Chunk and region failures are logged and counted, and the scan continues.
 */
import { stat, readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { decodeChunk, decodeLevelDat, selectChunkFormat } from "./chunk-decoder.js";
import { extractFromChunk } from "./chunk-extractor.js";
import { SaveError, errorMessage } from "./errors.js";
import { formatRegion, parseRegionFileName, readRegionChunks, type RegionCoords } from "./region-reader.js";
import type { BookWithPos, ChunkExtract, Position, SignRecord, WorldVersion } from "./types.js";
import { SCAN_CONFIG } from "./utils/config.js";
import logger from "./utils/logger.js";
import { mapWithConcurrency } from "./utils/pool.js";

export interface ScanStats {
  regionFiles: number;
  failedRegionFiles: number;
  chunks: number;
  skippedChunks: number;
}

export interface RegionScanResult extends ChunkExtract {
  stats: ScanStats;
}

export interface ScanResult extends ChunkExtract {
  version: WorldVersion;
  stats: ScanStats;
}

export interface ScanOptions {
  /** Region files scanned at once (default: SCAN_CONCURRENCY or CPU count) */
  concurrency?: number;
  onProgress?: (msg: string) => void;
}

function emptyStats(): ScanStats {
  return { regionFiles: 0, failedRegionFiles: 0, chunks: 0, skippedChunks: 0 };
}

/** Stable ascending sort on (x, z, y); returns a new array */
export function sortByPosition<T extends Position>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => a.x - b.x || a.z - b.z || a.y - b.y);
}

async function isDirectory(p: string): Promise<boolean | null> {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return null;
  }
}

/** Validates the save folder and reads its world version from level.dat */
export async function readWorldVersion(savePath: string): Promise<WorldVersion> {
  const dir = await isDirectory(savePath);
  if (dir === null) throw new SaveError("save folder does not exist");
  if (!dir) throw new SaveError("save folder is not a directory");

  let levelDat: Buffer;
  try {
    levelDat = await readFile(path.join(savePath, "level.dat"));
  } catch (e) {
    throw new SaveError("save version does not exist", { cause: e });
  }
  return decodeLevelDat(levelDat);
}

/** One work unit: every sign and book in a single region file, unsorted */
export async function scanRegionFile(
  filePath: string,
  region: RegionCoords,
  version: WorldVersion,
): Promise<RegionScanResult> {
  const result: RegionScanResult = { signs: [], books: [], stats: emptyStats() };
  const format = selectChunkFormat(version);
  const where = formatRegion(region);
  logger.debug(`reading region ${where}`, { module: "scanner" });

  const buf = await readFile(filePath);
  const readStats = { chunks: 0, skipped: 0 };
  let undecodable = 0;

  for await (const chunk of readRegionChunks(buf, region, readStats)) {
    try {
      const found = extractFromChunk(decodeChunk(chunk.data, format));
      result.signs.push(...found.signs);
      result.books.push(...found.books);
    } catch (e) {
      undecodable++;
      logger.warn(`failed to read nbt in chunk: ${where} with error ${errorMessage(e)}`, { module: "scanner" });
    }
  }

  result.stats = {
    regionFiles: 1,
    failedRegionFiles: 0,
    chunks: readStats.chunks - undecodable,
    skippedChunks: readStats.skipped + undecodable,
  };
  return result;
}

/** Lists `r.X.Z.mca` files; other names are ignored, a missing folder is empty */
export async function listRegionFiles(savePath: string): Promise<{ filePath: string; region: RegionCoords }[]> {
  const regionDir = path.join(savePath, "region");
  let names: string[];
  try {
    names = await readdir(regionDir);
  } catch (e) {
    logger.warn(`cannot list region folder: ${errorMessage(e)}`, { module: "scanner" });
    return [];
  }

  const files: { filePath: string; region: RegionCoords }[] = [];
  for (const name of names.sort()) {
    const region = parseRegionFileName(name);
    if (region) files.push({ filePath: path.join(regionDir, name), region });
  }
  return files;
}

export async function scanSave(savePath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const { concurrency = SCAN_CONFIG.concurrency, onProgress } = options;

  const version = await readWorldVersion(savePath);
  onProgress?.(`world_version: ${version.name} id: ${version.id}`);

  const files = await listRegionFiles(savePath);
  onProgress?.(`Scanning ${files.length} region files (${concurrency} at a time)…`);

  const units = await mapWithConcurrency(files, concurrency, async ({ filePath, region }): Promise<RegionScanResult> => {
    try {
      return await scanRegionFile(filePath, region, version);
    } catch (e) {
      logger.warn(`failed to scan region file ${path.basename(filePath)}: ${errorMessage(e)}`, { module: "scanner" });
      return { signs: [], books: [], stats: { ...emptyStats(), regionFiles: 1, failedRegionFiles: 1 } };
    }
  });

  const signs: SignRecord[] = [];
  const books: BookWithPos[] = [];
  const stats = emptyStats();
  for (const unit of units) {
    signs.push(...unit.signs);
    books.push(...unit.books);
    stats.regionFiles += unit.stats.regionFiles;
    stats.failedRegionFiles += unit.stats.failedRegionFiles;
    stats.chunks += unit.stats.chunks;
    stats.skippedChunks += unit.stats.skippedChunks;
  }

  return { version, signs: sortByPosition(signs), books: sortByPosition(books), stats };
}
