/**
 * Region Reader — decodes Anvil `.mca` region files
 *
 * ## Layout
 *   0x0000  Location table: 1024 × 4 bytes, big-endian
 *             bytes 0..2  sector offset from file start (× 4096)
 *             byte  3     sector count (0 = chunk absent)
 *           Entry for local chunk (x, z) sits at 4 * (x + 32 * z).
 *   0x1000  Timestamp table: 1024 × 4 bytes (unused here)
 *   0x2000  Chunk sectors
 *
 * ## Chunk record (at offset * 4096)
 *   +0  UInt32BE  length L (compression byte + payload)
 *   +4  UInt8     compression: 1 = gzip, 2 = zlib, 3 = none
 *   +5  L - 1     compressed NBT payload
 *
 * Only zlib chunks are decoded. Any problem skips that one chunk.
 */
import { promisify } from "node:util";
import { inflate } from "node:zlib";
import { errorMessage } from "./errors.js";
import { REGION_FORMAT } from "./utils/config.js";
import logger from "./utils/logger.js";

const inflateAsync = promisify(inflate);

const COMPRESSION_ZLIB = 2;
const CHUNK_HEADER_BYTES = 5;

const REGION_FILE_PATTERN = /^r\.(-?\d+)\.(-?\d+)\.mca$/;

export interface RegionCoords {
  rx: number;
  rz: number;
}

export interface RegionChunk {
  /** Chunk position inside the region, 0..31 */
  x: number;
  z: number;
  /** Decompressed NBT */
  data: Buffer;
}

export interface RegionReadStats {
  chunks: number;
  skipped: number;
}

/** `r.-1.2.mca` → { rx: -1, rz: 2 }; anything else → null */
export function parseRegionFileName(fileName: string): RegionCoords | null {
  const m = REGION_FILE_PATTERN.exec(fileName);
  if (!m) return null;
  return { rx: parseInt(m[1], 10), rz: parseInt(m[2], 10) };
}

export function formatRegion({ rx, rz }: RegionCoords): string {
  return `${rx}, ${rz}`;
}

/**
 * Lazily yields every readable chunk of an in-memory region file.
 * Inflation runs on the libuv threadpool, so several region files decode at once.
 * Pass `stats` to learn how many chunks were decoded and skipped.
 */
export async function* readRegionChunks(
  buf: Buffer,
  region: RegionCoords,
  stats: RegionReadStats = { chunks: 0, skipped: 0 },
): AsyncGenerator<RegionChunk> {
  if (buf.length === 0) return;

  const { sectorBytes, chunksPerSide } = REGION_FORMAT;
  const where = formatRegion(region);
  const skip = (x: number, z: number, reason: string) => {
    stats.skipped++;
    logger.warn(`skipping chunk ${x}, ${z}: ${reason}`, { module: "region", region: where });
  };

  // The location table fills exactly the first sector
  if (buf.length < sectorBytes) {
    logger.warn(`location table is truncated (${buf.length} bytes)`, { module: "region", region: where });
  }

  for (let x = 0; x < chunksPerSide; x++) {
    for (let z = 0; z < chunksPerSide; z++) {
      const entryOff = 4 * (x + chunksPerSide * z);
      if (entryOff + 4 > buf.length) continue;

      const sectorOffset = buf.readUIntBE(entryOff, 3);
      const sectorCount = buf[entryOff + 3];
      if (sectorCount === 0) continue;

      const start = sectorOffset * sectorBytes;
      if (start + CHUNK_HEADER_BYTES > buf.length) {
        skip(x, z, `sector offset ${sectorOffset} is past the end of the file`);
        continue;
      }

      const length = buf.readUInt32BE(start);
      const compression = buf[start + 4];
      if (compression !== COMPRESSION_ZLIB) {
        skip(x, z, `unsupported compression type: ${compression}`);
        continue;
      }

      const payloadEnd = start + 4 + length;
      if (length < 1 || payloadEnd > buf.length) {
        skip(x, z, `chunk length ${length} does not fit in the file`);
        continue;
      }

      let data: Buffer;
      try {
        data = await inflateAsync(buf.subarray(start + CHUNK_HEADER_BYTES, payloadEnd));
      } catch (e) {
        skip(x, z, `failed to inflate: ${errorMessage(e)}`);
        continue;
      }

      stats.chunks++;
      yield { x, z, data };
    }
  }
}
