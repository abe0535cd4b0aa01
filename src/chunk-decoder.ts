/**
 * Chunk decoder — picks the chunk layout for a world version and turns raw
 * NBT bytes into a ChunkView. Also decodes level.dat into a WorldVersion.
 */
import { gunzipSync } from "node:zlib";
import { parseUncompressed, simplify } from "prismarine-nbt";
import { SaveError, errorMessage } from "./errors.js";
import { CHUNK_SCHEMAS, LevelDat } from "./nbt-schemas.js";
import type { ChunkFormat, ChunkView, WorldVersion } from "./types.js";

/** Last data version whose chunks keep entities under Level (1.16.5) */
export const LAST_LEGACY_DATA_VERSION = 2681;
/** Last data version with the Level wrapper (1.17.1) */
export const LAST_1_17_DATA_VERSION = 2730;

export const LEGACY_VERSION_NAME = "old";

/**
 * Pre-1.9 saves have no Version compound and report the Anvil format number
 * (19133) instead, so the name check must come before any id comparison.
 */
export function selectChunkFormat(version: WorldVersion): ChunkFormat {
  if (version.name === LEGACY_VERSION_NAME || version.id <= LAST_LEGACY_DATA_VERSION) return "legacy";
  if (version.id <= LAST_1_17_DATA_VERSION) return "1.17";
  return "1.18";
}

export function isLegacyWorld(version: WorldVersion): boolean {
  return version.name === LEGACY_VERSION_NAME;
}

/** Big-endian uncompressed NBT → plain JS object */
export function decodeNbt(bytes: Buffer): unknown {
  return simplify(parseUncompressed(bytes, "big"));
}

/** Throws on malformed NBT or a layout that does not match the format */
export function decodeChunk(bytes: Buffer, format: ChunkFormat): ChunkView {
  return CHUNK_SCHEMAS[format].parse(decodeNbt(bytes));
}

/** Gzipped level.dat → effective world version */
export function decodeLevelDat(gzipped: Buffer): WorldVersion {
  let raw: unknown;
  try {
    raw = decodeNbt(gunzipSync(gzipped));
  } catch (e) {
    throw new SaveError(`failed to read level.dat: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = LevelDat.safeParse(raw);
  if (!parsed.success) {
    throw new SaveError(`failed to read level.dat: ${errorMessage(parsed.error)}`, { cause: parsed.error });
  }

  const { Version, version } = parsed.data.Data;
  if (Version) return { id: Version.Id, name: Version.Name, snapshot: Version.Snapshot };
  if (version !== undefined) return { id: version, name: LEGACY_VERSION_NAME, snapshot: false };
  throw new SaveError("unknown world version: level.dat has neither Data.Version nor Data.version");
}
