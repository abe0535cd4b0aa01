/**
 * Test fixtures: NBT tags, region files and whole save folders built in memory.
 */
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { deflateSync, gzipSync } from "node:zlib";
import { writeUncompressed, type NBT, type TagType, type Tags } from "prismarine-nbt";

type Tag = Tags[TagType];

// ── NBT tags ─────────────────────────────────────────────

export const byte = (value: number): Tags["byte"] => ({ type: "byte", value });
export const int = (value: number): Tags["int"] => ({ type: "int", value });
export const str = (value: string): Tags["string"] => ({ type: "string", value });
export const comp = (value: Record<string, Tag>): Tags["compound"] => ({ type: "compound", value });

export const compList = (items: Tags["compound"][]): Tags["list"] => ({
  type: "list",
  value: { type: "compound", value: items.map(c => c.value) },
});
export const strList = (items: string[]): Tags["list"] => ({
  type: "list",
  value: { type: "string", value: items },
});
export const doubleList = (items: number[]): Tags["list"] => ({
  type: "list",
  value: { type: "double", value: items },
});

export function encodeNbt(value: Record<string, Tag>): Buffer {
  const root: NBT = { type: "compound", name: "", value };
  return writeUncompressed(root, "big");
}

// ── Game objects ─────────────────────────────────────────

export function signEntity(id: string, [x, y, z]: [number, number, number], lines: string[]): Tags["compound"] {
  return comp({
    id: str(id),
    x: int(x),
    y: int(y),
    z: int(z),
    Text1: str(lines[0]),
    Text2: str(lines[1]),
    Text3: str(lines[2]),
    Text4: str(lines[3]),
  });
}

export interface BookFields {
  pages?: string[];
  title?: string;
  author?: string;
}

export function bookItem(id: string, book?: BookFields, slot = 0): Tags["compound"] {
  const fields: Record<string, Tag> = { id: str(id), Count: byte(1), Slot: byte(slot) };
  if (book) {
    const tag: Record<string, Tag> = {};
    if (book.pages) tag.pages = strList(book.pages);
    if (book.title !== undefined) tag.title = str(book.title);
    if (book.author !== undefined) tag.author = str(book.author);
    fields.tag = comp(tag);
  }
  return comp(fields);
}

export function container(id: string, [x, y, z]: [number, number, number], items: Tags["compound"][]): Tags["compound"] {
  return comp({ id: str(id), x: int(x), y: int(y), z: int(z), Items: compList(items) });
}

export function itemEntity(pos: [number, number, number], item: Tags["compound"]): Tags["compound"] {
  return comp({ id: str("minecraft:item"), Pos: doubleList(pos), Item: item });
}

// ── Chunk layouts ────────────────────────────────────────

export function legacyChunk(tileEntities: Tags["compound"][], entities: Tags["compound"][] = []): Buffer {
  return encodeNbt({ Level: comp({ TileEntities: compList(tileEntities), Entities: compList(entities) }) });
}

export function chunk1_17(tileEntities: Tags["compound"][]): Buffer {
  return encodeNbt({ Level: comp({ TileEntities: compList(tileEntities) }) });
}

export function chunk1_18(blockEntities: Tags["compound"][]): Buffer {
  return encodeNbt({ DataVersion: int(2975), block_entities: compList(blockEntities) });
}

// ── Region files ─────────────────────────────────────────

export interface ChunkSlot {
  x: number;
  z: number;
  /** Uncompressed NBT; zlib-compressed unless `raw` is given */
  nbt?: Buffer;
  /** Payload written as-is after the compression byte */
  raw?: Buffer;
  compression?: number;
}

const SECTOR = 4096;

export function buildRegion(slots: ChunkSlot[]): Buffer {
  const header = Buffer.alloc(2 * SECTOR);
  const bodies: Buffer[] = [];
  let sector = 2;

  for (const slot of slots) {
    const payload = slot.raw ?? deflateSync(slot.nbt ?? Buffer.alloc(0));
    const record = Buffer.alloc(5 + payload.length);
    record.writeUInt32BE(payload.length + 1, 0);
    record[4] = slot.compression ?? 2;
    payload.copy(record, 5);

    const sectors = Math.ceil(record.length / SECTOR);
    const padded = Buffer.alloc(sectors * SECTOR);
    record.copy(padded);
    bodies.push(padded);

    const entry = 4 * (slot.x + 32 * slot.z);
    header.writeUIntBE(sector, entry, 3);
    header[entry + 3] = sectors;
    sector += sectors;
  }

  return Buffer.concat([header, ...bodies]);
}

// ── Save folders ─────────────────────────────────────────

export function levelDat(version: { id: number; name: string; snapshot?: boolean } | { oldVersion: number } | null): Buffer {
  const data: Record<string, Tag> = { LevelName: str("Test World") };
  if (version && "oldVersion" in version) {
    data.version = int(version.oldVersion);
  } else if (version) {
    data.version = int(19133);
    data.Version = comp({ Id: int(version.id), Name: str(version.name), Snapshot: byte(version.snapshot ? 1 : 0) });
  }
  return gzipSync(encodeNbt({ Data: comp(data) }));
}

export async function writeSave(
  dir: string,
  level: Buffer | null,
  regions: Record<string, Buffer> = {},
): Promise<string> {
  await mkdir(path.join(dir, "region"), { recursive: true });
  if (level) await writeFile(path.join(dir, "level.dat"), level);
  for (const [name, buf] of Object.entries(regions)) {
    await writeFile(path.join(dir, "region", name), buf);
  }
  return dir;
}
