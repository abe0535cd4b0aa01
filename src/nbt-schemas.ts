/**
 * Zod schemas for the NBT layouts this tool reads: level.dat and the three
 * generations of chunk data. Every chunk schema outputs the same ChunkView,
 * so the extractor never needs to know which layout it came from.
 *
 * Input is the plain object produced by prismarine-nbt's `simplify`: bytes,
 * shorts and ints become numbers, lists become arrays, compounds objects.
 */
import { z } from "zod";
import { isSignId } from "./chunk-extractor.js";
import type { BlockEntity, ChunkFormat, ChunkView, Entity, Item, SignLines } from "./types.js";

// Pre-1.8 saves store item ids as shorts
const NUMERIC_ITEM_IDS: Record<number, string> = {
  340: "minecraft:book",
  386: "minecraft:writable_book",
  387: "minecraft:written_book",
  403: "minecraft:enchanted_book",
};

const nbtInt = z.number().int();

// ── level.dat ──────────────────────────────────────────────

export const LevelDat = z.object({
  Data: z.object({
    Version: z.object({
      Id: nbtInt,
      Name: z.string(),
      Snapshot: z.coerce.boolean(),
    }).optional(),
    version: nbtInt.optional(),
  }),
});

export type LevelDat = z.infer<typeof LevelDat>;

// ── Items & books ──────────────────────────────────────────

/** Fields of the wrong type read as absent: an item tag is only ever a book candidate */
export const BookTag = z.object({
  pages: z.array(z.string()).optional().catch(undefined),
  title: z.string().optional().catch(undefined),
  author: z.string().optional().catch(undefined),
});

export const ItemTag = z.object({
  id: z.union([z.string(), nbtInt]).transform(id =>
    typeof id === "string" ? id : NUMERIC_ITEM_IDS[id] ?? String(id)),
  Count: nbtInt.optional(),
  Slot: nbtInt.optional(),
  tag: BookTag.optional().catch(undefined),
}).transform((item): Item => ({
  id: item.id,
  count: item.Count ?? 1,
  slot: item.Slot,
  tag: item.tag,
}));

// ── Block entities & entities ──────────────────────────────

const RawBlockEntity = z.object({
  id: z.string(),
  x: nbtInt,
  y: nbtInt,
  z: nbtInt,
  Text1: z.string().optional(),
  Text2: z.string().optional(),
  Text3: z.string().optional(),
  Text4: z.string().optional(),
  // 1.20+ signs
  front_text: z.object({ messages: z.array(z.string()) }).optional().catch(undefined),
  Items: z.array(ItemTag).optional(),
});

function readSignLines(be: z.infer<typeof RawBlockEntity>): SignLines | undefined {
  const { Text1, Text2, Text3, Text4 } = be;
  if (Text1 !== undefined && Text2 !== undefined && Text3 !== undefined && Text4 !== undefined) {
    return [Text1, Text2, Text3, Text4];
  }
  const messages = be.front_text?.messages;
  if (messages?.length === 4) return [messages[0], messages[1], messages[2], messages[3]];
  return undefined;
}

export const BlockEntityTag = RawBlockEntity
  .transform((be): BlockEntity => ({
    id: be.id,
    x: be.x,
    y: be.y,
    z: be.z,
    signLines: readSignLines(be),
    items: be.Items,
  }))
  .refine(
    be => !isSignId(be.id) || be.signLines !== undefined,
    be => ({ message: `sign at ${be.x},${be.y},${be.z} is missing text lines` }),
  );

export const EntityTag = z.object({
  id: z.string().default(""),
  Pos: z.tuple([z.number(), z.number(), z.number()]),
  Item: ItemTag.optional(),
}).transform((e): Entity => ({ id: e.id, pos: e.Pos, item: e.Item }));

// ── Chunk layouts ──────────────────────────────────────────

/** Up to 1.16: tile entities and entities both live under Level */
export const LegacyChunk = z.object({
  Level: z.object({
    TileEntities: z.array(BlockEntityTag).default([]),
    Entities: z.array(EntityTag).default([]),
  }),
}).transform(({ Level }): ChunkView => ({
  blockEntities: Level.TileEntities,
  entities: Level.Entities,
}));

/** 1.17: entities moved out to the entities/ region tree */
export const Chunk1_17 = z.object({
  Level: z.object({
    TileEntities: z.array(BlockEntityTag).default([]),
  }),
}).transform(({ Level }): ChunkView => ({
  blockEntities: Level.TileEntities,
  entities: [],
}));

/** 1.18+: no Level wrapper, lowercase block_entities */
export const Chunk1_18 = z.object({
  block_entities: z.array(BlockEntityTag).default([]),
}).transform((chunk): ChunkView => ({
  blockEntities: chunk.block_entities,
  entities: [],
}));

export const CHUNK_SCHEMAS: Record<ChunkFormat, z.ZodType<ChunkView, z.ZodTypeDef, unknown>> = {
  legacy: LegacyChunk,
  "1.17": Chunk1_17,
  "1.18": Chunk1_18,
};
