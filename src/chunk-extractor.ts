/**
 * Chunk extractor — walks a normalized chunk view and pulls out signs and
 * books. Pure functions: the same view always yields the same records.
 */
import type { Book, BookWithPos, ChunkExtract, ChunkView, Item, Position } from "./types.js";

/** Block ids went from "Sign" to "minecraft:oak_sign"; match on the suffix, ignoring case */
export function isSignId(id: string): boolean {
  return id.toLowerCase().endsWith("sign");
}

/** Writable and written books; enchanted books and the plain book item carry no text */
export function isBookItemId(id: string): boolean {
  const lower = id.toLowerCase();
  return lower.endsWith("book") && !lower.endsWith("enchanted_book") && !lower.endsWith(":book");
}

function bookFromItem(item: Item): (Book & { pages: string[] }) | null {
  if (!isBookItemId(item.id)) return null;
  const pages = item.tag?.pages;
  if (!pages) return null;
  return { ...item.tag, pages };
}

function placeBook(book: Book & { pages: string[] }, pos: Position): BookWithPos {
  return { book, x: pos.x, y: pos.y, z: pos.z };
}

export function extractFromChunk(view: ChunkView): ChunkExtract {
  const result: ChunkExtract = { signs: [], books: [] };

  for (const be of view.blockEntities) {
    if (isSignId(be.id)) {
      // always set for decoded chunks; see BlockEntityTag
      if (be.signLines) result.signs.push({ id: be.id, x: be.x, y: be.y, z: be.z, lines: be.signLines });
      continue;
    }
    for (const item of be.items ?? []) {
      const book = bookFromItem(item);
      if (book) result.books.push(placeBook(book, be));
    }
  }

  for (const entity of view.entities) {
    if (!entity.item) continue;
    const book = bookFromItem(entity.item);
    if (!book) continue;
    const [x, y, z] = entity.pos.map(Math.floor);
    result.books.push(placeBook(book, { x, y, z }));
  }

  return result;
}
