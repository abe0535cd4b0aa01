/**
 * Shared types: the normalized chunk view produced by every schema adapter,
 * and the records handed from the extractor to the reporter.
 */

/** World version read from level.dat; `name === "old"` marks a pre-1.9 save */
export interface WorldVersion {
  id: number;
  name: string;
  snapshot: boolean;
}

/** Chunk layout generation, selected from the world version */
export type ChunkFormat = "legacy" | "1.17" | "1.18";

export type SignLines = [string, string, string, string];

export interface Book {
  pages?: string[];
  title?: string;
  author?: string;
}

export interface Item {
  id: string;
  count: number;
  slot?: number;
  tag?: Book;
}

export interface BlockEntity {
  id: string;
  x: number;
  y: number;
  z: number;
  signLines?: SignLines;
  items?: Item[];
}

export interface Entity {
  id: string;
  pos: [number, number, number];
  item?: Item;
}

export interface ChunkView {
  blockEntities: BlockEntity[];
  entities: Entity[];
}

export interface Position {
  x: number;
  y: number;
  z: number;
}

/** Raw sign lines; JSON components are flattened by the reporter */
export interface SignRecord extends Position {
  id: string;
  lines: SignLines;
}

export interface BookWithPos extends Position {
  book: Book & { pages: string[] };
}

export interface ChunkExtract {
  signs: SignRecord[];
  books: BookWithPos[];
}
