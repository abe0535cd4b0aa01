/**
 * ReportWriter — renders sorted signs and books as plain text and writes
 * `signs-<save>.txt` / `books-<save>.txt`.
 */
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { BookWithPos, SignRecord, WorldVersion } from "./types.js";
import { formatSignLine, stripFormattingCodes } from "./text-format.js";

export interface ReportPaths {
  signsPath: string;
  booksPath: string;
}

export function formatSignReport(signs: readonly SignRecord[], version: WorldVersion): string {
  const out: string[] = [];
  for (const sign of signs) {
    out.push(`========== sign location: ${sign.x},${sign.y},${sign.z} ==========`);
    for (const line of sign.lines) out.push(`text: ${formatSignLine(line, version)}`);
    out.push("");
  }
  return out.map(l => `${l}\n`).join("");
}

export function formatBookReport(books: readonly BookWithPos[]): string {
  const out: string[] = [];
  for (const { book, x, y, z } of books) {
    out.push(`=========== book location: ${x},${y},${z} ==========`);
    // writable books have neither title nor author
    out.push(`title: ${book.title ?? "unknown"}`);
    out.push(`author: ${book.author ?? "unknown"}`);
    out.push(`pages: ${book.pages.length}`);
    book.pages.forEach((page, i) => {
      out.push(`---------- page ${i + 1} ----------`);
      out.push(stripFormattingCodes(page));
    });
    out.push("");
  }
  return out.map(l => `${l}\n`).join("");
}

export async function writeReports(
  result: { version: WorldVersion; signs: readonly SignRecord[]; books: readonly BookWithPos[] },
  saveName: string,
  outDir: string,
): Promise<ReportPaths> {
  await mkdir(outDir, { recursive: true });
  const signsPath = path.join(outDir, `signs-${saveName}.txt`);
  const booksPath = path.join(outDir, `books-${saveName}.txt`);
  await writeFile(signsPath, formatSignReport(result.signs, result.version), "utf8");
  await writeFile(booksPath, formatBookReport(result.books), "utf8");
  return { signsPath, booksPath };
}
