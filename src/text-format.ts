/**
 * Text normalizers for report output.
 *
 * Signs in 1.9+ worlds store each line as a JSON text component, e.g.
 *   {"text":"Hello ","extra":[{"text":"world","color":"red"}]}
 * which flattens to "Hello world". Pre-1.9 worlds store plain strings.
 *
 * Book pages carry in-band `§` formatting escapes:
 *   §k obfuscated, §l bold, §m strikethrough, §n underline, §o italic,
 *   §0–§f colors, §r reset.
 */
import { z } from "zod";
import { isLegacyWorld } from "./chunk-decoder.js";
import { errorMessage } from "./errors.js";
import type { WorldVersion } from "./types.js";
import logger from "./utils/logger.js";

export type TextComponent =
  | string
  | TextComponent[]
  | { text?: string; extra?: TextComponent[] };

/** Style keys (color, bold, …) and anything else are dropped */
export const TextComponentSchema: z.ZodType<TextComponent> = z.lazy(() =>
  z.union([
    z.string(),
    z.array(TextComponentSchema),
    z.object({
      text: z.string().optional(),
      extra: z.array(TextComponentSchema).optional(),
    }),
  ]),
);

export function flattenComponent(component: TextComponent): string {
  if (typeof component === "string") return component;
  if (Array.isArray(component)) return component.map(flattenComponent).join("");
  return (component.text ?? "") + (component.extra ?? []).map(flattenComponent).join("");
}

/** Parses and flattens one JSON sign line; throws on malformed input */
export function parseSignLine(json: string): string {
  return flattenComponent(TextComponentSchema.parse(JSON.parse(json)));
}

/** Legacy worlds pass through verbatim; a malformed JSON line renders empty */
export function formatSignLine(raw: string, version: WorldVersion): string {
  if (isLegacyWorld(version)) return raw;
  try {
    return parseSignLine(raw);
  } catch (e) {
    logger.warn(`malformed sign text ${JSON.stringify(raw)}: ${errorMessage(e)}`, { module: "text" });
    return "";
  }
}

const FORMATTING_CODE = /§[0-9a-fk-or]/gi;

export function stripFormattingCodes(page: string): string {
  return page.replace(FORMATTING_CODE, "").replace(/§/g, "");
}
