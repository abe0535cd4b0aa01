/**
 * Fatal startup failures: nothing can be reported without a readable save root
 * and level.dat. Everything past that point is logged and skipped instead.
 */
import { ZodError } from "zod";

export class SaveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SaveError";
  }
}

/** One-line message for logs; zod issues become `path: message` pairs */
export function errorMessage(e: unknown): string {
  if (e instanceof ZodError) {
    return e.issues.map(i => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
  }
  return e instanceof Error ? e.message : String(e);
}
