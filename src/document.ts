import fs from "node:fs/promises";
import type { Document } from "./types";

/**
 * Read the single source document as UTF-8 plain text. A leading byte order
 * mark is dropped so chunk offsets line up with the visible text.
 */
export async function loadDocument(filePath: string): Promise<Document> {
  const raw = await fs.readFile(filePath, "utf8");
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  return Object.freeze({ path: filePath, text });
}
