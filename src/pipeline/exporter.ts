import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { ExportError } from "./errors.js";
import type { ExportDocument } from "./types.js";

export interface ExportResult {
  path: string;
  bytes: number;
}

/**
 * Writes the results document as indented JSON, creating the parent
 * directory when needed. Any filesystem failure surfaces as `ExportError`.
 */
export async function exportResults(path: string, document: ExportDocument): Promise<ExportResult> {
  const target = resolve(path);
  const body = `${JSON.stringify(document, null, 2)}\n`;

  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, body, "utf8");
  } catch (error) {
    throw new ExportError(target, { cause: error });
  }

  return { path: target, bytes: Buffer.byteLength(body, "utf8") };
}
