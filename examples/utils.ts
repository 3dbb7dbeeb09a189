/**
 * Shared helpers for the examples.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const OUTPUT_DIR = fileURLToPath(new URL("./output/", import.meta.url));

/**
 * Write a file under examples/output and return its path.
 */
export async function saveOutput(filename: string, bytes: Uint8Array): Promise<string> {
  await mkdir(OUTPUT_DIR, { recursive: true });

  const path = join(OUTPUT_DIR, filename);

  await writeFile(path, bytes);

  return path;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  return `${(bytes / 1024).toFixed(1)} KB`;
}
