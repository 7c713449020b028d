import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "./logger.js";

// Best-effort delete; failures are logged and never rethrown
export async function removeFileQuietly(filePath: string, logger: Pick<Logger, "debug" | "warn">): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
    logger.debug(`Cleaned up file: ${filePath}`);
  } catch (error) {
    logger.warn({ err: error }, `Cleanup warning for ${filePath}`);
  }
}

// Keeps only the base name, restricted to a safe character set and 100 chars
export function sanitizeFileName(name: string | undefined): string {
  const base = path.basename(name || "unknown").replace(/[^\w.\-]+/g, "_");
  const trimmed = base.replace(/^\.+/, "").slice(0, 100);
  return trimmed || "unknown";
}
