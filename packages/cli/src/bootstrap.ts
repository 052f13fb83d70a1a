import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { Logger } from "@sockserve/engine";

export const SAMPLE_ASSETS_DIR = fileURLToPath(
  new URL("../assets/webroot/", import.meta.url),
);

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Make sure `root` exists. A missing root is created and filled with the
 * sample pages from `assetsDir`. Returns the names of the files copied.
 */
export async function ensureWebRoot(
  root: string,
  logger: Logger,
  assetsDir: string = SAMPLE_ASSETS_DIR,
): Promise<string[]> {
  if (await pathExists(root)) {
    const stat = await fs.stat(root);
    if (!stat.isDirectory()) {
      throw new Error(`Not a directory: ${root}`);
    }
    return [];
  }

  await fs.mkdir(root, { recursive: true });
  logger.info(`Created ${root}`);

  const copied: string[] = [];
  try {
    const entries = await fs.readdir(assetsDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      await fs.copyFile(
        path.join(assetsDir, entry.name),
        path.join(root, entry.name),
      );
      copied.push(entry.name);
    }
  } catch (err) {
    logger.warn("Could not create sample files:", err);
    return copied;
  }

  copied.sort();
  logger.info(`Sample files created: ${copied.join(", ")}`);
  return copied;
}
