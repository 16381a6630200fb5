// Project root discovery: asks buck2 for its project root, then walks it for build files.
// The walk is best-effort — unreadable subdirectories are skipped, symlinks are not followed.
import { readdir } from "node:fs/promises";
import { existsSync, type Dirent } from "node:fs";
import { join } from "node:path";
import type { Buck2Runner } from "../execution/runner.js";
import { logger } from "../logger.js";

export interface DiscoveryOptions {
  readonly buildFileName: string;
  readonly ignoreDirs: readonly string[];
}

/** Recursively collect absolute paths of files named `buildFileName` under `root`, sorted. */
export async function findBuildFiles(root: string, options: DiscoveryOptions): Promise<string[]> {
  const found: string[] = [];
  const ignored = new Set(options.ignoreDirs);

  async function walk(dir: string, isRoot: boolean): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isRoot) throw err;
      logger.debug({ dir, error: err instanceof Error ? err.message : String(err) }, "Skipping unreadable directory");
      return;
    }
    for (const entry of entries) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!ignored.has(entry.name)) await walk(full, false);
      } else if (entry.isFile() && entry.name === options.buildFileName) {
        found.push(full);
      }
    }
  }

  await walk(root, true);
  return found.sort();
}

export async function readProjectRoot(runner: Buck2Runner, options: DiscoveryOptions): Promise<string> {
  try {
    const result = await runner.run(["root", "--kind=project"]);
    if (!result.success) {
      return JSON.stringify({ error: result.stderr }, null, 2);
    }
    const projectRoot = result.stdout.trim();
    const buckFiles = existsSync(projectRoot) ? await findBuildFiles(projectRoot, options) : [];
    return JSON.stringify({ project_root: projectRoot, buck_files: buckFiles }, null, 2);
  } catch (err) {
    logger.error({ err }, "Project root discovery failed");
    return JSON.stringify({ error: err instanceof Error ? err.message : String(err) }, null, 2);
  }
}
