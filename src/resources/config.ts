import { readFile } from "node:fs/promises";
import { join } from "node:path";

export const BUCKCONFIG_FILES = [".buckconfig", ".buckconfig.local"] as const;
export const FILE_NOT_FOUND = "File not found";

/**
 * Read the Buck2 config files in `cwd` into a filename → content map.
 * Absent files map to "File not found"; other read failures map to an error string.
 */
export async function readBuckConfig(cwd: string = process.cwd()): Promise<string> {
  const content: Record<string, string> = {};

  for (const file of BUCKCONFIG_FILES) {
    try {
      content[file] = await readFile(join(cwd, file), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        content[file] = FILE_NOT_FOUND;
      } else {
        content[file] = `Error reading ${file}: ${err instanceof Error ? err.message : String(err)}`;
      }
    }
  }

  return JSON.stringify(content, null, 2);
}
