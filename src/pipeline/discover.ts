import { stat } from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import { PipelineError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { compareCodeUnits } from "../utils/unicode.js";

const log = createChildLogger({ module: "discover" });

const PO_PATTERN = "**/*.po";

export function isPoFile(file: string): boolean {
  return path.extname(file) === ".po";
}

/**
 * Expand roots to the PO files to check, without duplicates, sorted.
 * Directories are searched recursively; files are kept when they end in `.po`.
 * An empty list of roots means the current directory.
 *
 * @throws PipelineError when a root does not exist or cannot be read
 */
export async function discoverFiles(roots: readonly string[]): Promise<string[]> {
  const found = new Set<string>();

  for (const root of roots.length > 0 ? roots : ["."]) {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(root)).isDirectory();
    } catch (err) {
      throw new PipelineError(root, `cannot access '${root}'`, { cause: err });
    }

    if (!isDirectory) {
      if (isPoFile(root)) found.add(path.normalize(root));
      continue;
    }

    let matches: string[];
    try {
      matches = await glob(PO_PATTERN, { cwd: root, nodir: true, dot: false });
    } catch (err) {
      throw new PipelineError(root, `cannot read directory '${root}'`, { cause: err });
    }
    for (const match of matches) {
      found.add(path.join(root, match));
    }
    log.debug({ root, files: matches.length }, "Directory searched");
  }

  return [...found].sort(compareCodeUnits);
}
