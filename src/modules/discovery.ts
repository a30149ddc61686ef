/**
 * Input Discovery
 * Lists the files of an input directory that carry the plugin's extension
 */

import glob from "fast-glob";
import path from "node:path";
import { isDirectory } from "../utils/fs";

export interface DirectoryScan {
  files: string[];
  // Set when the directory itself could not be used
  error?: string;
}

/**
 * Regular files directly under `directory` whose extension equals
 * `extension` (case-sensitive), as absolute paths in directory order
 */
export async function scanInputDirectory(
  directory: string,
  extension: string,
  cwd: string,
): Promise<DirectoryScan> {
  const root = path.resolve(cwd, directory);

  if (!(await isDirectory(root))) {
    return { files: [], error: `Input directory does not exist: ${root}` };
  }

  const entries = await glob(`*${glob.escapePath(extension)}`, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    deep: 1,
    dot: true,
    caseSensitiveMatch: true,
    followSymbolicLinks: true,
  });

  // A file named just ".mf4" has no extension
  const files = entries
    .map((entry) => path.normalize(entry))
    .filter((entry) => path.extname(entry) === extension);

  return { files };
}
