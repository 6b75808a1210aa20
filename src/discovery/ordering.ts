import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { compareNatural } from "#src/helpers/natural-order";

/**
 * How files from a folder are ordered before merging.
 *
 * - `name`: natural order of file names ("file2" before "file10")
 * - `mtime`: oldest modification time first
 */
export type MergeOrder = "name" | "mtime";

/**
 * Return the paths in merge order. The input array is not modified and
 * ties keep their input order.
 */
export async function orderPaths(paths: readonly string[], order: MergeOrder): Promise<string[]> {
  if (order === "name") {
    return [...paths].sort((a, b) => compareNatural(basename(a), basename(b)));
  }

  const stamped = await Promise.all(
    paths.map(async path => ({ path, mtime: (await stat(path)).mtimeMs })),
  );

  return stamped.sort((a, b) => a.mtime - b.mtime).map(entry => entry.path);
}
