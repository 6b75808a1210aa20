/**
 * Finding candidate PDFs in a folder.
 */

import { basename, resolve } from "node:path";
import { glob } from "glob";

const PDF_EXTENSION = /\.pdf$/i;

export interface DiscoverOptions {
  /** Walk the whole subtree instead of direct children only (default: false) */
  recursive?: boolean;
  /** Case-sensitive glob matched against file names (default: "*.pdf") */
  pattern?: string;
}

/**
 * List the PDFs under `root` whose file name matches `pattern`.
 *
 * Only regular files whose name ends in `.pdf` (any case) are returned, as
 * absolute paths in no particular order. Dotfiles are included. Nothing
 * matching yields an empty list.
 *
 * @example
 * ```ts
 * const paths = await discoverPdfs("./statements", { recursive: true, pattern: "2024-*" });
 * ```
 */
export async function discoverPdfs(root: string, options: DiscoverOptions = {}): Promise<string[]> {
  const pattern = options.pattern ?? "*.pdf";

  const matches = await glob(options.recursive ? `**/${pattern}` : pattern, {
    cwd: resolve(root),
    absolute: true,
    nodir: true,
    dot: true,
    nocase: false,
  });

  return matches.filter(path => PDF_EXTENSION.test(basename(path)));
}
