/**
 * Merging PDFs from the filesystem, with progress printed as it goes.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, relative, resolve } from "node:path";
import type { PdfCodec } from "#src/codec/types";
import { type MergeOrder, orderPaths } from "#src/discovery/ordering";
import { AssemblyError, describeError } from "#src/errors";
import type { Logger } from "#src/helpers/logger";
import type { PasswordPrompt } from "#src/security/password-resolution";
import { fileSource } from "#src/sources/document-source";
import { mergeDocuments, type MergeResult } from "./merge-engine";

export interface MergeFilesOptions {
  /** Where the merged PDF is written; parent directories are created */
  outputPath: string;
  order?: MergeOrder;
  /** Shared password tried on every encrypted file */
  password?: string;
  prompt?: PasswordPrompt;
  signal?: AbortSignal;
  codec?: PdfCodec;
  log?: Logger;
  /** Base for the relative paths shown in messages (default: process.cwd()) */
  cwd?: string;
}

export interface MergeFilesResult extends Omit<MergeResult, "output"> {
  /** The written file, or null when nothing was merged */
  outputPath: string | null;
}

/**
 * Merge files in natural or modification-time order and write the result.
 *
 * Files are streamed from disk one at a time. Skipped files are named by
 * their path relative to `cwd`.
 *
 * @throws {AssemblyError} if the output cannot be serialized or written
 * @throws {MergeAbortedError} if `signal` aborts; nothing is written
 */
export async function mergeFiles(
  paths: readonly string[],
  options: MergeFilesOptions,
): Promise<MergeFilesResult> {
  const log = options.log ?? console;
  const cwd = options.cwd ?? process.cwd();
  const ordered = await orderPaths(paths, options.order ?? "name");

  let result: MergeResult;

  try {
    result = await mergeDocuments(
      ordered.map(path => fileSource(path, relative(cwd, path))),
      {
        defaultPassword: options.password,
        prompt: options.prompt,
        signal: options.signal,
        codec: options.codec,
        reporter: {
          processing: name => log.info(`Processing: ${name}`),
          skipped: (name, reason, error) => {
            if (reason === "locked") {
              log.warn("  Could not decrypt (wrong/unknown password). Skipping.");
            } else {
              log.warn(`  Failed to read '${name}': ${describeError(error)}`);
            }
          },
        },
      },
    );
  } catch (error) {
    if (error instanceof AssemblyError) {
      log.error(`Failed to write output '${options.outputPath}': ${describeError(error.cause)}`);
    }

    throw error;
  }

  const { output, ...counts } = result;

  if (!output) {
    log.info("No PDFs merged; nothing to write.");

    return { ...counts, outputPath: null };
  }

  try {
    await mkdir(dirname(resolve(options.outputPath)), { recursive: true });
    await writeFile(options.outputPath, output);
  } catch (error) {
    log.error(`Failed to write output '${options.outputPath}': ${describeError(error)}`);

    throw new AssemblyError(`Failed to write output '${options.outputPath}'`, { cause: error });
  }

  log.info(`Saved merged unlocked PDF to: ${options.outputPath}`);

  return { ...counts, outputPath: options.outputPath };
}
