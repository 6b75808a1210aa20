/**
 * The folder merge tool, as a function from argv to an exit code.
 */

import { stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { PdfCodec } from "#src/codec/types";
import { discoverPdfs } from "#src/discovery/discover-pdfs";
import { AssemblyError, CodecUnavailableError, isAbortError } from "#src/errors";
import type { Logger } from "#src/helpers/logger";
import { mergeFiles } from "#src/merge/merge-files";
import type { PasswordPrompt } from "#src/security/password-resolution";
import { type CliCommand, parseCliArgs, USAGE, UsageError } from "./args";
import { createPasswordPrompt } from "./prompt";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_ABORTED = 130;

export interface CliDeps {
  log?: Logger;
  codec?: PdfCodec;
  /** Used unless --no-prompt is given; defaults to a hidden stdin prompt */
  prompt?: PasswordPrompt;
  /** Aborts the run, e.g. on SIGINT */
  signal?: AbortSignal;
  /** Base for the folder and output arguments (default: process.cwd()) */
  cwd?: string;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run the tool and return its exit code.
 *
 * - 0: finished (even if every file was skipped)
 * - 1: folder missing, no matching PDFs, or the output could not be written
 * - 2: bad arguments
 * - 130: aborted
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? console;
  const cwd = deps.cwd ?? process.cwd();

  let command: CliCommand;

  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(`error: ${error.message}`);
      log.error(USAGE);

      return EXIT_USAGE;
    }

    throw error;
  }

  if (command.help) {
    log.info(USAGE);

    return EXIT_OK;
  }

  const { options } = command;
  const folder = resolve(cwd, options.folder);

  if (!(await isDirectory(folder))) {
    log.error(`Folder not found: ${options.folder}`);

    return EXIT_FAILURE;
  }

  const pdfs = await discoverPdfs(folder, {
    recursive: options.recursive,
    pattern: options.pattern,
  });

  if (pdfs.length === 0) {
    log.error("No PDFs found with the given criteria.");

    return EXIT_FAILURE;
  }

  log.info(`Found ${pdfs.length} PDF(s). Order: ${options.order}. Output: ${options.output}`);

  const session = options.prompt && !deps.prompt ? createPasswordPrompt() : undefined;

  try {
    const result = await mergeFiles(pdfs, {
      outputPath: resolve(cwd, options.output),
      order: options.order,
      password: options.password,
      prompt: options.prompt ? (deps.prompt ?? session?.ask) : undefined,
      signal: deps.signal,
      codec: deps.codec,
      log,
      cwd,
    });

    log.info(
      `Summary: merged=${result.mergedCount}, skipped=${result.skippedCount} (total=${pdfs.length})`,
    );

    return EXIT_OK;
  } catch (error) {
    if (isAbortError(error)) {
      log.error("Aborted by user.");

      return EXIT_ABORTED;
    }

    // mergeFiles has already reported the write failure
    if (error instanceof AssemblyError) {
      return EXIT_FAILURE;
    }

    if (error instanceof CodecUnavailableError) {
      log.error(error.message);

      return EXIT_FAILURE;
    }

    throw error;
  } finally {
    session?.close();
  }
}
