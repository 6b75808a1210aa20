/**
 * Merging decoded documents into one unlocked output.
 */

import type { DecodedPdf, OutputPdf, PdfCodec } from "#src/codec/types";
import { loadPdfCodec } from "#src/codec/load-codec";
import { AssemblyError, MergeAbortedError, throwIfAborted } from "#src/errors";
import { type PasswordPrompt, resolvePassword } from "#src/security/password-resolution";
import { type DocumentSource, ensureSeekable } from "#src/sources/document-source";

/**
 * Why a document was left out of the output.
 *
 * - `unreadable`: the bytes could not be decoded as a PDF
 * - `locked`: encrypted and no password worked
 * - `append-failed`: a page could not be copied into the output
 */
export type SkipReason = "unreadable" | "locked" | "append-failed";

/**
 * Progress hooks called while a merge runs.
 */
export interface MergeReporter {
  processing?(name: string): void;
  skipped?(name: string, reason: SkipReason, error?: unknown): void;
  merged?(name: string, pageCount: number): void;
}

export interface MergeOptions {
  /** Shared password tried on every encrypted document */
  defaultPassword?: string;
  /** Interactive fallback once the candidates fail; omit to disable */
  prompt?: PasswordPrompt;
  /** Cancels the run; no output is produced */
  signal?: AbortSignal;
  /** Defaults to the @libpdf/core codec */
  codec?: PdfCodec;
  reporter?: MergeReporter;
}

/**
 * Summary of one merge run.
 */
export interface MergeResult {
  /** Serialized output; null exactly when nothing was merged */
  output: Uint8Array | null;
  mergedCount: number;
  skippedCount: number;
  /** Names of skipped documents, in processing order */
  skippedFiles: string[];
}

/**
 * Merge documents, in the order given, into one unencrypted PDF.
 *
 * Unreadable documents, documents without a working password and documents
 * whose pages cannot be copied are skipped; the run continues. A document
 * whose copy fails part-way is removed from the output entirely.
 *
 * @throws {MergeAbortedError} if `signal` aborts
 * @throws {AssemblyError} if the merged output cannot be serialized
 * @throws {CodecUnavailableError} if no codec is given and @libpdf/core is missing
 *
 * @example
 * ```ts
 * const result = await mergeDocuments([
 *   { name: "a.pdf", data: bytesA },
 *   { name: "b.pdf", data: bytesB, password: "secret" },
 * ]);
 * ```
 */
export async function mergeDocuments(
  sources: Iterable<DocumentSource> | AsyncIterable<DocumentSource>,
  options: MergeOptions = {},
): Promise<MergeResult> {
  const codec = options.codec ?? (await loadPdfCodec());
  const reporter = options.reporter ?? {};
  const output = codec.createOutput();

  let mergedCount = 0;
  const skippedFiles: string[] = [];

  const skip = (name: string, reason: SkipReason, error?: unknown) => {
    skippedFiles.push(name);
    reporter.skipped?.(name, reason, error);
  };

  for await (const source of sources) {
    throwIfAborted(options.signal);
    reporter.processing?.(source.name);

    const { name, password } = source;
    let doc: DecodedPdf;

    try {
      const { bytes } = await ensureSeekable(source);
      doc = await codec.decode(bytes, name);
    } catch (error) {
      skip(name, "unreadable", error);
      continue;
    }

    const unlock = await resolvePassword(doc, {
      name,
      defaultPassword: options.defaultPassword,
      override: password,
      prompt: options.prompt,
      signal: options.signal,
    });

    if (unlock.status !== "unlocked") {
      skip(name, "locked");
      continue;
    }

    try {
      await appendAll(output, doc, options.signal);
    } catch (error) {
      if (error instanceof MergeAbortedError) {
        throw error;
      }

      skip(name, "append-failed", error);
      continue;
    }

    mergedCount++;
    reporter.merged?.(name, doc.pageCount);
  }

  throwIfAborted(options.signal);

  const result = { mergedCount, skippedCount: skippedFiles.length, skippedFiles };

  if (mergedCount === 0) {
    return { ...result, output: null };
  }

  try {
    return { ...result, output: await output.save() };
  } catch (error) {
    throw new AssemblyError("Failed to write merged PDF", { cause: error });
  }
}

/**
 * Copy every page of `doc` to the end of `output`, or none of them.
 */
async function appendAll(output: OutputPdf, doc: DecodedPdf, signal?: AbortSignal): Promise<void> {
  const start = output.pageCount;

  try {
    for (let i = 0; i < doc.pageCount; i++) {
      throwIfAborted(signal);
      await output.appendPage(doc, i);
    }
  } catch (error) {
    output.truncate(start);
    throw error;
  }
}
