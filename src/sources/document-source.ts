/**
 * Inputs handed to the merge, conversion and compression engines.
 *
 * Front ends build sources from whatever they hold (uploaded buffers, file
 * paths, arbitrary streams). The engines only ever read bytes through
 * {@link ensureSeekable}, which drains a stream at most once.
 */

import { createReadStream } from "node:fs";
import { concatBytes } from "#src/helpers/buffer";

/**
 * Raw input bytes: either fully buffered or a stream read front to back.
 */
export type SourceData = Uint8Array | AsyncIterable<Uint8Array>;

/**
 * One PDF input for a merge or compression run.
 */
export interface DocumentSource {
  /** Label used in progress lines and skip lists */
  readonly name: string;
  readonly data: SourceData;
  /** Per-document password override */
  readonly password?: string;
}

/**
 * One image input for image-to-PDF conversion.
 */
export interface ImageSource {
  readonly name: string;
  readonly data: SourceData;
}

/**
 * A source whose bytes are fully in memory and can be read from the start
 * any number of times.
 */
export type SeekableSource<T extends { readonly data: SourceData }> = Omit<T, "data"> & {
  readonly bytes: Uint8Array;
};

/**
 * Return an in-memory copy of a source.
 *
 * Byte-array sources are wrapped without copying. Streams are drained once
 * into a single buffer. The input object is left untouched.
 */
export async function ensureSeekable<T extends { readonly data: SourceData }>(
  source: T,
): Promise<SeekableSource<T>> {
  const { data, ...rest } = source;
  const bytes = data instanceof Uint8Array ? data : await readAll(data);

  return { ...rest, bytes };
}

async function readAll(stream: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];

  for await (const chunk of stream) {
    chunks.push(chunk);
  }

  return concatBytes(chunks);
}

/**
 * Stream a file's contents. The file is opened on first read, not when the
 * iterable is created, so building sources for a whole folder holds no
 * descriptors open.
 */
export async function* readFileChunks(path: string): AsyncGenerator<Uint8Array> {
  for await (const chunk of createReadStream(path)) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    }
  }
}

/**
 * Build a document source backed by a file on disk.
 */
export function fileSource(path: string, name: string, password?: string): DocumentSource {
  return { name, data: readFileChunks(path), password };
}
