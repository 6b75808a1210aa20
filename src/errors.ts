/**
 * Error classes for merge, conversion and compression runs.
 *
 * Per-document failures (unreadable bytes, missing passwords, pages that
 * cannot be copied) are recorded as skips and never thrown out of the
 * engines. The classes here cover what does propagate: missing codec
 * packages, final assembly failures and cancellation.
 */

/**
 * Base class for errors raised by this package.
 */
export class MergerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MergerError";
  }
}

/**
 * A codec package could not be loaded.
 *
 * Raised by the capability checks (`loadPdfCodec`, `loadImageCodec`) instead
 * of failing at import time.
 */
export class CodecUnavailableError extends MergerError {
  readonly packageName: string;

  constructor(packageName: string, options?: ErrorOptions) {
    super(`${packageName} is required. Install with: npm install ${packageName}`, options);
    this.name = "CodecUnavailableError";
    this.packageName = packageName;
  }
}

/**
 * Bytes could not be decoded as the expected format.
 */
export class DecodeError extends MergerError {
  readonly sourceName: string | undefined;

  constructor(message: string, sourceName?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
    this.sourceName = sourceName;
  }
}

/**
 * Serializing the accumulated output failed.
 */
export class AssemblyError extends MergerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AssemblyError";
  }
}

/**
 * The run was cancelled before it finished. No output is produced.
 */
export class MergeAbortedError extends MergerError {
  constructor(options?: ErrorOptions) {
    super("Aborted by user", options);
    this.name = "MergeAbortedError";
  }
}

/**
 * Throw {@link MergeAbortedError} if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new MergeAbortedError({ cause: signal.reason });
  }
}

/**
 * Check whether an error is a cancellation, either ours or an `AbortError`
 * raised by a Node API that was handed the same signal.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof MergeAbortedError) {
    return true;
  }

  return error instanceof Error && error.name === "AbortError";
}

/**
 * Render an unknown thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Check whether a dynamic import failed because the package is not installed.
 */
export function isModuleNotFound(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }

  return error.code === "ERR_MODULE_NOT_FOUND" || error.code === "MODULE_NOT_FOUND";
}
