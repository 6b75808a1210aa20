/**
 * Deciding which passwords to try on an encrypted document.
 */

import { tryDecrypt } from "#src/codec/unlock-result";
import type { DecodedPdf } from "#src/codec/types";
import { throwIfAborted } from "#src/errors";

/**
 * Ask the user for a password for the named document.
 *
 * An empty answer means "skip this document". Implementations should reject
 * when `signal` aborts.
 */
export type PasswordPrompt = (name: string, signal?: AbortSignal) => Promise<string>;

export interface ResolvePasswordOptions {
  /** Label passed to the prompt */
  name: string;
  /** Shared password tried first */
  defaultPassword?: string;
  /** Per-document password tried after the shared one */
  override?: string;
  /** Interactive fallback; omit to disable prompting */
  prompt?: PasswordPrompt;
  signal?: AbortSignal;
}

export type UnlockStatus = "unlocked" | "skipped-no-password";

export interface UnlockOutcome {
  status: UnlockStatus;
  /** Number of decrypt calls made */
  attempts: number;
}

/**
 * Build the ordered, de-duplicated list of passwords to try: the default
 * first, then the override when it differs. Empty strings are left out.
 */
export function buildCandidateList(defaultPassword?: string, override?: string): string[] {
  const candidates: string[] = [];

  if (defaultPassword) {
    candidates.push(defaultPassword);
  }

  if (override && !candidates.includes(override)) {
    candidates.push(override);
  }

  return candidates;
}

/**
 * Unlock a document if possible.
 *
 * Unencrypted documents, and encrypted ones the codec could already read,
 * are unlocked without any attempt. Otherwise each candidate is tried in
 * order; when they run out and a prompt is given, the user is asked once.
 * An empty or wrong answer skips the document.
 *
 * @throws {MergeAbortedError} if `signal` aborts
 */
export async function resolvePassword(
  doc: DecodedPdf,
  options: ResolvePasswordOptions,
): Promise<UnlockOutcome> {
  if (!doc.isEncrypted || doc.isUnlocked) {
    return { status: "unlocked", attempts: 0 };
  }

  let attempts = 0;

  for (const password of buildCandidateList(options.defaultPassword, options.override)) {
    throwIfAborted(options.signal);
    attempts++;

    if (await tryDecrypt(doc, password)) {
      return { status: "unlocked", attempts };
    }
  }

  if (!options.prompt) {
    return { status: "skipped-no-password", attempts };
  }

  throwIfAborted(options.signal);

  const answer = await options.prompt(options.name, options.signal);

  if (answer === "") {
    return { status: "skipped-no-password", attempts };
  }

  attempts++;

  return { status: (await tryDecrypt(doc, answer)) ? "unlocked" : "skipped-no-password", attempts };
}
