/**
 * Interactive password prompt for the folder merge tool.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { Writable } from "node:stream";
import { MergeAbortedError } from "#src/errors";
import type { PasswordPrompt } from "#src/security/password-resolution";

export interface PromptStreams {
  input: Readable & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

/**
 * One prompt session over a pair of streams.
 */
export interface PasswordPromptSession {
  ask: PasswordPrompt;
  /** Release the input stream; a pending question answers "" */
  close(): void;
}

/**
 * Create a prompt that asks for document passwords without echoing them.
 *
 * A single readline interface reads the input for the whole session, and
 * lines that arrive before a question is asked are kept for the next one,
 * so answers piped in all at once are not lost.
 *
 * Ctrl+C while a question is open, or an abort of the signal passed per
 * question, rejects with {@link MergeAbortedError}. End of input answers "".
 */
export function createPasswordPrompt(
  streams: PromptStreams = { input: process.stdin, output: process.stdout },
): PasswordPromptSession {
  const queued: string[] = [];

  let rl: Interface | undefined;
  let ended = false;
  let muted = false;
  let pending: ((line: string | undefined) => void) | undefined;
  let interrupt: (() => void) | undefined;

  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) {
        streams.output.write(chunk);
      }

      callback();
    },
  });

  const open = () => {
    if (rl) {
      return;
    }

    rl = createInterface({
      input: streams.input,
      output,
      terminal: streams.input.isTTY === true,
    });

    rl.on("line", line => {
      if (pending) {
        pending(line);
      } else {
        queued.push(line);
      }
    });

    rl.on("close", () => {
      ended = true;
      pending?.(undefined);
    });

    rl.on("SIGINT", () => interrupt?.());
  };

  const nextLine = (signal?: AbortSignal) =>
    new Promise<string | undefined>((resolve, reject) => {
      const line = queued.shift();

      if (line !== undefined || ended) {
        resolve(line);

        return;
      }

      const settle = () => {
        pending = undefined;
        interrupt = undefined;
        signal?.removeEventListener("abort", abort);
      };

      const abort = () => {
        settle();
        reject(new MergeAbortedError({ cause: signal?.reason }));
      };

      signal?.addEventListener("abort", abort, { once: true });
      interrupt = abort;
      pending = answer => {
        settle();
        resolve(answer);
      };
    });

  const ask: PasswordPrompt = async (name, signal) => {
    if (signal?.aborted) {
      throw new MergeAbortedError({ cause: signal.reason });
    }

    open();
    streams.output.write(`  Password for '${name}': `);
    muted = true;

    try {
      return (await nextLine(signal)) ?? "";
    } finally {
      muted = false;
      streams.output.write("\n");
    }
  };

  return {
    ask,
    close: () => rl?.close(),
  };
}
