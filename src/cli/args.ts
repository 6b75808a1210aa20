/**
 * Command-line arguments for the folder merge tool.
 */

import minimist from "minimist";
import { z } from "zod";
import { MergerError } from "#src/errors";

export const USAGE = `Merge a folder of PDFs (handles password-protected files) into one unlocked PDF.

Usage:
  pdf-unlock-merge <folder> [options]

Options:
  -o, --output <file>    Output PDF path (default: merged_unlocked.pdf)
  --password <password>  Common password used by all/most PDFs
  --no-prompt            Do not prompt for per-file passwords; skip files the
                         common password does not open
  --recursive            Recurse into subfolders
  --pattern <glob>       File name pattern to include (default: *.pdf)
  --order <name|mtime>   Merge order: natural by file name or by modification
                         time (default: name)
  -h, --help             Show this help`;

/**
 * The command line could not be understood.
 */
export class UsageError extends MergerError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const cliOptionsSchema = z.object({
  folder: z.string().min(1),
  output: z.string().min(1).default("merged_unlocked.pdf"),
  password: z.string().optional(),
  prompt: z.boolean().default(true),
  recursive: z.boolean().default(false),
  pattern: z.string().min(1).default("*.pdf"),
  order: z.enum(["name", "mtime"]).default("name"),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CliCommand = { help: true } | { help: false; options: CliOptions };

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {UsageError} on unknown flags, a missing or extra folder, or invalid values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const unknown: string[] = [];

  const args = minimist([...argv], {
    string: ["_", "output", "password", "pattern", "order"],
    boolean: ["prompt", "recursive", "help"],
    alias: { o: "output", h: "help" },
    default: { prompt: true },
    unknown: arg => {
      if (arg.startsWith("-") && arg !== "-") {
        unknown.push(arg);

        return false;
      }

      return true;
    },
  });

  if (args.help) {
    return { help: true };
  }

  if (unknown.length > 0) {
    throw new UsageError(`Unrecognized arguments: ${unknown.join(" ")}`);
  }

  const [folder, ...extra] = args._;

  if (folder === undefined) {
    throw new UsageError("Missing required argument: folder");
  }

  if (extra.length > 0) {
    throw new UsageError(`Unrecognized arguments: ${extra.join(" ")}`);
  }

  const parsed = cliOptionsSchema.safeParse({
    folder,
    output: args.output,
    password: args.password,
    prompt: args.prompt,
    recursive: args.recursive,
    pattern: args.pattern,
    order: args.order,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") ?? "arguments";

    throw new UsageError(`Invalid value for ${field}: ${issue?.message ?? "invalid input"}`);
  }

  return { help: false, options: parsed.data };
}
