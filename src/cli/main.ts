import { runCli } from "./run-cli";

const controller = new AbortController();

process.once("SIGINT", () => controller.abort());

process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
