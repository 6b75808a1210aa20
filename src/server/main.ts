import { createApp } from "./app";
import { loadServerConfig } from "./config";

const config = loadServerConfig();
const server = createApp({ maxUploadBytes: config.maxUploadBytes }).listen(config.port, config.host);

server.on("listening", () => {
  console.info(`Listening on http://${config.host}:${config.port}`);
});

server.on("error", error => {
  console.error(`Failed to listen on ${config.host}:${config.port}: ${error.message}`);
  process.exitCode = 1;
});
