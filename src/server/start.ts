import { startWsServer } from "./wsServer";
import { loadConfig } from "../config";
import { createLogObserver } from "../engine";

const config = loadConfig();

const server = startWsServer({
  port: config.wsPort,
  maxGenerations: config.wsMaxGenerations,
  observer: config.trace ? createLogObserver() : undefined,
});

console.log(`tilewalk WS server listening on ws://localhost:${server.port}`);
console.log("Options:", JSON.stringify(config, null, 2));

function shutdown() {
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
