import { loadConfig } from "./config.js";
import { buildServer } from "./server.js";

const config = loadConfig();
const app = buildServer({ config, logger: { level: config.logLevel } });

app.log.info({ host: config.host, port: config.port, env: config.appEnv }, "booting item-api");

const shutdown = (signal: NodeJS.Signals) => {
  app.log.info({ signal }, "shutting down");
  app
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      app.log.error({ err }, "shutdown failed");
      process.exit(1);
    });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

app
  .listen({ port: config.port, host: config.host })
  .then((address) => {
    app.log.info(`item-api listening on ${address}`);
  })
  .catch((err: unknown) => {
    console.error("[item-api] listen failed", err);
    app.log.error({ err }, "listen failed");
    process.exit(1);
  });
