import Fastify, { type FastifyServerOptions } from "fastify";
import sensible from "@fastify/sensible";
import { loadConfig, type AppConfig } from "./config.js";
import { MemoryItemStore } from "./domain/memory-store.js";
import type { ItemStore } from "./domain/store.js";
import { registerErrorHandlers } from "./errors.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerItemRoutes } from "./routes/items.js";

export type BuildServerOptions = {
  config?: AppConfig;
  store?: ItemStore;
  logger?: FastifyServerOptions["logger"];
};

export const buildServer = (options: BuildServerOptions = {}) => {
  const config = options.config ?? loadConfig();
  const app = Fastify({ logger: options.logger ?? false });
  const store = options.store ?? new MemoryItemStore();

  app.register(sensible);
  registerErrorHandlers(app);
  registerHealthRoutes(app, config.appEnv);
  registerItemRoutes(app, store);

  return app;
};
