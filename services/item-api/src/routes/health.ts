import type { FastifyInstance } from "fastify";
import type { HealthResponse } from "@item-registry/shared";

export const registerHealthRoutes = (app: FastifyInstance, appEnv: string) => {
  app.get("/health", async (): Promise<HealthResponse> => ({ status: "ok", env: appEnv }));
};
