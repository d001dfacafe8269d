import { STATUS_CODES } from "node:http";
import { ZodError } from "zod";
import type { FastifyError, FastifyInstance, FastifyReply } from "fastify";
import type { ErrorResponse } from "@item-registry/shared";

const sendError = (reply: FastifyReply, statusCode: number, message: string) => {
  const body: ErrorResponse = {
    statusCode,
    error: STATUS_CODES[statusCode] ?? "Error",
    message,
  };
  return reply.code(statusCode).send(body);
};

const formatZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "body"}: ${issue.message}`)
    .join("; ");

const isBodyParseError = (error: FastifyError): boolean =>
  error.code === "FST_ERR_CTP_INVALID_JSON_BODY" ||
  error.code === "FST_ERR_CTP_EMPTY_JSON_BODY" ||
  error instanceof SyntaxError;

export const registerErrorHandlers = (app: FastifyInstance) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return sendError(reply, 422, formatZodError(error));
    }

    if (isBodyParseError(error)) {
      return sendError(reply, 422, "body: Invalid JSON body.");
    }

    const statusCode = typeof error.statusCode === "number" ? error.statusCode : 500;
    if (statusCode >= 400 && statusCode < 500) {
      return sendError(reply, statusCode, error.message);
    }

    request.log.error({ err: error }, "request failed");
    return sendError(reply, 500, "Internal Server Error");
  });

  app.setNotFoundHandler((request, reply) => sendError(reply, 404, `Route ${request.method}:${request.url} not found`));
};
