import { z } from "zod";
import type { FastifyInstance } from "fastify";
import type { ItemFields } from "@item-registry/shared";
import type { ItemStore } from "../domain/store.js";

const itemParamsSchema = z.object({
  itemId: z.string().regex(/^-?\d+$/, "Expected integer").transform(Number),
});

const createItemSchema = z.object({
  name: z.string().refine((value) => value.trim().length > 0, "Must not be blank"),
  description: z.string().nullish(),
});

export const registerItemRoutes = (app: FastifyInstance, store: ItemStore) => {
  app.get("/items", async (request, reply) => {
    const items = store.list();
    request.log.info({ count: items.length }, "list items");
    return reply.send(items);
  });

  app.post("/items", async (request, reply) => {
    const body = createItemSchema.parse(request.body);
    if (store.findByName(body.name)) {
      request.log.warn({ name: body.name }, "duplicate item name");
      return reply.badRequest("Item with this name already exists");
    }

    const fields: ItemFields = { name: body.name };
    if (body.description != null) fields.description = body.description;
    const item = store.create(fields);
    request.log.info({ id: item.id, name: item.name }, "created item");
    return reply.code(201).send(item);
  });

  app.get("/items/:itemId", async (request, reply) => {
    const params = itemParamsSchema.parse(request.params);
    const item = store.get(params.itemId);
    if (!item) {
      request.log.warn({ id: params.itemId }, "item not found");
      return reply.notFound("Item not found");
    }
    request.log.info({ id: item.id }, "retrieved item");
    return reply.send(item);
  });

  app.delete("/items/:itemId", async (request, reply) => {
    const params = itemParamsSchema.parse(request.params);
    const deleted = store.delete(params.itemId);
    if (!deleted) {
      request.log.warn({ id: params.itemId }, "item not found for deletion");
      return reply.notFound("Item not found");
    }
    request.log.info({ id: params.itemId }, "deleted item");
    return reply.code(204).send();
  });
};
