// src/routes/items.ts
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError, issuesFromZod, summarizeIssues } from '../errors';
import { ITEM_NAME_MAX, requireValid, validateItemCreate, validateItemUpdate } from '../schemas/item';
import type { ItemStorageBackend } from '../contracts/itemStorage';
import type { PageResult, PaginationLimits } from '../query/pagination';
import type { Item, ItemResponse } from '../types';

export interface ItemRouteOptions {
  prefix: string;
  backend: ItemStorageBackend;
  pagination: PaginationLimits;
}

// ---------- Schemas ----------
const idParamsSchema = z.object({
  id: z.string().min(1),
});

// search terms are bounded like item names
const searchTerm = z.string().max(ITEM_NAME_MAX, `q must be at most ${ITEM_NAME_MAX} characters`);

function pageFields(pagination: PaginationLimits) {
  return {
    page: z.coerce.number().int().min(1).default(1),
    size: z.coerce.number().int().min(1).max(pagination.maxSize).default(pagination.defaultSize),
  };
}

// ---------- Helpers ----------
function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = issuesFromZod(parsed.error);
    throw new ValidationError(`${what}: ${summarizeIssues(issues)}`, issues);
  }
  return parsed.data;
}

export function toItemResponse(item: Item): ItemResponse {
  return {
    id: item.id,
    name: item.name,
    description: item.description,
    created_at: item.created_at.toISOString(),
    updated_at: item.updated_at.toISOString(),
  };
}

function toPageResponse(page: PageResult<Item>): PageResult<ItemResponse> {
  return { ...page, items: page.items.map(toItemResponse) };
}

// ---------- Routes ----------
export async function registerItemRoutes(app: FastifyInstance, options: ItemRouteOptions) {
  const { prefix, backend, pagination } = options;
  const listSchema = z.object({ q: searchTerm.optional(), ...pageFields(pagination) });
  const searchSchema = z.object({ q: searchTerm.min(1, 'q required'), ...pageFields(pagination) });

  // Create
  app.post(prefix, async (req, reply) => {
    const fields = requireValid(validateItemCreate(req.body));
    const item = await backend.create(fields);
    return reply.code(201).send(toItemResponse(item));
  });

  // List (optionally filtered by ?q=)
  app.get(prefix, async (req, reply) => {
    const { q, page, size } = parseOrThrow(listSchema, req.query, 'invalid list query');
    const result = await backend.list({ search: q, page, size });
    return reply.send(toPageResponse(result));
  });

  // Search by name; q is mandatory here
  app.get(`${prefix}/search`, async (req, reply) => {
    const { q, page, size } = parseOrThrow(searchSchema, req.query, 'invalid search query');
    const result = await backend.list({ search: q, page, size });
    return reply.send(toPageResponse(result));
  });

  // Read
  app.get(`${prefix}/:id`, async (req, reply) => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'invalid item id');
    const item = await backend.get(id);
    return reply.send(toItemResponse(item));
  });

  // Update (partial)
  app.put(`${prefix}/:id`, async (req, reply) => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'invalid item id');
    const fields = requireValid(validateItemUpdate(req.body), 'invalid item update');
    const item = await backend.update(id, fields);
    return reply.send(toItemResponse(item));
  });

  // Delete
  app.delete(`${prefix}/:id`, async (req, reply) => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'invalid item id');
    await backend.delete(id);
    return reply.code(204).send();
  });
}
