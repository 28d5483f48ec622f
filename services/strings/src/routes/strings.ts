import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { analyzeString } from '../analysis/analyzer';
import { sha256Hex } from '../analysis/hash';
import { InvalidInputError, NotFoundError } from '../errors';
import { describeFilters, filterRecords } from '../query/filters';
import { interpretQuery } from '../query/naturalLanguage';
import type { StringStore } from '../contracts/stringStore';
import type { StringRecord } from '../types';

// ---------- Schemas ----------
const createSchema = z.object({
  value: z
    .string({ required_error: "'value' is required", invalid_type_error: "'value' must be a string" })
    .min(1, "'value' must not be empty"),
});

const valueParamsSchema = z.object({
  string_value: z.string(),
});

// query parameters arrive as strings; repeated parameters arrive as arrays and are rejected
const TRUE_VALUES = new Set(['true', '1', 'yes', 'on', 't', 'y']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off', 'f', 'n']);

const booleanParam = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .refine((v) => TRUE_VALUES.has(v) || FALSE_VALUES.has(v), 'must be a boolean')
  .transform((v) => TRUE_VALUES.has(v));

const integerParam = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'is out of range');

const listQuerySchema = z.object({
  is_palindrome: booleanParam.optional(),
  min_length: integerParam.optional(),
  max_length: integerParam.optional(),
  word_count: integerParam.optional(),
  contains_character: z
    .string()
    .refine((v) => Array.from(v).length <= 1, 'must be a single character')
    .optional(),
});

const naturalLanguageQuerySchema = z.object({
  query: z.string({ required_error: "'query' is required", invalid_type_error: "'query' must be a string" }),
});

// ---------- Helper ----------
function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  throw new InvalidInputError(detail);
}

export interface StringRouteDeps {
  store: StringStore;
}

// ---------- Routes ----------
export async function registerStringRoutes(app: FastifyInstance, { store }: StringRouteDeps) {
  // Create / analyze
  app.post('/strings', async (req, reply) => {
    const { value } = parseInput(createSchema, req.body);

    const properties = analyzeString(value);
    const record: StringRecord = {
      id: properties.sha256_hash,
      value,
      properties,
      created_at: new Date(),
    };
    await store.put(record);

    req.log.info({ id: record.id, length: properties.length }, 'String stored');
    return reply.code(201).send(record);
  });

  // Natural-language filtering; registered as a static path so it wins over /strings/:string_value
  app.get('/strings/filter-by-natural-language', async (req, reply) => {
    const { query } = parseInput(naturalLanguageQuerySchema, req.query);

    const filters = interpretQuery(query);
    req.log.debug({ query, filters }, 'Interpreted natural language query');

    const data = filterRecords(await store.list(), filters, { minLength: 'exclusive' });
    return reply.send({
      data,
      count: data.length,
      interpreted_query: {
        original: query,
        parsed_filters: filters,
      },
    });
  });

  // Read by raw value; the segment is hashed as-is, without trimming
  app.get('/strings/:string_value', async (req, reply) => {
    const { string_value } = parseInput(valueParamsSchema, req.params);
    const record = await store.get(sha256Hex(string_value));
    if (!record) throw new NotFoundError();
    return reply.send(record);
  });

  // List with structured filters
  app.get('/strings', async (req, reply) => {
    const filters = parseInput(listQuerySchema, req.query);

    const data = filterRecords(await store.list(), filters, { minLength: 'inclusive' });
    return reply.send({
      data,
      count: data.length,
      filters_applied: describeFilters(filters),
    });
  });

  // Delete by raw value
  app.delete('/strings/:string_value', async (req, reply) => {
    const { string_value } = parseInput(valueParamsSchema, req.params);
    const id = sha256Hex(string_value);
    const removed = await store.delete(id);
    if (!removed) throw new NotFoundError();

    req.log.info({ id }, 'String deleted');
    return reply.code(204).send();
  });
}
