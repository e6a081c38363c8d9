// packages/core/src/schemas.ts
import { z } from 'zod';

export const DEFAULT_MAX_DEPTH = 10;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// config file (snake_case, as written on disk)
export const FieldSchema = z.object({
  id: z.string().min(1),
  distinct: z.boolean().default(false)
}).strict();

export const RelationFieldSchema = z.object({
  id: z.string().min(1),
  query: z.string().min(1)
}).strict();

export const RelationSchema = z.object({
  name: z.string().min(1),
  connect: z.string().min(1),
  table_name: z.string().min(1),
  fields: z.array(RelationFieldSchema).min(1, 'relation does not have any field')
}).strict();

export const ConfigSchema = z.object({
  listen: z.string().min(1),
  max_depth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  request_timeout_ms: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  fields: z.array(FieldSchema),
  relations: z.array(RelationSchema)
}).strict();
export type ConfigFile = z.infer<typeof ConfigSchema>;

// process environment; unset keys fall back to the config file
const positiveInt = z.coerce.number().int().positive();

export const EnvSchema = z.object({
  CONFIG_PATH: z.string().min(1).optional(),
  LISTEN: z.string().min(1).optional(),
  MAX_DEPTH: positiveInt.optional(),
  REQUEST_TIMEOUT_MS: positiveInt.optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().optional()
});
export type Env = z.infer<typeof EnvSchema>;

// GET /query parameters: a repeated parameter arrives as an array
export const SeedQuerySchema = z.record(z.union([z.string(), z.array(z.string())]));
export type SeedQuery = z.infer<typeof SeedQuerySchema>;
