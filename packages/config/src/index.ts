// packages/config/src/index.ts
import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { ZodError } from 'zod';
import {
  ConfigError,
  ConfigSchema,
  EnvSchema,
  errorMessage,
  type ConfigFile,
  type Env,
  type Field,
  type Relation,
} from '@fieldlink/core';

export const CONFIG_FILENAME = 'fieldlink.config.json';
/** searched in this order in each directory */
export const CONFIG_FILENAMES = [CONFIG_FILENAME, 'fieldlink.config.toml'] as const;

export interface AppConfig {
  listen: string;
  maxDepth: number;
  requestTimeoutMs: number;
  fields: Field[];
  relations: Relation[];
}

function findUp(filenames: readonly string[], startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    for (const filename of filenames) {
      const candidate = path.join(dir, filename);
      if (fs.existsSync(candidate)) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function formatIssues(e: ZodError): string {
  return e.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '<root>'}: ${i.message}`)
    .join('; ');
}

/**
 * Validate a decoded config document. Shape is checked by the zod schema, then
 * the cross-references the schema cannot express: unique field ids, unique
 * relation names, and every relation field naming a declared field.
 */
export function validateConfig(doc: unknown): AppConfig {
  let cfg: ConfigFile;
  try {
    cfg = ConfigSchema.parse(doc);
  } catch (e) {
    if (e instanceof ZodError) throw new ConfigError(`invalid config: ${formatIssues(e)}`, { cause: e });
    throw e;
  }

  const fieldIds = new Set<string>();
  for (const f of cfg.fields) {
    if (fieldIds.has(f.id)) throw new ConfigError(`duplicate field \`${f.id}\``);
    fieldIds.add(f.id);
  }

  const relationNames = new Set<string>();
  for (const r of cfg.relations) {
    if (relationNames.has(r.name)) throw new ConfigError(`duplicate relation name \`${r.name}\``);
    relationNames.add(r.name);

    const seen = new Set<string>();
    for (const f of r.fields) {
      if (!fieldIds.has(f.id)) {
        throw new ConfigError(
          `undeclared field \`${f.id}\` used in relation \`${r.name}\`, you have to declare it in \`fields\``
        );
      }
      if (seen.has(f.id)) throw new ConfigError(`field \`${f.id}\` appears twice in relation \`${r.name}\``);
      seen.add(f.id);
    }
  }

  return {
    listen: cfg.listen,
    maxDepth: cfg.max_depth,
    requestTimeoutMs: cfg.request_timeout_ms,
    fields: cfg.fields.map((f) => ({ id: f.id, distinct: f.distinct })),
    relations: cfg.relations.map((r) => ({
      name: r.name,
      connect: r.connect,
      tableName: r.table_name,
      fields: r.fields.map((f) => ({ id: f.id, query: f.query })),
    })),
  };
}

export function readConfigFile(file: string): AppConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new ConfigError(`failed to read config file ${file}: ${errorMessage(e)}`, { cause: e });
  }
  let doc: unknown;
  try {
    doc = path.extname(file).toLowerCase() === '.toml' ? parseToml(text) : JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`failed to decode config file ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return validateConfig(doc);
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): Env {
  try {
    return EnvSchema.parse(env);
  } catch (e) {
    if (e instanceof ZodError) throw new ConfigError(`invalid environment: ${formatIssues(e)}`, { cause: e });
    throw e;
  }
}

/**
 * Locate and load the configuration. CONFIG_PATH wins; otherwise the nearest
 * fieldlink.config.json (or .toml) above the working directory. Env knobs override file values.
 */
export function loadConfig(env: Env = readEnv(), cwd = process.cwd()): AppConfig & { path: string } {
  const file = env.CONFIG_PATH ? path.resolve(cwd, env.CONFIG_PATH) : findUp(CONFIG_FILENAMES, cwd);
  if (!file) throw new ConfigError(`${CONFIG_FILENAMES.join(' or ')} not found (set CONFIG_PATH)`);
  const cfg = readConfigFile(file);
  return {
    ...cfg,
    listen: env.LISTEN ?? cfg.listen,
    maxDepth: env.MAX_DEPTH ?? cfg.maxDepth,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS ?? cfg.requestTimeoutMs,
    path: file,
  };
}

/** "host:port" or "[v6]:port" */
export function parseListen(listen: string): { host: string; port: number } {
  const m = listen.trim().match(/^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/);
  if (!m) throw new ConfigError(`invalid listen address \`${listen}\`, expected host:port`);
  const port = Number(m[3]);
  if (!Number.isInteger(port) || port > 65535) throw new ConfigError(`invalid port in listen address \`${listen}\``);
  const host = m[1] ?? (m[2] || '0.0.0.0');
  return { host, port };
}
