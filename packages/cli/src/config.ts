import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { formatZodIssues } from '@snowmatch/core';
import { engineConfigSchema } from '@snowmatch/reconciliation';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type Env = Record<string, string | undefined>;

function expandEnvInString(input: string, env: Env): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed
 * JSON value.
 */
export function expandEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === 'string') return expandEnvInString(value, env);
  if (Array.isArray(value)) return value.map((v) => expandEnvVars(v, env));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, env);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'latin1', 'utf16le']);

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const fileStores = z
  .object({
    type: z.literal('file'),
    catalogPath: z.string().min(1),
    registryPath: z.string().min(1),
    encoding: encodingSchema.optional(),
  })
  .strict();

const postgresStores = z
  .object({
    type: z.literal('postgresql'),
    connectionString: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    maxConnections: z.number().int().min(1).max(100).optional(),
    /** Run the bundled schema.sql on startup */
    applySchema: z.boolean().default(false),
  })
  .strict();

export const storesSchema = z.discriminatedUnion('type', [fileStores, postgresStores]);

export const resolverSchema = z
  .discriminatedUnion('type', [
    z.object({ type: z.literal('similarity') }).strict(),
    z
      .object({
        type: z.literal('anthropic'),
        apiKey: z.string().min(1),
        model: z.string().min(1).optional(),
        maxTokens: z.number().int().min(1).max(8192).optional(),
        requestTimeoutMs: z.number().int().min(1).max(600_000).optional(),
        baseURL: z.string().url().optional(),
      })
      .strict(),
  ])
  .default({ type: 'similarity' });

export const configFileSchema = z
  .object({
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
        format: z.enum(['text', 'json']).optional(),
      })
      .strict()
      .default({}),
    stores: storesSchema,
    resolver: resolverSchema,
    engine: engineConfigSchema.optional(),
    priceList: z
      .object({
        delimiter: z.string().min(1).default(','),
        encoding: encodingSchema.default('utf-8'),
      })
      .strict()
      .default({}),
    output: z
      .object({
        delimiter: z.string().min(1).default(','),
        sanitizeFormulas: z.boolean().default(true),
        formulaEscapePrefix: z.string().default("'"),
        indent: z.number().int().min(0).max(16).default(2),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type StoresConfig = ConfigFile['stores'];
export type ResolverConfig = ConfigFile['resolver'];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read, expand and validate a JSON config file. Relative store paths are
 * resolved against `cwd`.
 *
 * @throws ConfigError
 */
export async function loadConfig(configPath: string, env: Env = process.env, cwd = process.cwd()): Promise<ConfigFile> {
  const absolutePath = resolve(cwd, configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config ${absolutePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    // Windows editors like to write a BOM
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${absolutePath}: ${errorMessage(error)}`);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, env));
  if (!result.success) {
    throw new ConfigError(formatZodIssues('Invalid config', result.error));
  }

  const config = result.data;
  if (config.stores.type === 'file') {
    config.stores = {
      ...config.stores,
      catalogPath: resolve(cwd, config.stores.catalogPath),
      registryPath: resolve(cwd, config.stores.registryPath),
    };
  }
  return config;
}
