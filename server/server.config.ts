/**
 * Server Config
 *
 * Validated settings for createRouteServer(). Accepts an object in code or a
 * JSON file on disk; both go through the same schema, so unknown keys and
 * wrongly typed values fail at startup with every offending key listed.
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_MAX_BODY_SIZE } from '../src/dispatch/dispatcher.ts';
import { DEFAULT_HANDLER_FILE_NAME } from '../src/route/route.compiler.ts';
import { DEFAULT_DRAIN_TIMEOUT_MS } from './server.loop.ts';

export const DEFAULT_ROUTES_DIR = './api';

export const serverConfigSchema = z
  .object({
    /** Directory mirrored onto URL paths. Relative to the cwd, or to the config file when loaded from disk. */
    routesDir: z.string().min(1).default(DEFAULT_ROUTES_DIR),
    /** Base name of the per-directory handler file. */
    handlerFileName: z
      .string()
      .regex(/^[\w-]+$/, 'must be a bare file name without extension')
      .default(DEFAULT_HANDLER_FILE_NAME),
    maxBodySize: z.number().int().positive().default(DEFAULT_MAX_BODY_SIZE),
    handlerTimeoutMs: z.number().int().positive().optional(),
    drainTimeoutMs: z.number().int().nonnegative().default(DEFAULT_DRAIN_TIMEOUT_MS),
    verboseErrors: z.boolean().default(false),
    /** Sent as the Server header. */
    serverName: z.string().min(1).optional(),
  })
  .strict();

export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Validate a config object and apply defaults. */
export function parseConfig(input: unknown, origin = 'config'): ServerConfig {
  const parsed = serverConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return key ? `"${key}" ${issue.message}` : issue.message;
    });
    throw new ConfigError(`Invalid ${origin}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Load a JSON config file. A relative `routesDir` is resolved against the
 * directory holding the file.
 */
export async function loadConfig(path: string): Promise<ServerConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, [], { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, [], { cause: error });
  }

  const config = parseConfig(json, `config file ${path}`);
  if (!isAbsolute(config.routesDir)) {
    config.routesDir = resolve(dirname(resolve(path)), config.routesDir);
  }
  return config;
}
