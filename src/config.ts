/**
 * Client configuration
 *
 * Resolved from, in increasing precedence: a JSON config file, `ICINGA_API_*`
 * environment variables and explicit options.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { jsonObjectSchema } from "./types/json.js";

export const DEFAULT_URL = "https://localhost:5665";
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Named attribute set merged into new objects
 */
const objectDefaultsSchema = z.object({
  templates: z.array(z.string().min(1)).optional(),
  attrs: jsonObjectSchema.optional(),
});

export const clientConfigSchema = z.object({
  /** API base URL, e.g. https://icinga.example.com:5665 */
  url: z.string().url().default(DEFAULT_URL),
  /** API user for HTTP basic authentication */
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  /** Path to the client certificate (PEM); may also contain the key */
  certificate: z.string().min(1).optional(),
  /** Path to the client private key (PEM) */
  key: z.string().min(1).optional(),
  /** Path to the CA certificate used to verify the server */
  caCertificate: z.string().min(1).optional(),
  /** Skip verification of the server certificate */
  insecure: z.boolean().default(false),
  /** Request timeout in ms */
  timeout: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  newHostDefaults: objectDefaultsSchema.optional(),
  newServiceDefaults: objectDefaultsSchema.optional(),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfig = z.output<typeof clientConfigSchema>;

/**
 * Validate a config object, naming the first offending field
 */
export function resolveConfig(input: ClientConfigInput): ClientConfig {
  const parsed = clientConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(`Invalid configuration: ${field}: ${issue.message}`, {
      field,
    });
  }

  const config = parsed.data;
  const hasBasicAuth = Boolean(config.username && config.password);
  if (!hasBasicAuth && !config.certificate) {
    throw new ValidationError(
      "Neither username/password nor a client certificate is configured",
      { field: "credentials" }
    );
  }

  return { ...config, url: config.url.replace(/\/+$/, "") };
}

/**
 * Read configuration from `ICINGA_API_*` environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfigInput {
  const config: ClientConfigInput = {};

  if (env.ICINGA_API_URL) config.url = env.ICINGA_API_URL;
  if (env.ICINGA_API_USER) config.username = env.ICINGA_API_USER;
  if (env.ICINGA_API_PASSWORD) config.password = env.ICINGA_API_PASSWORD;
  if (env.ICINGA_API_CERT) config.certificate = env.ICINGA_API_CERT;
  if (env.ICINGA_API_KEY) config.key = env.ICINGA_API_KEY;
  if (env.ICINGA_API_CA) config.caCertificate = env.ICINGA_API_CA;
  if (env.ICINGA_API_TIMEOUT) {
    const timeout = Number(env.ICINGA_API_TIMEOUT);
    if (!Number.isFinite(timeout)) {
      throw new ValidationError(
        `ICINGA_API_TIMEOUT must be a number, got "${env.ICINGA_API_TIMEOUT}"`,
        { field: "timeout" }
      );
    }
    config.timeout = timeout;
  }
  if (env.ICINGA_API_INSECURE) {
    config.insecure = ["1", "true", "yes"].includes(env.ICINGA_API_INSECURE.toLowerCase());
  }

  return config;
}

/**
 * Read a JSON config file. Relative certificate paths are kept as given.
 */
export function configFromFile(path: string): ClientConfigInput {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (error) {
    throw new ValidationError(`Cannot read config file ${path}`, {
      field: "config",
      cause: error instanceof Error ? error : undefined,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Config file ${path} is not valid JSON`, {
      field: "config",
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = clientConfigSchema.partial().safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ValidationError(`Invalid config file ${path}: ${field}: ${issue.message}`, {
      field,
    });
  }

  return parsed.data;
}

/**
 * Merge config sources; later sources win for every key they define
 */
export function mergeConfig(...sources: ClientConfigInput[]): ClientConfigInput {
  const merged: ClientConfigInput = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Load configuration from the config file named by `ICINGA_API_CONFIG` (if any),
 * the environment and the given overrides
 */
export function loadConfig(
  overrides: ClientConfigInput = {},
  options: { configFile?: string; env?: NodeJS.ProcessEnv } = {}
): ClientConfig {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env.ICINGA_API_CONFIG;
  const fileConfig = configFile ? configFromFile(configFile) : {};
  return resolveConfig(mergeConfig(fileConfig, configFromEnv(env), overrides));
}
