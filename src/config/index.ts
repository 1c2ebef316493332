import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Return empty string if no value and no default
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => processEnvVars(item, env));
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

export const DEFAULT_UPSTREAM_URL = 'http://host.docker.internal:11434';
export const DEFAULT_MODEL = 'llama3:8b';

const GatewaySchema = z.object({
  listen_host: z.string().min(1).default('0.0.0.0'),
  // 0 lets the OS pick a free port
  listen_port: z.number().int().min(0).max(65535).default(5000),
  body_limit: z.number().int().positive().default(1048576),
  // '*' allows every origin, an empty string disables CORS
  cors_origin: z.string().default('*'),
});

const UpstreamSchema = z.object({
  url: z.string().url().default(DEFAULT_UPSTREAM_URL),
  probe_timeout_ms: z.number().int().positive().default(5000),
  request_timeout_ms: z.number().int().positive().default(120000),
  pull_timeout_ms: z.number().int().positive().default(1800000),
  pull_models: z.boolean().default(true),
});

// Warm-up policy: fixed delay between attempts, not exponential
const StartupSchema = z.object({
  max_attempts: z.number().int().positive().default(10),
  retry_delay_ms: z.number().int().nonnegative().default(2000),
});

const ModelsSchema = z
  .object({
    default: z.string().min(1).default(DEFAULT_MODEL),
    allowed: z.array(z.string().min(1)).min(1).default([DEFAULT_MODEL]),
  })
  .refine((models) => models.allowed.includes(models.default), {
    message: 'models.default must be one of models.allowed',
  });

const ConfigSchema = z.object({
  gateway: GatewaySchema.default({}),
  upstream: UpstreamSchema.default({}),
  startup: StartupSchema.default({}),
  models: ModelsSchema.default({}),
  auth: z
    .object({
      // Raw JSON array of {"appname", "key"} objects, parsed by the credential store
      api_keys: z.string().optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['json', 'pretty']).default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

type Section = Record<string, unknown>;
export type RawConfig = Partial<Record<keyof ConfigInput, Section>>;

function isSection(value: unknown): value is Section {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Read the optional YAML configuration file.
 * A missing file yields an empty object so that defaults and environment apply.
 */
export function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  const processed = processEnvVars(parseYaml(content), env);
  if (processed === null || processed === undefined) {
    return {};
  }
  if (!isSection(processed)) {
    throw new Error(`Configuration file ${configPath} must contain a mapping`);
  }

  const raw: RawConfig = {};
  for (const key of ['gateway', 'upstream', 'startup', 'models', 'auth', 'logging'] as const) {
    const section = processed[key];
    if (isSection(section)) {
      raw[key] = section;
    } else if (section !== undefined) {
      throw new Error(`Configuration section "${key}" must be a mapping`);
    }
  }
  return raw;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

function envBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function compact(section: Section): Section {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Collect overrides from the environment. Only variables that are set appear in the result.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  return {
    gateway: compact({
      listen_host: env.GATEWAY_HOST || undefined,
      listen_port: envInt(env, 'GATEWAY_PORT'),
      cors_origin: env.CORS_ORIGIN,
    }),
    upstream: compact({
      url: env.OLLAMA_URL || undefined,
      probe_timeout_ms: envInt(env, 'UPSTREAM_PROBE_TIMEOUT_MS'),
      request_timeout_ms: envInt(env, 'UPSTREAM_REQUEST_TIMEOUT_MS'),
      pull_models: envBool(env, 'PULL_MODELS'),
    }),
    startup: compact({
      max_attempts: envInt(env, 'STARTUP_MAX_ATTEMPTS'),
      retry_delay_ms: envInt(env, 'STARTUP_RETRY_DELAY_MS'),
    }),
    models: compact({
      default: env.DEFAULT_MODEL || undefined,
    }),
    auth: compact({
      api_keys: env.API_KEYS,
    }),
    logging: compact({
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
    }),
  };
}

/**
 * Merge file and environment (env overrides file), validate, and freeze the result.
 * Throws a ZodError when a value is out of range.
 */
export function resolveConfig(file: RawConfig, envOverrides: RawConfig): Readonly<Config> {
  const merged: Record<string, Section> = {};
  for (const key of ['gateway', 'upstream', 'startup', 'models', 'auth', 'logging'] as const) {
    merged[key] = { ...file[key], ...envOverrides[key] };
  }
  return deepFreeze(ConfigSchema.parse(merged));
}

export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  return resolveConfig(loadConfigFile(configPath, env), loadConfigFromEnv(env));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
