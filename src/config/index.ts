import { z } from 'zod';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { AuthOptions } from '../auth/types.js';
import type { ReaderOptions } from '../reader/types.js';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_, varName: string, defaultValue?: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    return '';
  });
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

// Interpolated values arrive as strings; numeric fields accept both forms (hex ids included)
const NumberLike = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());
const UsbId = NumberLike.pipe(z.number().int().min(0).max(0xffff));
const PositiveInt = NumberLike.pipe(z.number().int().positive());

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['json', 'pretty']);

const ReaderConfigSchema = z.object({
  vendor_id: UsbId.default(0x25dd),
  product_id: UsbId.default(0x3000),
  // substring match against the HID product string when the ids don't match
  known_names: z.array(z.string().min(1)).default(['TS-HRW']),
  read_timeout_ms: PositiveInt.default(100),
  retry_delay_ms: NumberLike.pipe(z.number().int().min(0)).default(100),
  max_consecutive_errors: PositiveInt.default(3),
  join_timeout_ms: PositiveInt.default(2000),
  queue_capacity: PositiveInt.default(10),
  duplicate_window_ms: NumberLike.pipe(z.number().int().min(0)).default(2000),
  min_token_length: PositiveInt.default(6),
  auto_connect: z.boolean().default(true),
});

const AuthConfigSchema = z.object({
  max_attempts: PositiveInt.default(5),
  lockout_minutes: PositiveInt.default(15),
  session_timeout_minutes: PositiveInt.default(60),
});

const ConfigSchema = z.object({
  reader: ReaderConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  storage: z
    .object({
      path: z.string().default('./data/kiosk.db'),
      seed_file: z.string().optional(),
    })
    .default({}),
  station: z
    .object({
      name: z.string().min(1).default('Wareneingang'),
    })
    .default({}),
  server: z
    .object({
      listen_port: NumberLike.pipe(z.number().int().min(0).max(65535)).default(8080),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      format: LogFormatSchema.default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ReaderConfig = Config['reader'];
export type AuthConfig = Config['auth'];
export type LoggingConfig = Config['logging'];

export type ConfigOverrides = { [K in keyof Config]?: Partial<Config[K]> };

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(processEnvVars(raw ?? {}));
}

export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    return parseConfig(parseYaml(content));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return parseConfig({});
    }
    throw error;
  }
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

function envBoolean(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === 'true' || raw === '1';
}

function set<T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Overrides from environment variables. Only variables that are actually set
 * show up, so they never mask values from the config file.
 */
export function loadConfigFromEnv(): ConfigOverrides {
  const reader: Partial<ReaderConfig> = {};
  set(reader, 'vendor_id', envNumber('READER_VENDOR_ID'));
  set(reader, 'product_id', envNumber('READER_PRODUCT_ID'));
  set(
    reader,
    'known_names',
    envString('READER_KNOWN_NAMES')
      ?.split(',')
      .map((name) => name.trim())
      .filter(Boolean)
  );
  set(reader, 'read_timeout_ms', envNumber('READER_READ_TIMEOUT_MS'));
  set(reader, 'queue_capacity', envNumber('READER_QUEUE_CAPACITY'));
  set(reader, 'duplicate_window_ms', envNumber('READER_DUPLICATE_WINDOW_MS'));
  set(reader, 'auto_connect', envBoolean('READER_AUTO_CONNECT'));

  const auth: Partial<AuthConfig> = {};
  set(auth, 'max_attempts', envNumber('AUTH_MAX_ATTEMPTS'));
  set(auth, 'lockout_minutes', envNumber('AUTH_LOCKOUT_MINUTES'));
  set(auth, 'session_timeout_minutes', envNumber('AUTH_SESSION_TIMEOUT_MINUTES'));

  const storage: Partial<Config['storage']> = {};
  set(storage, 'path', envString('DATABASE_PATH'));
  set(storage, 'seed_file', envString('EMPLOYEE_SEED_FILE'));

  const station: Partial<Config['station']> = {};
  set(station, 'name', envString('STATION_NAME'));

  const server: Partial<Config['server']> = {};
  set(server, 'listen_port', envNumber('KIOSK_PORT'));
  set(server, 'host', envString('KIOSK_HOST'));

  const logging: Partial<LoggingConfig> = {};
  const level = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
  if (level.success) logging.level = level.data;
  const format = LogFormatSchema.safeParse(process.env.LOG_FORMAT);
  if (format.success) logging.format = format.data;

  return { reader, auth, storage, station, server, logging };
}

/**
 * Section-wise merge, env wins. The result is validated again so env values
 * obey the same bounds as file values.
 */
export function mergeConfig(fileConfig: Config, overrides: ConfigOverrides): Config {
  return ConfigSchema.parse({
    reader: { ...fileConfig.reader, ...overrides.reader },
    auth: { ...fileConfig.auth, ...overrides.auth },
    storage: { ...fileConfig.storage, ...overrides.storage },
    station: { ...fileConfig.station, ...overrides.station },
    server: { ...fileConfig.server, ...overrides.server },
    logging: { ...fileConfig.logging, ...overrides.logging },
  });
}

export function toReaderOptions(reader: ReaderConfig): ReaderOptions {
  return {
    vendorId: reader.vendor_id,
    productId: reader.product_id,
    knownNames: reader.known_names,
    readTimeoutMs: reader.read_timeout_ms,
    retryDelayMs: reader.retry_delay_ms,
    maxConsecutiveErrors: reader.max_consecutive_errors,
    joinTimeoutMs: reader.join_timeout_ms,
    queueCapacity: reader.queue_capacity,
    duplicateWindowMs: reader.duplicate_window_ms,
    minTokenLength: reader.min_token_length,
  };
}

export function toAuthOptions(auth: AuthConfig): AuthOptions {
  return {
    maxAttempts: auth.max_attempts,
    lockoutWindowMs: auth.lockout_minutes * 60 * 1000,
    sessionTimeoutMs: auth.session_timeout_minutes * 60 * 1000,
  };
}
