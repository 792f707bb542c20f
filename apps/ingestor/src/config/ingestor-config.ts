import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '@grid-stream/domain';

// ─── Schema ───────────────────────────────────────────────────────────────────

const positiveInt = z.coerce.number().int().positive();
const positiveSeconds = z.coerce.number().positive();
const nonEmpty = z.string().trim().min(1);
const logLevel = z.enum(['debug', 'info', 'warn', 'error']);

const configSchema = z
  .object({
    udp: z.object({
      host: nonEmpty,
      port: z.coerce.number().int().min(1).max(65535),
    }),
    dataFormat: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(['binary', 'json']),
    ),
    buffer: z.object({
      maxSize: positiveInt,
      flushIntervalSec: positiveSeconds,
      retryAttempts: z.coerce.number().int().min(0),
      retryDelaySec: positiveSeconds,
      retryMaxDelaySec: positiveSeconds,
      maxPendingBatches: positiveInt,
      writeTimeoutSec: positiveSeconds,
    }),
    storage: z.enum(['influx', 'postgres']),
    influx: z.object({
      url: z.string().url(),
      token: z.string().optional(),
      org: nonEmpty,
      bucket: nonEmpty,
      timeoutMs: positiveInt,
    }),
    postgres: z.object({
      databaseUrl: z.string().optional(),
    }),
    grid: z.object({
      measurementName: nonEmpty,
      dataSourceTag: nonEmpty,
      gridSectionTag: nonEmpty,
    }),
    logLevel: z.preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), logLevel),
    statusPort: z.coerce.number().int().min(0).max(65535),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.storage === 'influx' && !cfg.influx.token) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['influx', 'token'], message: 'INFLUX_TOKEN is required' });
    }
    if (cfg.storage === 'postgres' && !cfg.postgres.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['postgres', 'databaseUrl'],
        message: 'DATABASE_URL is required',
      });
    }
  });

export type IngestorConfig = z.infer<typeof configSchema>;

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULTS = {
  udp: { host: 'localhost', port: 12345 },
  dataFormat: 'binary',
  buffer: {
    maxSize: 100,
    flushIntervalSec: 1.0,
    retryAttempts: 3,
    retryDelaySec: 1.0,
    retryMaxDelaySec: 30,
    maxPendingBatches: 10,
    writeTimeoutSec: 5,
  },
  storage: 'influx',
  influx: {
    url: 'http://localhost:8086',
    org: 'smartgrid-org',
    bucket: 'grid-data',
    timeoutMs: 10_000,
  },
  postgres: {},
  grid: {
    measurementName: 'grid_measurements',
    dataSourceTag: 'simulink',
    gridSectionTag: 'main_bus',
  },
  logLevel: 'info',
  statusPort: 8080,
} as const;

// ─── Loading ──────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

/** Sections of the optional JSON config file, keyed as in the file. */
const fileSchema = z
  .object({
    udp: z.record(z.unknown()),
    data_format: z.string(),
    storage: z.string(),
    influx: z.record(z.unknown()),
    postgres: z.record(z.unknown()),
    buffer: z.record(z.unknown()),
    grid: z.record(z.unknown()),
    logging: z.record(z.unknown()),
    status: z.record(z.unknown()),
  })
  .partial();

type ConfigFile = z.infer<typeof fileSchema>;

export function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}`, [err instanceof Error ? err.message : String(err)]);
  }
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config file ${path}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Drops keys whose value is undefined so they do not shadow lower layers. */
function defined(section: Section): Section {
  return Object.fromEntries(Object.entries(section).filter(([, v]) => v !== undefined));
}

function pick(section: Section | undefined, key: string): unknown {
  return section?.[key];
}

/**
 * Layers defaults, then the JSON file named by `CONFIG_FILE` (if any), then
 * the environment, and validates the result.
 */
export function loadConfig(env: Env = process.env, file?: ConfigFile): IngestorConfig {
  const fromFile = file ?? (env['CONFIG_FILE'] ? readConfigFile(env['CONFIG_FILE']) : {});

  const candidate = {
    udp: {
      ...DEFAULTS.udp,
      ...defined({ host: pick(fromFile.udp, 'host'), port: pick(fromFile.udp, 'port') }),
      ...defined({ host: env['UDP_HOST'], port: env['UDP_PORT'] }),
    },
    dataFormat: env['DATA_FORMAT'] ?? fromFile.data_format ?? DEFAULTS.dataFormat,
    buffer: {
      ...DEFAULTS.buffer,
      ...defined({
        maxSize: pick(fromFile.buffer, 'max_size'),
        flushIntervalSec: pick(fromFile.buffer, 'flush_interval'),
        retryAttempts: pick(fromFile.buffer, 'retry_attempts'),
        retryDelaySec: pick(fromFile.buffer, 'retry_delay'),
        retryMaxDelaySec: pick(fromFile.buffer, 'retry_max_delay'),
        maxPendingBatches: pick(fromFile.buffer, 'max_pending_batches'),
        writeTimeoutSec: pick(fromFile.buffer, 'write_timeout'),
      }),
      ...defined({
        maxSize: env['BUFFER_MAX_SIZE'],
        flushIntervalSec: env['BUFFER_FLUSH_INTERVAL'],
        retryAttempts: env['BUFFER_RETRY_ATTEMPTS'],
        retryDelaySec: env['BUFFER_RETRY_DELAY'],
        retryMaxDelaySec: env['BUFFER_RETRY_MAX_DELAY'],
        maxPendingBatches: env['BUFFER_MAX_PENDING_BATCHES'],
        writeTimeoutSec: env['BUFFER_WRITE_TIMEOUT'],
      }),
    },
    storage: env['STORAGE_BACKEND'] ?? fromFile.storage ?? DEFAULTS.storage,
    influx: {
      ...DEFAULTS.influx,
      ...defined({
        url: pick(fromFile.influx, 'url'),
        token: pick(fromFile.influx, 'token'),
        org: pick(fromFile.influx, 'org'),
        bucket: pick(fromFile.influx, 'bucket'),
        timeoutMs: pick(fromFile.influx, 'timeout'),
      }),
      ...defined({
        url: env['INFLUX_URL'],
        token: env['INFLUX_TOKEN'],
        org: env['INFLUX_ORG'],
        bucket: env['INFLUX_BUCKET'],
        timeoutMs: env['INFLUX_TIMEOUT'],
      }),
    },
    postgres: {
      ...defined({ databaseUrl: pick(fromFile.postgres, 'database_url') }),
      ...defined({ databaseUrl: env['DATABASE_URL'] }),
    },
    grid: {
      ...DEFAULTS.grid,
      ...defined({
        measurementName: pick(fromFile.grid, 'measurement_name'),
        dataSourceTag: pick(fromFile.grid, 'data_source_tag'),
        gridSectionTag: pick(fromFile.grid, 'grid_section_tag'),
      }),
      ...defined({
        measurementName: env['GRID_MEASUREMENT_NAME'],
        dataSourceTag: env['GRID_DATA_SOURCE_TAG'],
        gridSectionTag: env['GRID_SECTION_TAG'],
      }),
    },
    logLevel: env['LOG_LEVEL'] ?? pick(fromFile.logging, 'level') ?? DEFAULTS.logLevel,
    statusPort: env['STATUS_PORT'] ?? pick(fromFile.status, 'port') ?? DEFAULTS.statusPort,
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError('invalid configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Config as logged at startup; the token never leaves the process. */
export function redactConfig(config: IngestorConfig): Record<string, unknown> {
  return {
    ...config,
    influx: { ...config.influx, token: config.influx.token ? '***' : undefined },
    postgres: { databaseUrl: config.postgres.databaseUrl ? '***' : undefined },
  };
}
