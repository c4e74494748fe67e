import { readFileSync } from 'fs';
import { z, ZodError } from 'zod';
import { ConfigurationError, toError } from '../utils/errors.js';
import {
  MODEM_MODELS,
  MODEM_MODEL_NAMES,
  ModemModelProfileSchema,
  type ModemModelProfile,
} from '../types/modem-models.js';

export const ConfigSchema = z.object({
  modem: z.object({
    host: z.string().min(1).default('192.168.100.1'),
    username: z.string().min(1).default('admin'),
    password: z.string({ required_error: 'MODEM_PASSWORD is required' }),
    model: z.enum(MODEM_MODEL_NAMES).default('sb8200'),
    profilePath: z.string().optional(),
    verifyTls: z.boolean().default(false),
    requestTimeoutMs: z.number().int().positive().default(10000),
  }),
  web: z.object({
    listenAddress: z.string().default(':9143'),
    telemetryPath: z.string().startsWith('/').default('/metrics'),
  }),
  metrics: z.object({
    namespace: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default('sb8200'),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value === 'true' || value === '1';
}

function describeIssues(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export function loadConfigFromEnv(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse({
    modem: {
      host: env['MODEM_HOST'],
      username: env['MODEM_USER'],
      password: env['MODEM_PASSWORD'],
      model: env['MODEM_MODEL'],
      profilePath: env['MODEM_PROFILE_PATH'],
      verifyTls: parseBoolEnv(env['MODEM_VERIFY_TLS']),
      requestTimeoutMs: parseIntEnv(env['MODEM_REQUEST_TIMEOUT_MS']),
    },
    web: {
      listenAddress: env['WEB_LISTEN_ADDRESS'],
      telemetryPath: env['WEB_TELEMETRY_PATH'],
    },
    metrics: {
      namespace: env['METRICS_NAMESPACE'],
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  });

  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** The built-in profile for the model, or one read from a JSON file for another firmware variant. */
export function resolveModelProfile(modem: Config['modem']): ModemModelProfile {
  if (!modem.profilePath) {
    return MODEM_MODELS[modem.model];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(modem.profilePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read modem profile ${modem.profilePath}`, {
      cause: toError(err),
      context: { profilePath: modem.profilePath },
    });
  }

  const result = ModemModelProfileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid modem profile ${modem.profilePath}: ${describeIssues(result.error)}`, {
      cause: result.error,
      context: { profilePath: modem.profilePath },
    });
  }
  return result.data;
}

export interface ListenAddress {
  host?: string | undefined;
  port: number;
}

/** `":9143"`, `"0.0.0.0:9143"` or `"[::1]:9143"`. */
export function parseListenAddress(address: string): ListenAddress {
  const sep = address.lastIndexOf(':');
  if (sep === -1) {
    throw new ConfigurationError(`Listen address "${address}" has no port`);
  }

  const portText = address.slice(sep + 1);
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new ConfigurationError(`Invalid port in listen address "${address}"`);
  }

  const host = address.slice(0, sep).replace(/^\[(.*)\]$/, '$1');
  return { host: host === '' ? undefined : host, port };
}
