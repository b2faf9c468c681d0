import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { resolveEndpoint } from '../../directory.js';
import { ConfigurationError } from '../errors/workflow-errors.js';
import { isNotFound, errorMessage } from '../utils/index.js';
import { debugMain } from '../utils/debug.js';
import { CLOUD_ENVIRONMENTS, CLOUD_ENVIRONMENT_NAMES, type CloudEnvironment } from './environments.js';

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  /** Preset name or directory URL */
  endpoint: z
    .string()
    .default('letsencrypt')
    .transform((value, ctx) => {
      const url = resolveEndpoint(value);
      if (!url) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown ACME endpoint "${value}"` });
        return z.NEVER;
      }
      return url;
    }),
  contacts: z.array(z.string().email()).default([]),
  /** Opaque to the workflow; forwarded to the secret store integration */
  vaultBaseUrl: z.string().url().optional(),
  preferredChain: z.string().min(1).optional(),
  environment: z.enum(CLOUD_ENVIRONMENT_NAMES).default('public'),
  dnsSuffixes: z
    .object({
      appService: z.string().min(1),
      trafficManager: z.string().min(1),
    })
    .optional(),
  renewBeforeExpiryDays: positiveInt.default(30),
  maxRestarts: z.coerce.number().int().min(0).default(2),
  pollIntervalMs: positiveInt.default(5_000),
  pollMaxAttempts: positiveInt.default(60),
  verifyIntervalMs: positiveInt.default(10_000),
  verifyMaxAttempts: positiveInt.default(30),
  runDeadlineMs: positiveInt.optional(),
  checkpointDir: z.string().min(1).default('.sitecert'),
  webhookUrl: z.string().url().optional(),
  controlPlane: z
    .object({
      /** Overrides the environment's resource manager URL */
      baseUrl: z.string().url().optional(),
      subscriptionId: z.string().min(1),
      token: z.string().min(1),
    })
    .optional(),
});

type ParsedConfig = z.output<typeof configSchema>;

export interface SitecertConfig extends Omit<ParsedConfig, 'dnsSuffixes'> {
  cloud: CloudEnvironment;
  /** Platform suffixes; host names under them are skipped */
  dnsSuffixes: { appService: string; trafficManager: string };
}

export interface LoadConfigOptions {
  /** JSON file; required to exist when given */
  file?: string;
  env?: NodeJS.ProcessEnv;
}

type Mapping = { key: keyof ParsedConfig; parse?: (raw: string) => unknown };

const splitList = (raw: string) =>
  raw
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);

const ENV_MAPPING: Readonly<Record<string, Mapping>> = {
  SITECERT_ENDPOINT: { key: 'endpoint' },
  SITECERT_CONTACTS: { key: 'contacts', parse: splitList },
  SITECERT_VAULT_BASE_URL: { key: 'vaultBaseUrl' },
  SITECERT_PREFERRED_CHAIN: { key: 'preferredChain' },
  SITECERT_ENVIRONMENT: { key: 'environment' },
  SITECERT_RENEW_BEFORE_EXPIRY_DAYS: { key: 'renewBeforeExpiryDays' },
  SITECERT_MAX_RESTARTS: { key: 'maxRestarts' },
  SITECERT_POLL_INTERVAL_MS: { key: 'pollIntervalMs' },
  SITECERT_POLL_MAX_ATTEMPTS: { key: 'pollMaxAttempts' },
  SITECERT_VERIFY_INTERVAL_MS: { key: 'verifyIntervalMs' },
  SITECERT_VERIFY_MAX_ATTEMPTS: { key: 'verifyMaxAttempts' },
  SITECERT_RUN_DEADLINE_MS: { key: 'runDeadlineMs' },
  SITECERT_CHECKPOINT_DIR: { key: 'checkpointDir' },
  SITECERT_WEBHOOK_URL: { key: 'webhookUrl' },
};

const CONTROL_PLANE_ENV: Readonly<Record<string, string>> = {
  SITECERT_RESOURCE_MANAGER_URL: 'baseUrl',
  SITECERT_SUBSCRIPTION_ID: 'subscriptionId',
  SITECERT_ACCESS_TOKEN: 'token',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new ConfigurationError([`config file ${file} does not exist`]);
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError([`config file ${file} is not valid JSON: ${errorMessage(err)}`]);
  }

  if (!isRecord(data)) {
    throw new ConfigurationError([`config file ${file} must contain a JSON object`]);
  }
  return data;
}

/** `SITECERT_*` variables as a partial config object; empty values are ignored */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const controlPlane: Record<string, unknown> = {};

  for (const [name, raw] of Object.entries(env)) {
    if (raw === undefined || raw.trim() === '') continue;

    const mapping = ENV_MAPPING[name];
    if (mapping) {
      result[mapping.key] = mapping.parse ? mapping.parse(raw) : raw.trim();
      continue;
    }

    const cpKey = CONTROL_PLANE_ENV[name];
    if (cpKey) {
      controlPlane[cpKey] = raw.trim();
    }
  }

  if (Object.keys(controlPlane).length > 0) {
    result['controlPlane'] = controlPlane;
  }
  return result;
}

/**
 * Validate a raw config object and fill in defaults and environment-derived
 * values. Throws ConfigurationError listing every issue.
 */
export function parseConfig(input: unknown): SitecertConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }

  const { dnsSuffixes, ...rest } = parsed.data;
  const cloud = CLOUD_ENVIRONMENTS[rest.environment];
  return {
    ...rest,
    cloud,
    dnsSuffixes: dnsSuffixes ?? { appService: cloud.appService, trafficManager: cloud.trafficManager },
  };
}

/**
 * JSON file (optional) overlaid by `SITECERT_*` environment variables
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<SitecertConfig> {
  const fromFile = opts.file ? await readConfigFile(opts.file) : {};
  const fromEnv = configFromEnv(opts.env ?? process.env);

  const merged: Record<string, unknown> = { ...fromFile, ...fromEnv };
  const fileControlPlane = fromFile['controlPlane'];
  const envControlPlane = fromEnv['controlPlane'];
  if (isRecord(fileControlPlane) && isRecord(envControlPlane)) {
    merged['controlPlane'] = { ...fileControlPlane, ...envControlPlane };
  }

  const config = parseConfig(merged);
  debugMain('config loaded: endpoint=%s environment=%s', config.endpoint, config.environment);
  return config;
}

/** Resource manager base URL, honoring the control-plane override */
export function resourceManagerUrl(config: SitecertConfig): string {
  return config.controlPlane?.baseUrl ?? config.cloud.resourceManager;
}
