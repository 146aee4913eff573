import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { ParleyConfig, Secrets } from './config.js';
import { mergeConfig } from './config-defaults.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { deepFreeze, isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['server', 'auth', 'models', 'agent', 'tools', 'storage'] as const;

/** All valid top-level keys (required + optional). */
const VALID_TOP_LEVEL_KEYS = new Set<string>([...REQUIRED_SECTIONS, 'logging']);

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: Readonly<ParleyConfig>;
}

/**
 * Parse and validate a JSON5 config string, apply `PARLEY_*` overrides from
 * `env`, fill defaults and freeze the result.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfig(
  json5String: string,
  env: Record<string, string | undefined> = {},
): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    } else if (!isRecord(parsed[section])) {
      errors.push({ path: section, message: `Section "${section}" must be an object` });
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  applyEnvOverrides(parsed, env);
  const config = mergeConfig(parsed as Parameters<typeof mergeConfig>[0]);
  errors.push(...checkValues(config));

  return {
    valid: errors.length === 0,
    errors,
    config: errors.length === 0 ? deepFreeze(config) : undefined,
  };
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content, env);
}

/** Read the secrets named by `apiKeyEnv` fields. Missing variables are left undefined. */
export function resolveSecrets(
  config: ParleyConfig,
  env: Record<string, string | undefined> = process.env,
): Readonly<Secrets> {
  const modelApiKeys: Record<string, string> = {};
  for (const ref of [config.models.primary, ...config.models.fallbacks]) {
    const key = env[ref.apiKeyEnv];
    if (key) modelApiKeys[ref.apiKeyEnv] = key;
  }

  return deepFreeze({
    authApiKey: env[config.auth.apiKeyEnv] || undefined,
    webSearchApiKey: env[config.tools.webSearch.apiKeyEnv] || undefined,
    modelApiKeys,
  });
}

function checkValues(config: ParleyConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  const positive: Array<[string, unknown]> = [
    ['server.maxBodyBytes', config.server.maxBodyBytes],
    ['server.heartbeatMs', config.server.heartbeatMs],
    ['auth.timeoutMs', config.auth.timeoutMs],
    ['models.maxTokens', config.models.maxTokens],
    ['agent.maxIterations', config.agent.maxIterations],
    ['agent.toolTimeoutMs', config.agent.toolTimeoutMs],
    ['agent.turnTimeoutMs', config.agent.turnTimeoutMs],
    ['agent.maxToolOutputChars', config.agent.maxToolOutputChars],
    ['agent.maxHistoryExchanges', config.agent.maxHistoryExchanges],
  ];
  if (config.tools.remote) {
    positive.push(
      ['tools.remote.discoveryTimeoutMs', config.tools.remote.discoveryTimeoutMs],
      ['tools.remote.circuitBreaker.failureThreshold', config.tools.remote.circuitBreaker.failureThreshold],
    );
  }
  for (const [path, value] of positive) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      errors.push({ path, message: `"${path}" must be a positive integer` });
    }
  }

  const port = config.server.port;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65_535) {
    errors.push({ path: 'server.port', message: '"server.port" must be an integer between 0 and 65535' });
  }

  if (!Array.isArray(config.server.corsOrigins)) {
    errors.push({ path: 'server.corsOrigins', message: '"server.corsOrigins" must be an array' });
  }

  if (!LOG_LEVELS.has(config.logging.level)) {
    errors.push({ path: 'logging.level', message: `Unknown log level: "${String(config.logging.level)}"` });
  }

  for (const [path, url] of [
    ['auth.url', config.auth.url],
    ['tools.webSearch.endpoint', config.tools.webSearch.endpoint],
    ['tools.remote.url', config.tools.remote?.url],
  ] as const) {
    if (url === undefined && path === 'tools.remote.url') continue;
    if (typeof url !== 'string' || !URL.canParse(url)) {
      errors.push({ path, message: `"${path}" must be an absolute URL` });
    }
  }

  if (config.tools.remote && !config.tools.remote.name) {
    errors.push({ path: 'tools.remote.name', message: '"tools.remote.name" is required' });
  }

  return errors;
}
