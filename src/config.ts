/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';
import { CALENDAR_WRITE_CAPABILITIES } from './domains/calendar/runtime/capabilities.js';
import { createLogger } from './utils/observability/index.js';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional values
// ---------------------------------------------------------------------------

/** Problems found while reading env vars, reported by validateConfig. */
const parseErrors: string[] = [];

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional comma-separated list env var with a default. */
function optionalList(key: string, defaultValue: string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Read an env var restricted to a fixed set of values. */
function oneOf<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    parseErrors.push(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`);
    return defaultValue;
  }
  return match;
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Model used for every turn */
  models: {
    agent: optional('AGENT_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    maxTokens: optionalInt('AGENT_MAX_TOKENS', 4096),
  },

  /** Cal.com v2 API */
  cal: {
    apiKey: required('CAL_API_KEY'),
    baseUrl: optional('CAL_API_BASE_URL', 'https://api.cal.com/v2'),
    timezone: optional('CAL_DEFAULT_TIMEZONE', Intl.DateTimeFormat().resolvedOptions().timeZone),
  },

  /** Turn controller limits */
  turn: {
    maxRoundTrips: optionalInt('MAX_ROUND_TRIPS', 10),
  },

  /** Human approval policy */
  approval: {
    timeoutMs: optionalInt('APPROVAL_TIMEOUT_MS', 300000),
    confirmCapabilities: optionalList('CONFIRM_CAPABILITIES', [...CALENDAR_WRITE_CAPABILITIES]),
    defaultPolicy: oneOf('DEFAULT_APPROVAL_POLICY', ['auto', 'require_confirmation'], 'auto'),
  },

  /** Checkpoint storage configuration */
  checkpoint: {
    provider: oneOf('CHECKPOINT_STORE_PROVIDER', ['sqlite', 'memory'], 'sqlite'),
    sqlitePath: dbPath('CHECKPOINT_DB_PATH', '/app/data/checkpoints.db', './data/checkpoints.db'),
    leaseTtlMs: optionalInt('THREAD_LEASE_TTL_MS', 300000),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [...parseErrors];

  // Required API keys
  if (!config.anthropicApiKey) errors.push('ANTHROPIC_API_KEY is required');
  if (!config.cal.apiKey) errors.push('CAL_API_KEY is required');

  // Numeric bounds
  if (!(config.port >= 1 && config.port <= 65535)) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!(config.turn.maxRoundTrips >= 1)) {
    errors.push(`MAX_ROUND_TRIPS must be >= 1, got ${config.turn.maxRoundTrips}`);
  }
  if (!(config.approval.timeoutMs >= 1000)) {
    errors.push(`APPROVAL_TIMEOUT_MS must be >= 1000, got ${config.approval.timeoutMs}`);
  }
  if (!(config.checkpoint.leaseTtlMs >= 1000)) {
    errors.push(`THREAD_LEASE_TTL_MS must be >= 1000, got ${config.checkpoint.leaseTtlMs}`);
  }
  if (!(config.models.maxTokens >= 1)) {
    errors.push(`AGENT_MAX_TOKENS must be >= 1, got ${config.models.maxTokens}`);
  }

  if (errors.length > 0) {
    createLogger({ domain: 'config' }).error('config_validation_failed', { errors });
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
