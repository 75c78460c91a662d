import { StipulateConfigSchema, type StipulateConfig, type StipulateConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';

export type Env = Record<string, string | undefined>;

const TRUTHY_TOKENS = new Set(['1', 'true', 'yes']);

/**
 * Interpret an environment flag. Only `1`, `true` and `yes` (any case) switch it on;
 * anything else, including an unset variable, reads as off.
 */
export function parseFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  return TRUTHY_TOKENS.has(value.trim().toLowerCase());
}

/**
 * Load configuration, merged in order: defaults <- env vars <- overrides
 */
export function loadConfig(env: Env = process.env, overrides?: StipulateConfigInput): StipulateConfig {
  let raw = applyEnvVars({}, env);

  if (overrides) {
    raw = {
      verification: { ...raw.verification, ...overrides.verification },
      logging: { ...raw.logging, ...overrides.logging },
    };
  }

  const parsed = StipulateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`, toError(parsed.error));
  }
  return parsed.data;
}

/**
 * The toggle default only. Never throws, so a malformed unrelated variable
 * cannot break module load.
 */
export function readVerificationDefault(env: Env = process.env): boolean {
  return parseFlag(env.CONTRACTS_ENABLED);
}

interface RawConfig {
  verification: Record<string, unknown>;
  logging: Record<string, unknown>;
}

function applyEnvVars(raw: Partial<RawConfig>, env: Env): RawConfig {
  const verification = { ...raw.verification };
  const logging = { ...raw.logging };

  verification.enabled = parseFlag(env.CONTRACTS_ENABLED);

  if (env.CONTRACTS_LOG_LEVEL) {
    logging.level = env.CONTRACTS_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.CONTRACTS_LOG_PRETTY !== undefined) {
    logging.pretty = parseFlag(env.CONTRACTS_LOG_PRETTY);
  }

  return { verification, logging };
}
