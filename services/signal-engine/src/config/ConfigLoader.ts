/**
 * Configuration Loader for the Signal Engine
 *
 * Sources are merged in order: schema defaults, JSON file, environment
 * variables, explicit overrides. The result is validated once and frozen;
 * an invalid configuration is fatal at startup.
 */

import { existsSync, readFileSync } from 'fs';
import { ZodError } from 'zod';

import { EngineConfig, EngineConfigInput, EngineConfigSchema } from './schema';

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(`Configuration validation error: ${message} (field: ${field}, value: ${JSON.stringify(value)})`);
    this.name = 'ConfigValidationError';
  }
}

type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAtPath(source: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = source;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isPlainObject(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

function toValidationError(error: ZodError, raw: unknown): ConfigValidationError {
  const [issue] = error.issues;
  const field = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  const summary = error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
  return new ConfigValidationError(summary, field, valueAtPath(raw, issue.path));
}

/**
 * Deep merge of plain objects; arrays and scalars from the source replace the target's
 */
export function mergeConfig(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? mergeConfig(targetValue, sourceValue)
        : sourceValue;
  }
  return result;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Load configuration from a JSON file
 */
export function loadConfigFromFile(filePath: string): RawConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Configuration file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in configuration file: ${filePath}`);
    }
    throw error;
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigValidationError('configuration file must contain a JSON object', '<root>', parsed);
  }
  return parsed;
}

function numberFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigValidationError('expected a number', name, raw);
  }
  return value;
}

/**
 * Load configuration from environment variables. Only variables that are set
 * appear in the result.
 */
export function loadConfigFromEnvironment(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const sections: Record<string, RawConfig> = {
    emission: {
      cooldownSec: numberFromEnv(env, 'SIGNAL_COOLDOWN_SEC'),
      valueChangeThreshold: numberFromEnv(env, 'SIGNAL_VALUE_THRESHOLD'),
      staleRecordMaxAgeSec: numberFromEnv(env, 'SIGNAL_STALE_RECORD_MAX_AGE_SEC'),
    },
    confirmation: {
      minScore: numberFromEnv(env, 'MIN_CONFIRMATION_SCORE'),
      minScoreWithTechnical: numberFromEnv(env, 'MIN_CONFIRMATION_WITH_TECH'),
    },
    statWindow: {
      minSamples: numberFromEnv(env, 'STAT_MIN_SAMPLES'),
    },
    guardrails: {
      minLiquidityUsd: numberFromEnv(env, 'GUARDRAIL_MIN_LIQUIDITY_USD'),
      crashDropPct: numberFromEnv(env, 'GUARDRAIL_CRASH_DROP_PCT'),
    },
  };

  const config: RawConfig = {};
  for (const [section, values] of Object.entries(sections)) {
    const present = Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
    if (Object.keys(present).length > 0) {
      config[section] = present;
    }
  }
  return config;
}

/**
 * Validate raw configuration and freeze the result
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, input);
  }
  return deepFreeze(result.data);
}

export interface LoadEngineConfigOptions {
  /** JSON file; falls back to SIGNAL_ENGINE_CONFIG when omitted */
  filePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
}

/**
 * Load, merge and validate the engine configuration
 */
export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const filePath = options.filePath ?? env.SIGNAL_ENGINE_CONFIG;

  let merged: RawConfig = {};
  if (filePath) {
    merged = mergeConfig(merged, loadConfigFromFile(filePath));
  }
  merged = mergeConfig(merged, loadConfigFromEnvironment(env));
  if (options.overrides) {
    merged = mergeConfig(merged, options.overrides);
  }

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw toValidationError(result.error, merged);
  }
  return deepFreeze(result.data);
}
