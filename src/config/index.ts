/**
 * Matchflow — Configuration
 *
 * Loads config.json, validates it with zod and fills defaults. Every key is
 * optional; a missing file yields the defaults.
 */

import 'dotenv/config';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { BlockRuleSchema, DedupMethodSchema } from '../types';
import type { BlockRule, BlockRuleType } from '../types';
import { ConfigError, errorMessage } from '../lib/errors';
import { logger, setLogLevel } from '../lib/logger';
import { writeFileAtomic } from '../lib/atomic-write';

// ============================================================
// SCHEMA
// ============================================================

export const ProviderSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  max_results: z.number().int().positive().default(50),
  priority: z.number().int().default(100),
});
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

const EvaluationSettingsSchema = z.object({
  score_threshold: z.number().min(0).max(1).default(0.7),
  batch_size: z.number().int().positive().default(10),
  criteria: z.string().min(1).default('Evaluate items for quality and relevance'),
});

const DeduplicationSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  method: DedupMethodSchema.default('url'),
  similarity_threshold: z.number().min(0).max(1).default(0.85),
});

const LlmSettingsSchema = z.object({
  default_provider: z.string().default('openai'),
  fallback_chain: z.array(z.string()).default(['openai', 'anthropic', 'ollama']),
  max_tokens: z.number().int().positive().default(2000),
  temperature: z.number().min(0).max(2).default(0.7),
  /** Model override per backend name */
  models: z.record(z.string()).default({}),
  timeout_ms: z.number().int().positive().default(60000),
});

const RateLimitingSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  calls_per_second: z.number().positive().default(2),
  retry_attempts: z.number().int().min(1).default(3),
  retry_delay_seconds: z.number().min(0).default(1),
});

const TrackingSettingsSchema = z.object({
  storage_path: z.string().min(1).default('data/tracked_items.json'),
  auto_backup: z.boolean().default(true),
  backup_interval_hours: z.number().positive().default(24),
  max_backups: z.number().int().positive().default(10),
});

const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const MatchflowConfigSchema = z.object({
  system_instructions: z.string().default('Evaluate items for relevance and quality.'),
  blocked_entities: z.array(BlockRuleSchema).default([]),
  providers: z.record(ProviderSettingsSchema).default({}),
  evaluation: EvaluationSettingsSchema.default({}),
  deduplication: DeduplicationSettingsSchema.default({}),
  llm: LlmSettingsSchema.default({}),
  rate_limiting: RateLimitingSettingsSchema.default({}),
  tracking: TrackingSettingsSchema.default({}),
  logging: LoggingSettingsSchema.default({}),
});
export type MatchflowConfig = z.infer<typeof MatchflowConfigSchema>;
export type MatchflowConfigInput = z.input<typeof MatchflowConfigSchema>;

export const DEFAULT_CONFIG_PATH = 'config.json';

// ============================================================
// LOADING
// ============================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw config object and fill defaults.
 */
export function parseConfig(raw: unknown): MatchflowConfig {
  const result = MatchflowConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Environment variables that override file settings.
 */
export function applyEnvOverrides(
  config: MatchflowConfig,
  env: NodeJS.ProcessEnv = process.env
): MatchflowConfig {
  const storagePath = env.MATCHFLOW_STORAGE_PATH;
  if (!storagePath) return config;

  return {
    ...config,
    tracking: { ...config.tracking, storage_path: storagePath },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadConfig(
  configPath: string = process.env.MATCHFLOW_CONFIG ?? DEFAULT_CONFIG_PATH
): Promise<MatchflowConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.warn('Config file not found, using defaults', { path: configPath });
      return applyEnvOverrides(parseConfig({}));
    }
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const config = applyEnvOverrides(parseConfig(raw));
  logger.info('Loaded config', { path: configPath });
  return config;
}

export async function saveConfig(config: MatchflowConfig, configPath: string): Promise<void> {
  await writeFileAtomic(configPath, `${JSON.stringify(config, null, 2)}\n`);
  logger.info('Saved config', { path: configPath });
}

/**
 * Apply `logging.level` unless LOG_LEVEL is set explicitly.
 */
export function applyLoggingConfig(
  config: MatchflowConfig,
  env: NodeJS.ProcessEnv = process.env
): void {
  if (!env.LOG_LEVEL) {
    setLogLevel(config.logging.level);
  }
}

// ============================================================
// BLOCKLIST EDITING
// ============================================================

export function addBlockedEntity(config: MatchflowConfig, rule: BlockRule): MatchflowConfig {
  const exists = config.blocked_entities.some(
    b => b.type === rule.type && b.value === rule.value
  );
  if (exists) {
    logger.debug('Entity already blocked', { type: rule.type, value: rule.value });
    return config;
  }

  logger.info('Added blocked entity', { type: rule.type, value: rule.value });
  return { ...config, blocked_entities: [...config.blocked_entities, BlockRuleSchema.parse(rule)] };
}

export function removeBlockedEntity(
  config: MatchflowConfig,
  type: BlockRuleType,
  value: string
): MatchflowConfig {
  const remaining = config.blocked_entities.filter(b => !(b.type === type && b.value === value));
  if (remaining.length === config.blocked_entities.length) {
    logger.debug('Blocked entity not found', { type, value });
    return config;
  }

  logger.info('Removed blocked entity', { type, value });
  return { ...config, blocked_entities: remaining };
}

// ============================================================
// PROVIDER LOOKUP
// ============================================================

export function getProviderConfig(
  config: MatchflowConfig,
  name: string
): ProviderSettings | undefined {
  return config.providers[name];
}

export function isProviderEnabled(config: MatchflowConfig, name: string): boolean {
  return getProviderConfig(config, name)?.enabled ?? false;
}
