/**
 * Matchflow
 *
 * Search several providers, score the results with an AI backend chain,
 * and track accepted items through their lifecycle.
 */

export * from './types';
export * from './lib/errors';
export { logger, setLogLevel, timeOperation, type Logger, type LogLevel } from './lib/logger';
export {
  loadConfig,
  parseConfig,
  saveConfig,
  addBlockedEntity,
  removeBlockedEntity,
  getProviderConfig,
  isProviderEnabled,
  applyLoggingConfig,
  MatchflowConfigSchema,
  type MatchflowConfig,
  type MatchflowConfigInput,
} from './config';
export * from './providers';
export * from './aggregator';
export * from './evaluation';
export * from './tracker';
export { runPipeline, type PipelineComponents, type PipelineOptions, type PipelineReport } from './pipeline';
