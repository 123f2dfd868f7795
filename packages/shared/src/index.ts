/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runWithChildContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext, type LogLevel } from './logger';

// Config
export { config, validateConfig, assertValidConfig, type Config } from './config';

// Errors & results
export {
  AumScraperError,
  ConfigurationError,
  PrimaryExtractionTimeoutError,
} from './errors';
export { Ok, Err, toError, tryCatchAsync, type Result } from './result';

// Types
export * from './types';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractAumJob,
  type ExtractAumJobResult,
  type PersistAumJob,
  type PersistedSource,
  type QueueCounts,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  enableDefaultMetrics,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  extractionsCounter,
  extractionDurationHistogram,
  sourcesProcessedCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  budgetTokensUsedGauge,
  budgetUsagePercentageGauge,
  budgetAlertsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateAumResult, validatePersistJob, SCHEMA_FILES, type ValidationResult } from './schemas';

// Prompt templates
export { AUM_TEMPLATE, type ExtractionTemplate } from './templates';

// AUM extraction
export * from './extraction';
