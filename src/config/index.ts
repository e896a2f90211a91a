/**
 * Configuration management
 * All behavior is driven by environment variables
 */
import { ConfigurationError } from '../errors';

export interface Config {
  // Database
  databaseUrl: string;

  // Embeddings
  openai: {
    apiKey: string;
    embeddingModel: string;
    maxInputChars: number;
  };
  embeddingMaxAttempts: number;
  embeddingRetryBaseMs: number;

  // Cron Behavior
  jobFetchLookbackHours: number;

  // Matching
  similarityThreshold: number;
  matchLookbackHours: number;

  // Email
  email: {
    resendApiKey?: string;
    from: string;
    dryRun: boolean;
  };
  notificationMaxAttempts: number;
  notificationRetryDelayMs: number;
  alertWebhookUrl?: string;

  // Job Filtering
  jobQueryKeywords: string[];
  jobExcludedKeywords: string[];
  jobLocations: string[];

  // Platform Toggles
  enableRemoteOK: boolean;
  enableWWR: boolean;
  sourceFetchTimeoutMs: number;

  // Safety Limits
  maxJobsPerSource: number;
  maxNotificationsPerUser: number;

  // Server & Scheduler
  port: number;
  cronSecret?: string;
  pipelineIntervalMinutes: number;
  cvMaxUploadBytes: number;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

// setInterval delays are capped at 2^31 - 1 ms
export const MAX_PIPELINE_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / 60_000);

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Integer setting that must fall in [min, max]; out of range is fatal
 */
function parseBounded(
  name: string,
  value: string | undefined,
  defaultValue: number,
  min: number,
  max?: number
): number {
  const parsed = parseNumber(value, defaultValue);
  if (parsed < min) {
    throw new ConfigurationError(`${name} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new ConfigurationError(`${name} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Similarity threshold must be a number in [0, 1]; anything else is fatal
 */
export function parseThreshold(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_SIMILARITY_THRESHOLD;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`MATCH_SIMILARITY_THRESHOLD must be a number, got "${value}"`);
  }
  assertThreshold(parsed);
  return parsed;
}

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigurationError(`Similarity threshold must be within [0, 1], got ${threshold}`);
  }
}

export function loadConfig(env: Env = process.env): Config {
  const requiredEnvVars = ['DATABASE_URL', 'OPENAI_API_KEY'];

  for (const envVar of requiredEnvVars) {
    if (!env[envVar]) {
      throw new ConfigurationError(`Missing required environment variable: ${envVar}`);
    }
  }

  const resendApiKey = optional(env.RESEND_API_KEY);

  return {
    databaseUrl: env.DATABASE_URL ?? '',
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || 'text-embedding-3-small',
      maxInputChars: parseNumber(env.EMBEDDING_MAX_INPUT_CHARS, 8000),
    },
    embeddingMaxAttempts: parseNumber(env.EMBEDDING_MAX_ATTEMPTS, 3),
    embeddingRetryBaseMs: parseNumber(env.EMBEDDING_RETRY_BASE_MS, 1000),
    jobFetchLookbackHours: parseNumber(env.JOB_FETCH_LOOKBACK_HOURS, 24),
    similarityThreshold: parseThreshold(env.MATCH_SIMILARITY_THRESHOLD),
    matchLookbackHours: parseNumber(env.MATCH_LOOKBACK_HOURS, 72),
    email: {
      resendApiKey,
      from: env.EMAIL_FROM || 'Job Alerts <alerts@example.com>',
      // Without an API key there is nothing to send with
      dryRun: parseBoolean(env.EMAIL_DRY_RUN, false) || !resendApiKey,
    },
    notificationMaxAttempts: parseNumber(env.NOTIFICATION_MAX_ATTEMPTS, 3),
    notificationRetryDelayMs: parseNumber(env.NOTIFICATION_RETRY_DELAY_MS, 2000),
    alertWebhookUrl: optional(env.ALERT_WEBHOOK_URL),
    jobQueryKeywords: parseStringArray(env.JOB_QUERY_KEYWORDS),
    jobExcludedKeywords: parseStringArray(env.JOB_EXCLUDED_KEYWORDS),
    jobLocations: parseStringArray(env.JOB_LOCATIONS),
    enableRemoteOK: parseBoolean(env.ENABLE_REMOTEOK, true),
    enableWWR: parseBoolean(env.ENABLE_WWR, true),
    sourceFetchTimeoutMs: parseNumber(env.SOURCE_FETCH_TIMEOUT_MS, 15000),
    maxJobsPerSource: parseNumber(env.MAX_JOBS_PER_SOURCE, 50),
    maxNotificationsPerUser: parseBounded('MAX_NOTIFICATIONS_PER_USER', env.MAX_NOTIFICATIONS_PER_USER, 10, 1),
    port: parseNumber(env.PORT, 3000),
    cronSecret: optional(env.CRON_SECRET),
    pipelineIntervalMinutes: parseBounded(
      'PIPELINE_INTERVAL_MINUTES',
      env.PIPELINE_INTERVAL_MINUTES,
      360,
      1,
      MAX_PIPELINE_INTERVAL_MINUTES
    ),
    cvMaxUploadBytes: parseNumber(env.CV_MAX_UPLOAD_BYTES, 5 * 1024 * 1024),
  };
}
