/**
 * Environment configuration with validation
 * Fail-fast pattern: validates all required env vars at module load time
 */

import * as path from 'node:path';
import { ConfigError } from '../errors.js';

export type HistoryBackend = 'file' | 'bucket';

export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  /** HTTP port for the API and Bull Board (default: 3000) */
  PORT: number;
  REDIS_HOST: string;
  REDIS_PORT: number;
  /** Channel handles, URLs or ytsearch queries, in processing order */
  CHANNELS: string[];
  SMTP_HOST: string;
  /** SMTP port (default: 587, STARTTLS) */
  SMTP_PORT: number;
  /** Implicit TLS (default: true only on port 465) */
  SMTP_SECURE: boolean;
  SMTP_USER: string;
  SMTP_PASS: string;
  /** Sender address (default: SMTP_USER) */
  MAIL_FROM: string;
  MAIL_TO: string;
  /** Data directory for downloaded audio and local history (default: ./data) */
  DATA_DIR: string;
  /** Path to yt-dlp binary (default: 'yt-dlp' in PATH) */
  YTDLP_PATH: string;
  /** How many recent entries to list per channel (default: 50) */
  LIST_LIMIT: number;
  /** Accessibility probes per channel before giving up (default: 10) */
  MAX_ATTEMPTS: number;
  /** Hours between scheduled runs (default: 24) */
  RUN_INTERVAL_HOURS: number;
  HISTORY_BACKEND: HistoryBackend;
  /** Local history file (default: DATA_DIR/history.json) */
  HISTORY_FILE: string;
  HISTORY_BUCKET?: string;
  /** Object key of the remote history (default: history.json) */
  HISTORY_OBJECT_KEY: string;
  /** Bucket for files too large to attach (optional; without it large files fail delivery) */
  OVERFLOW_BUCKET?: string;
  OVERFLOW_PREFIX: string;
  /** Presigned link lifetime in hours (default: 168, the S3 maximum) */
  OVERFLOW_LINK_TTL_HOURS: number;
  S3_REGION: string;
  /** Custom endpoint for S3-compatible storage (optional) */
  S3_ENDPOINT?: string;
  S3_FORCE_PATH_STYLE: boolean;
  /** Keep audio files after a committed delivery (default: true) */
  KEEP_DELIVERED_FILES: boolean;
  /** Discord webhook URL for run summaries (optional) */
  DISCORD_WEBHOOK_URL?: string;
}

const requiredEnvVars = ['CHANNELS', 'SMTP_HOST', 'SMTP_USER', 'SMTP_PASS', 'MAIL_TO'] as const;

/**
 * Split a comma or newline separated channel list, dropping blanks and repeats
 */
export function parseChannelList(raw: string | undefined): string[] {
  if (!raw) return [];
  const channels = raw
    .split(/[,\n]/)
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
  return [...new Set(channels)];
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Parse a positive integer setting, rejecting garbage instead of yielding NaN
 */
export function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function parseNodeEnv(value: string | undefined): EnvConfig['NODE_ENV'] {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

function parseHistoryBackend(value: string | undefined): HistoryBackend {
  const backend = (value || 'file').trim().toLowerCase();
  if (backend === 'file' || backend === 'bucket') return backend;
  throw new ConfigError(`HISTORY_BACKEND must be 'file' or 'bucket', got '${value}'`);
}

/**
 * Validates that all required environment variables are set
 * Throws immediately on missing vars to fail fast
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): void {
  const missing: string[] = [];

  for (const varName of requiredEnvVars) {
    if (!source[varName]?.trim()) {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing required env var${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`);
  }

  if (parseChannelList(source.CHANNELS).length === 0) {
    throw new ConfigError('CHANNELS does not name any channel');
  }
}

/**
 * Build the typed configuration from an environment map
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  validateEnv(source);

  const dataDir = source.DATA_DIR || './data';
  const smtpPort = parseInteger('SMTP_PORT', source.SMTP_PORT, 587);
  const historyBackend = parseHistoryBackend(source.HISTORY_BACKEND);

  if (historyBackend === 'bucket' && !source.HISTORY_BUCKET) {
    throw new ConfigError('HISTORY_BACKEND=bucket requires HISTORY_BUCKET');
  }

  const smtpUser = (source.SMTP_USER || '').trim();

  return {
    NODE_ENV: parseNodeEnv(source.NODE_ENV),
    PORT: parseInteger('PORT', source.PORT, 3000),
    REDIS_HOST: source.REDIS_HOST || '127.0.0.1',
    REDIS_PORT: parseInteger('REDIS_PORT', source.REDIS_PORT, 6379),
    CHANNELS: parseChannelList(source.CHANNELS),
    SMTP_HOST: (source.SMTP_HOST || '').trim(),
    SMTP_PORT: smtpPort,
    SMTP_SECURE: parseBoolean(source.SMTP_SECURE, smtpPort === 465),
    SMTP_USER: smtpUser,
    SMTP_PASS: source.SMTP_PASS || '',
    MAIL_FROM: (source.MAIL_FROM || smtpUser).trim(),
    MAIL_TO: (source.MAIL_TO || '').trim(),
    DATA_DIR: dataDir,
    YTDLP_PATH: source.YTDLP_PATH || 'yt-dlp',
    LIST_LIMIT: parseInteger('LIST_LIMIT', source.LIST_LIMIT, 50),
    MAX_ATTEMPTS: parseInteger('MAX_ATTEMPTS', source.MAX_ATTEMPTS, 10),
    RUN_INTERVAL_HOURS: parseInteger('RUN_INTERVAL_HOURS', source.RUN_INTERVAL_HOURS, 24),
    HISTORY_BACKEND: historyBackend,
    HISTORY_FILE: source.HISTORY_FILE || path.join(dataDir, 'history.json'),
    HISTORY_BUCKET: source.HISTORY_BUCKET || undefined,
    HISTORY_OBJECT_KEY: source.HISTORY_OBJECT_KEY || 'history.json',
    OVERFLOW_BUCKET: source.OVERFLOW_BUCKET || undefined,
    OVERFLOW_PREFIX: source.OVERFLOW_PREFIX || 'overflow',
    OVERFLOW_LINK_TTL_HOURS: parseInteger('OVERFLOW_LINK_TTL_HOURS', source.OVERFLOW_LINK_TTL_HOURS, 168),
    S3_REGION: source.S3_REGION || 'us-east-1',
    S3_ENDPOINT: source.S3_ENDPOINT || undefined,
    S3_FORCE_PATH_STYLE: parseBoolean(source.S3_FORCE_PATH_STYLE, false),
    KEEP_DELIVERED_FILES: parseBoolean(source.KEEP_DELIVERED_FILES, true),
    DISCORD_WEBHOOK_URL: source.DISCORD_WEBHOOK_URL || undefined,
  };
}

/**
 * Typed environment configuration
 * Validated on module load (fail-fast pattern)
 */
export const env: EnvConfig = loadEnv();
