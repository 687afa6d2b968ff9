/**
 * Configuration for the progressive streaming bridge
 */

import path from 'path';
import type { LogLevel } from './domain/interfaces/ILogger';

export interface Config {
  PORT: number;
  API_PREFIX: string;
  // Runtime directory for downloads and logs
  RUNTIME_DIR: string;
  // Temporary storage root handed to the download engine
  DOWNLOAD_DIR: string;
  METADATA_POLL_INTERVAL: number;
  METADATA_TIMEOUT: number;
  // Sessions without metadata for longer than this are evicted as stuck
  STUCK_GRACE_PERIOD: number;
  STREAM_CHUNK_SIZE: number; // Read size for progressive file streaming (default: 8 KB)
  CLEANUP_INTERVAL: number; // 0 disables the periodic sweep
  DEFAULT_MAX_AGE_HOURS: number;
  LOG_LEVEL: LogLevel;
  CLEAR_CACHE: boolean;
  VIDEO_EXTENSIONS: readonly string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
}

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

const RUNTIME_DIR = process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime');

const config: Config = {
  // Server configuration
  PORT: Number(process.env.PORT) || 3000,
  API_PREFIX: '/api/torrent',

  RUNTIME_DIR,
  DOWNLOAD_DIR: process.env.DOWNLOAD_DIR || path.join(RUNTIME_DIR, 'downloads'),

  // Metadata acquisition
  METADATA_POLL_INTERVAL: 1000, // 1 second
  METADATA_TIMEOUT: Number(process.env.METADATA_TIMEOUT) || 30000, // 30 seconds
  STUCK_GRACE_PERIOD: Number(process.env.STUCK_GRACE_PERIOD) || 2 * 60 * 1000, // 2 minutes

  // Streaming configuration
  STREAM_CHUNK_SIZE: 8 * 1024,

  // Housekeeping
  CLEANUP_INTERVAL: numberFromEnv(process.env.CLEANUP_INTERVAL, 60 * 60 * 1000), // 1 hour
  DEFAULT_MAX_AGE_HOURS: 24,

  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  CLEAR_CACHE: process.env.CLEAR_CACHE !== 'false',

  // Video file extensions
  VIDEO_EXTENSIONS: ['.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm', '.m4v'] as const
};

export default config;
