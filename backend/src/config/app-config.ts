import os from 'node:os';
import path from 'node:path';
import { InvalidInputError } from '../common/errors';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type AnalyzerMode = 'local' | 'http';

export interface AppConfig {
  port: number;
  sessionSecret: string;
  maxUploadBytes: number;
  uploadDir: string;
  analyzerMode: AnalyzerMode;
  analyzerEndpoint: string;
  analyzerTimeoutMs: number;
  ffmpegPath: string;
  ffprobePath: string;
  production: boolean;
}

export const DEFAULT_SESSION_SECRET = 'dev-secret';
export const DEFAULT_MAX_UPLOAD_BYTES = 500 * 1024 * 1024;

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${key} must be a positive number, got "${raw}"`);
  }
  return value;
}

function readAnalyzerMode(env: NodeJS.ProcessEnv): AnalyzerMode {
  const mode = env.ANALYZER_MODE ?? 'local';
  if (mode !== 'local' && mode !== 'http') {
    throw new InvalidInputError(`ANALYZER_MODE must be "local" or "http", got "${mode}"`);
  }
  return mode;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readNumber(env, 'PORT', 8080),
    sessionSecret: env.SESSION_SECRET ?? env.FLASK_SECRET ?? DEFAULT_SESSION_SECRET,
    maxUploadBytes: readNumber(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
    uploadDir: env.UPLOAD_DIR ?? path.join(os.tmpdir(), 'flashcut-uploads'),
    analyzerMode: readAnalyzerMode(env),
    analyzerEndpoint: env.ANALYZER_ENDPOINT ?? 'http://localhost:7001',
    analyzerTimeoutMs: readNumber(env, 'ANALYZER_TIMEOUT_MS', 120000),
    ffmpegPath: env.FFMPEG_PATH ?? 'ffmpeg',
    ffprobePath: env.FFPROBE_PATH ?? 'ffprobe',
    production: env.NODE_ENV === 'production',
  };
}

export function usesDefaultSecret(config: AppConfig): boolean {
  return config.sessionSecret === DEFAULT_SESSION_SECRET;
}
