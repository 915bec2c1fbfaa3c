import dotenv from 'dotenv';
import { ConfigError } from './api/errors';
import { APOD_URL } from './api/fetch_apod';
import { DEFAULT_TIMEOUT_MS } from './api/nasaClient';
import { DEFAULT_CACHE_TTL_SECONDS } from './utils/apodCache';

export interface ApodConfig {
  apiKey: string;
  apodUrl: string;
  timeoutMs: number;
  cacheTtlSeconds: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) throw new ConfigError(key, raw);
  return Number(raw);
}

/** Reads the given variables, or `.env` merged into `process.env` when none are passed. */
export function loadConfig(env?: Env): ApodConfig {
  if (!env) {
    dotenv.config();
    env = process.env;
  }
  const apodUrl = env.NASA_APOD_URL?.trim() || APOD_URL;
  try {
    new URL(apodUrl);
  } catch {
    throw new ConfigError('NASA_APOD_URL', apodUrl);
  }

  return {
    // DEMO_KEY works without signing up but is heavily rate limited.
    apiKey: env.NASA_API_KEY?.trim() || 'DEMO_KEY',
    apodUrl,
    timeoutMs: readInt(env, 'APOD_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    cacheTtlSeconds: readInt(env, 'APOD_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS),
  };
}
