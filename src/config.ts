import { loadEnv } from 'vite';
import { ConfigError } from './errors';
import { isLogLevel, type LogLevel } from './log';

// Same layering the web app got from Vite for its VITE_* variables:
// .env, .env.local, .env.[mode], .env.[mode].local, then process.env.
export const ENV_PREFIX = 'DECODER_';

export type IncorrectPolicy = 'demote' | 'reset';

export type DecoderConfig = {
  boxCount: number;
  baseIntervalMs: number;
  incorrectPolicy: IncorrectPolicy;
  decodeConcurrency: number;
  cacheMaxEntries: number; // 0 = unbounded
  gemini?: { apiKey: string; model: string };
  dictionaryPath?: string;
  supabase?: { url: string; anonKey: string };
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG: DecoderConfig = {
  boxCount: 5,
  baseIntervalMs: 24 * 60 * 60 * 1000,
  incorrectPolicy: 'demote',
  decodeConcurrency: 6,
  cacheMaxEntries: 0,
  logLevel: 'info',
};

const HOUR = 60 * 60 * 1000;

function intOf(env: Record<string, string>, key: string, fallback: number, min: number): number {
  const raw = env[ENV_PREFIX + key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) throw new ConfigError(ENV_PREFIX + key, `expected an integer >= ${min}, got "${raw}"`);
  return n;
}

function strOf(env: Record<string, string>, key: string): string | undefined {
  const v = env[ENV_PREFIX + key]?.trim();
  return v ? v : undefined;
}

export function configFromEnv(env: Record<string, string>): DecoderConfig {
  const policy = strOf(env, 'INCORRECT_POLICY') ?? DEFAULT_CONFIG.incorrectPolicy;
  if (policy !== 'demote' && policy !== 'reset') {
    throw new ConfigError(ENV_PREFIX + 'INCORRECT_POLICY', `expected "demote" or "reset", got "${policy}"`);
  }
  const logLevel = strOf(env, 'LOG_LEVEL') ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) throw new ConfigError(ENV_PREFIX + 'LOG_LEVEL', `unknown level "${logLevel}"`);

  const cfg: DecoderConfig = {
    boxCount: intOf(env, 'BOX_COUNT', DEFAULT_CONFIG.boxCount, 2),
    baseIntervalMs: intOf(env, 'BASE_INTERVAL_HOURS', DEFAULT_CONFIG.baseIntervalMs / HOUR, 1) * HOUR,
    incorrectPolicy: policy,
    decodeConcurrency: intOf(env, 'DECODE_CONCURRENCY', DEFAULT_CONFIG.decodeConcurrency, 1),
    cacheMaxEntries: intOf(env, 'CACHE_MAX_ENTRIES', DEFAULT_CONFIG.cacheMaxEntries, 0),
    logLevel,
  };

  const apiKey = strOf(env, 'GEMINI_API_KEY');
  if (apiKey) cfg.gemini = { apiKey, model: strOf(env, 'GEMINI_MODEL') ?? 'gemini-1.5-flash' };
  const dictionaryPath = strOf(env, 'DICTIONARY_PATH');
  if (dictionaryPath) cfg.dictionaryPath = dictionaryPath;
  const url = strOf(env, 'SUPABASE_URL');
  const anonKey = strOf(env, 'SUPABASE_ANON_KEY');
  if (url && anonKey) cfg.supabase = { url, anonKey };
  else if (url || anonKey) {
    throw new ConfigError(ENV_PREFIX + (url ? 'SUPABASE_ANON_KEY' : 'SUPABASE_URL'), 'Supabase needs both URL and anon key');
  }
  return cfg;
}

export function loadConfig(opts: { mode?: string; envDir?: string } = {}): DecoderConfig {
  const env = loadEnv(opts.mode ?? 'development', opts.envDir ?? process.cwd(), ENV_PREFIX);
  return configFromEnv(env);
}
