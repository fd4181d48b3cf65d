import { config as dotenvConfig } from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig, CaptureConfig } from './types/index.js';
import { AsrError } from './asr/errors.js';
import { parseCaptureSpec } from './asr/audio-source.js';
import { registerSecret } from './logger.js';

dotenvConfig();

export const API_KEY_ENV = 'DASHSCOPE_API_KEY';

export const DEFAULTS = {
  model: 'qwen3-asr-flash-realtime',
  baseUrl: 'wss://dashscope.aliyuncs.com/api-ws/v1/realtime',
  sampleRate: 16000,
  language: 'zh',
  vadThreshold: 0.2,
  vadSilenceMs: 800,
  keep: false,
  // 100 ms of 16 kHz s16le mono
  chunkBytes: 3200,
  maxBufferedBytes: 1024 * 1024,
  connectTimeoutMs: 10_000,
  configureTimeoutMs: 10_000,
  drainTimeoutMs: 5_000,
  stopDeadlineMs: 8_000,
  eventLoopLagThresholdMs: 100,
  statsIntervalSeconds: 30,
} as const;

/** Option names shared by the command line and the JSON config file. */
export const OPTION_KEYS = [
  'apiKey',
  'model',
  'baseUrl',
  'sampleRate',
  'language',
  'vadThreshold',
  'vadSilenceMs',
  'keep',
  'chunkBytes',
  'capture',
  'maxBufferedBytes',
  'connectTimeoutMs',
  'configureTimeoutMs',
  'drainTimeoutMs',
  'stopDeadlineMs',
  'eventLoopLagThresholdMs',
  'statsIntervalSeconds',
] as const;

export type OptionKey = (typeof OPTION_KEYS)[number];

/** Unvalidated option values, as strings from the command line or JSON values from a file. */
export type RawOptions = Partial<Record<OptionKey, unknown>>;

const OPTION_KEY_SET: ReadonlySet<string> = new Set(OPTION_KEYS);

function isOptionKey(key: string): key is OptionKey {
  return OPTION_KEY_SET.has(key);
}

function configError(message: string): AsrError {
  return new AsrError('ConfigurationError', message);
}

export function loadConfigFile(filePath: string): RawOptions {
  const configPath = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(configPath)) {
    throw configError(`Config file not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw configError(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw configError(`${configPath} must contain a JSON object`);
  }

  const options: RawOptions = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isOptionKey(key)) {
      throw configError(`${configPath}: unknown option "${key}"`);
    }
    options[key] = value;
  }
  return options;
}

function readString(value: unknown, name: string, fallback?: string): string {
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw configError(`${name} is required`);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw configError(`${name} must be a non-empty string`);
  }
  return value.trim();
}

function readNumber(value: unknown, name: string, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw configError(`${name} must be a number, got ${JSON.stringify(value)}`);
  }
  return n;
}

function readPositiveInt(value: unknown, name: string, fallback: number): number {
  const n = readNumber(value, name, fallback);
  if (!Number.isInteger(n) || n <= 0) {
    throw configError(`${name} must be a positive integer, got ${n}`);
  }
  return n;
}

function readBoolean(value: unknown, name: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw configError(`${name} must be true or false`);
}

/**
 * Merge option layers (later wins), then validate into an AppConfig.
 * Any violation throws a ConfigurationError; nothing is silently defaulted.
 */
export function resolveConfig(layers: RawOptions[], env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: RawOptions = {};
  for (const layer of layers) {
    for (const key of OPTION_KEYS) {
      if (layer[key] !== undefined) merged[key] = layer[key];
    }
  }

  const apiKey = readString(merged.apiKey ?? env[API_KEY_ENV], `API key (--api-key or ${API_KEY_ENV})`);

  const baseUrl = readString(merged.baseUrl, 'baseUrl', DEFAULTS.baseUrl);
  let protocol: string;
  try {
    protocol = new URL(baseUrl).protocol;
  } catch {
    throw configError(`baseUrl is not a valid URL: ${baseUrl}`);
  }
  if (protocol !== 'ws:' && protocol !== 'wss:') {
    throw configError(`baseUrl must be a ws:// or wss:// URL, got ${baseUrl}`);
  }

  const vadThreshold = readNumber(merged.vadThreshold, 'vadThreshold', DEFAULTS.vadThreshold);
  if (vadThreshold < 0 || vadThreshold > 1) {
    throw configError(`vadThreshold must be between 0 and 1, got ${vadThreshold}`);
  }

  const sampleRate = readPositiveInt(merged.sampleRate, 'sampleRate', DEFAULTS.sampleRate);
  const chunkBytes = readPositiveInt(merged.chunkBytes, 'chunkBytes', DEFAULTS.chunkBytes);
  const bytesPerSample = 2;
  const channels = 1;
  if (chunkBytes % (bytesPerSample * channels) !== 0) {
    throw configError(`chunkBytes must be a multiple of ${bytesPerSample * channels} (whole s16le samples), got ${chunkBytes}`);
  }

  let capture: CaptureConfig | null = null;
  if (merged.capture !== undefined && merged.capture !== null) {
    capture = parseCaptureSpec(readString(merged.capture, 'capture'));
  }

  const config: AppConfig = {
    apiKey,
    baseUrl,
    session: {
      model: readString(merged.model, 'model', DEFAULTS.model),
      sampleRate,
      language: readString(merged.language, 'language', DEFAULTS.language),
      vadThreshold,
      vadSilenceMs: readPositiveInt(merged.vadSilenceMs, 'vadSilenceMs', DEFAULTS.vadSilenceMs),
    },
    audio: { sampleRate, bytesPerSample, channels },
    policy: {
      chunkBytes,
      maxBufferedBytes: readPositiveInt(merged.maxBufferedBytes, 'maxBufferedBytes', DEFAULTS.maxBufferedBytes),
      connectTimeoutMs: readPositiveInt(merged.connectTimeoutMs, 'connectTimeoutMs', DEFAULTS.connectTimeoutMs),
      configureTimeoutMs: readPositiveInt(merged.configureTimeoutMs, 'configureTimeoutMs', DEFAULTS.configureTimeoutMs),
      drainTimeoutMs: readPositiveInt(merged.drainTimeoutMs, 'drainTimeoutMs', DEFAULTS.drainTimeoutMs),
      stopDeadlineMs: readPositiveInt(merged.stopDeadlineMs, 'stopDeadlineMs', DEFAULTS.stopDeadlineMs),
      keep: readBoolean(merged.keep, 'keep', DEFAULTS.keep),
    },
    capture,
    eventLoopLagThresholdMs: readPositiveInt(
      merged.eventLoopLagThresholdMs, 'eventLoopLagThresholdMs', DEFAULTS.eventLoopLagThresholdMs
    ),
    statsIntervalSeconds: readPositiveInt(
      merged.statsIntervalSeconds, 'statsIntervalSeconds', DEFAULTS.statsIntervalSeconds
    ),
  };

  registerSecret(config.apiKey);
  return config;
}
