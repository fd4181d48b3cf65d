import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULTS, loadConfigFile, resolveConfig } from '../src/config.js';
import { clearSecrets } from '../src/logger.js';

const env = { DASHSCOPE_API_KEY: 'test-secret' };

function configErrorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe('resolveConfig', () => {
  afterEach(() => {
    clearSecrets();
  });

  it('fills every option with its default', () => {
    const config = resolveConfig([{}], env);
    expect(config).toEqual({
      apiKey: 'test-secret',
      baseUrl: DEFAULTS.baseUrl,
      session: {
        model: DEFAULTS.model,
        sampleRate: 16000,
        language: 'zh',
        vadThreshold: 0.2,
        vadSilenceMs: 800,
      },
      audio: { sampleRate: 16000, bytesPerSample: 2, channels: 1 },
      policy: {
        chunkBytes: 3200,
        maxBufferedBytes: 1048576,
        connectTimeoutMs: 10000,
        configureTimeoutMs: 10000,
        drainTimeoutMs: 5000,
        stopDeadlineMs: 8000,
        keep: false,
      },
      capture: null,
      eventLoopLagThresholdMs: 100,
      statsIntervalSeconds: 30,
    });
  });

  it('requires an API key', () => {
    expect(() => resolveConfig([{}], {})).toThrow('API key (--api-key or DASHSCOPE_API_KEY) is required');
  });

  it('prefers an explicit API key over the environment', () => {
    expect(resolveConfig([{ apiKey: 'test-secret-2' }], env).apiKey).toBe('test-secret-2');
  });

  it('lets later layers override earlier ones', () => {
    const config = resolveConfig([{ model: 'model-a', language: 'en' }, { model: 'model-b' }], env);
    expect(config.session.model).toBe('model-b');
    expect(config.session.language).toBe('en');
  });

  it('accepts command-line strings for numbers and flags', () => {
    const config = resolveConfig(
      [{ sampleRate: '8000', vadThreshold: '0.5', chunkBytes: '1600', keep: true, drainTimeoutMs: '250' }],
      env
    );
    expect(config.session.sampleRate).toBe(8000);
    expect(config.audio.sampleRate).toBe(8000);
    expect(config.session.vadThreshold).toBe(0.5);
    expect(config.policy).toMatchObject({ chunkBytes: 1600, keep: true, drainTimeoutMs: 250 });
  });

  it('parses a capture spec', () => {
    expect(resolveConfig([{ capture: 'avfoundation::0' }], env).capture).toEqual({
      format: 'avfoundation',
      device: ':0',
    });
  });

  it.each([
    [{ baseUrl: 'https://example.test/rt' }, 'baseUrl must be a ws:// or wss:// URL, got https://example.test/rt'],
    [{ baseUrl: 'not a url' }, 'baseUrl is not a valid URL: not a url'],
    [{ vadThreshold: '1.5' }, 'vadThreshold must be between 0 and 1, got 1.5'],
    [{ sampleRate: 'abc' }, 'sampleRate must be a number, got "abc"'],
    [{ drainTimeoutMs: '0' }, 'drainTimeoutMs must be a positive integer, got 0'],
    [{ chunkBytes: '3201' }, 'chunkBytes must be a multiple of 2 (whole s16le samples), got 3201'],
    [{ keep: 'yes' }, 'keep must be true or false'],
    [{ language: '' }, 'language must be a non-empty string'],
    [{ capture: 'alsa' }, 'capture must look like <format>:<device> (e.g. alsa:default), got "alsa"'],
  ])('rejects %o', (layer, message) => {
    const err = configErrorOf(() => resolveConfig([layer], env));
    expect(err).toMatchObject({ kind: 'ConfigurationError', message });
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qasr-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(dir, 'qasr.json');
    fs.writeFileSync(file, content);
    return file;
  }

  it('reads options from a JSON object', () => {
    const file = writeConfig('{"model":"file-model","keep":true,"chunkBytes":6400}');
    expect(loadConfigFile(file)).toEqual({ model: 'file-model', keep: true, chunkBytes: 6400 });
  });

  it('layers under command-line options', () => {
    const file = writeConfig('{"model":"file-model","language":"en"}');
    const config = resolveConfig([loadConfigFile(file), { model: 'cli-model' }], env);
    expect(config.session.model).toBe('cli-model');
    expect(config.session.language).toBe('en');
    clearSecrets();
  });

  it('rejects unknown keys', () => {
    const file = writeConfig('{"modle":"typo"}');
    expect(() => loadConfigFile(file)).toThrow(`${file}: unknown option "modle"`);
  });

  it('rejects a missing file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadConfigFile(file)).toThrow(`Config file not found: ${file}`);
  });

  it('rejects invalid JSON and non-objects', () => {
    expect(() => loadConfigFile(writeConfig('{'))).toThrow(/^Failed to parse /);
    expect(() => loadConfigFile(writeConfig('[1]'))).toThrow(/must contain a JSON object$/);
  });
});
