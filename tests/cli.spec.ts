import { describe, it, expect } from 'vitest';
import { parseArgs, usage } from '../src/cli.js';

describe('parseArgs', () => {
  it('maps flags onto option keys', () => {
    expect(parseArgs(['-m', 'test-model', '--keep', '--chunk-bytes=6400', '-l', 'en', '--config', 'qasr.json'])).toEqual({
      kind: 'run',
      options: { model: 'test-model', keep: true, chunkBytes: '6400', language: 'en' },
      configPath: 'qasr.json',
    });
  });

  it('returns an empty run command without arguments', () => {
    expect(parseArgs([])).toEqual({ kind: 'run', options: {}, configPath: null });
  });

  it('recognizes help anywhere', () => {
    expect(parseArgs(['-m', 'x', '--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('takes negative numbers as values', () => {
    const command = parseArgs(['--vad-threshold', '-0.5']);
    expect(command).toEqual({ kind: 'run', options: { vadThreshold: '-0.5' }, configPath: null });
  });

  it('passes an inline boolean through for validation', () => {
    expect(parseArgs(['--keep=false'])).toEqual({ kind: 'run', options: { keep: 'false' }, configPath: null });
  });

  it('keeps the device part of a capture spec intact', () => {
    expect(parseArgs(['--capture', 'dshow:audio=Microphone'])).toEqual({
      kind: 'run',
      options: { capture: 'dshow:audio=Microphone' },
      configPath: null,
    });
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgs(['--model'])).toThrow('Option --model requires a value');
    expect(() => parseArgs(['--model', '--keep'])).toThrow('Option --model requires a value');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['--toString'])).toThrow('Unknown option: --toString');
    expect(() => parseArgs(['stray'])).toThrow('Unknown option: stray');
  });
});

describe('usage', () => {
  it('names the API key variable and the exit statuses', () => {
    const text = usage();
    expect(text).toContain('--api-key <key>              API key (default: $DASHSCOPE_API_KEY)');
    expect(text).toContain('130 when it had to be forced closed after a stop request.');
  });
});
