import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { FfmpegCapture, buildCaptureArgs, parseCaptureSpec, stdinSource } from '../../src/asr/audio-source.js';

const audio = { sampleRate: 16000, bytesPerSample: 2, channels: 1 };

describe('parseCaptureSpec', () => {
  it('splits at the first colon', () => {
    expect(parseCaptureSpec('alsa:default')).toEqual({ format: 'alsa', device: 'default' });
    expect(parseCaptureSpec('avfoundation::0')).toEqual({ format: 'avfoundation', device: ':0' });
    expect(parseCaptureSpec('dshow:audio=Microphone (USB)')).toEqual({
      format: 'dshow',
      device: 'audio=Microphone (USB)',
    });
  });

  it.each(['alsa', ':default', 'alsa:'])('rejects %s', (spec) => {
    expect(() => parseCaptureSpec(spec)).toThrow(/must look like <format>:<device>/);
  });
});

describe('buildCaptureArgs', () => {
  it('asks ffmpeg for headerless s16le at the configured rate', () => {
    expect(buildCaptureArgs({ format: 'pulse', device: 'default' }, { ...audio, sampleRate: 8000 })).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'pulse',
      '-i', 'default',
      '-ar', '8000',
      '-ac', '1',
      '-f', 's16le',
      'pipe:1',
    ]);
  });
});

describe('stdinSource', () => {
  it('reads the given stream and pauses it on stop', async () => {
    const stdin = new PassThrough();
    const source = stdinSource(stdin);
    stdin.end(Buffer.from([1, 2, 3, 4]));

    const seen: Buffer[] = [];
    for await (const chunk of source.stream) seen.push(chunk);
    expect(Buffer.concat(seen)).toEqual(Buffer.from([1, 2, 3, 4]));

    const live = new PassThrough();
    live.resume();
    stdinSource(live).stop();
    expect(live.isPaused()).toBe(true);
  });
});

describe('FfmpegCapture', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'qasr-capture-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  /** Executable standing in for ffmpeg; ignores its arguments. */
  function fakeFfmpeg(body: string): string {
    const file = path.join(dir, 'ffmpeg');
    fs.writeFileSync(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return file;
  }

  async function collect(stream: AsyncIterable<Buffer>, into: Buffer[]): Promise<void> {
    for await (const chunk of stream) into.push(chunk);
  }

  it.skipIf(process.platform === 'win32')('delivers the output and then fails on a non-zero exit', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const bin = fakeFfmpeg("printf 'abcd'\necho 'No such audio device' >&2\nexit 1");

    for (let attempt = 0; attempt < 5; attempt++) {
      const capture = new FfmpegCapture({ format: 'alsa', device: 'hw:9' }, audio, bin);
      const chunks: Buffer[] = [];

      await expect(collect(capture.stream, chunks)).rejects.toMatchObject({
        kind: 'InputError',
        message: 'ffmpeg capture exited with code 1: No such audio device',
      });
      expect(Buffer.concat(chunks).toString()).toBe('abcd');
    }
  });

  it.skipIf(process.platform === 'win32')('ends cleanly when ffmpeg exits 0', async () => {
    const capture = new FfmpegCapture({ format: 'alsa', device: 'default' }, audio, fakeFfmpeg("printf 'abcd'"));
    const chunks: Buffer[] = [];

    await collect(capture.stream, chunks);
    expect(Buffer.concat(chunks).toString()).toBe('abcd');
    expect(capture.alive).toBe(false);
  });

  it.skipIf(process.platform === 'win32')('ends cleanly when stopped', async () => {
    const capture = new FfmpegCapture({ format: 'alsa', device: 'default' }, audio, fakeFfmpeg('exec sleep 5'));
    const chunks: Buffer[] = [];
    const done = collect(capture.stream, chunks);

    capture.stop();
    await done;
    expect(chunks).toEqual([]);
    expect(capture.alive).toBe(false);
  });

  it('surfaces a missing ffmpeg binary as an input error on the stream', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const capture = new FfmpegCapture({ format: 'alsa', device: 'default' }, audio, '/nonexistent/ffmpeg-test-binary');

    const drain = async () => {
      for await (const chunk of capture.stream) {
        expect(chunk).toBeInstanceOf(Buffer);
      }
    };
    await expect(drain()).rejects.toMatchObject({ kind: 'InputError' });
    expect(capture.alive).toBe(false);
    capture.stop();
  });
});
