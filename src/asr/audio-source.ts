import { spawn, type ChildProcess } from 'child_process';
import type { Readable } from 'stream';
import type { AudioFormat, CaptureConfig } from '../types/index.js';
import { AsrError } from './errors.js';
import { logger } from '../logger.js';

/** Where the session reads raw PCM from. */
export interface AudioSource {
  readonly stream: AsyncIterable<Buffer>;
  /** Release the source (kill the capture process, stop reading stdin). */
  stop(): void;
}

/** Raw PCM piped in on stdin, e.g. `ffmpeg ... -f s16le - | qasr`. */
export function stdinSource(stdin: Readable = process.stdin): AudioSource {
  return {
    stream: stdin,
    stop() {
      stdin.pause();
    },
  };
}

/** ffmpeg arguments that turn a capture device into headerless s16le PCM on stdout. */
export function buildCaptureArgs(capture: CaptureConfig, audio: AudioFormat): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', capture.format,
    '-i', capture.device,
    '-ar', String(audio.sampleRate),
    '-ac', String(audio.channels),
    '-f', 's16le',
    'pipe:1',
  ];
}

/**
 * Captures from a local device through an ffmpeg child process and exposes its
 * stdout as the audio stream.
 *
 * The stream ends only once the process has closed: a non-zero ffmpeg exit
 * (missing device, missing binary) is thrown from it as an InputError, even
 * when stdout reached EOF first. kill() is two-stage: SIGTERM, then SIGKILL
 * after 2s.
 */
export class FfmpegCapture implements AudioSource {
  readonly stream: AsyncIterable<Buffer>;

  private process: ChildProcess;
  private _alive = true;
  private stopping = false;
  private stderrTail = '';
  private startError: AsrError | null = null;
  private readonly label: string;
  /** Exit code once stdio has closed; null when killed by a signal. */
  private readonly closed: Promise<number | null>;

  constructor(capture: CaptureConfig, audio: AudioFormat, ffmpegPath = 'ffmpeg') {
    this.label = `${capture.format}:${capture.device}`;

    this.process = spawn(ffmpegPath, buildCaptureArgs(capture, audio), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    this.process.stderr?.on('data', (data: Buffer) => {
      const msg = data.toString().trim();
      if (!msg) return;
      this.stderrTail = msg.slice(-500);
      logger.warn(`ffmpeg capture (${this.label}): ${msg}`);
    });

    this.process.on('exit', () => {
      this._alive = false;
    });

    this.process.on('error', (err) => {
      this._alive = false;
      this.startError = new AsrError('InputError', `cannot start ffmpeg capture: ${err.message}`, { cause: err });
      this.output.destroy(this.startError);
    });

    this.closed = new Promise((resolve) => {
      this.process.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (signal && !this.stopping) {
          logger.warn(`ffmpeg capture (${this.label}): terminated by ${signal}`);
        }
        resolve(code);
      });
      // A process that never started emits no 'close'
      this.process.once('error', () => resolve(null));
    });

    this.stream = this.read();
    logger.debug(`ffmpeg capture spawned for ${this.label}, pid=${this.process.pid}`);
  }

  /** Readable stream of s16le PCM at the configured rate. */
  get output(): Readable {
    const stdout = this.process.stdout;
    if (!stdout) {
      throw new AsrError('InputError', 'ffmpeg capture has no stdout pipe');
    }
    return stdout;
  }

  get alive(): boolean {
    return this._alive;
  }

  stop(): void {
    this.kill();
  }

  private async *read(): AsyncGenerator<Buffer> {
    for await (const data of this.output) {
      if (Buffer.isBuffer(data)) yield data;
    }
    const code = await this.closed;
    if (this.startError) throw this.startError;
    if (code !== 0 && code !== null && !this.stopping) {
      const detail = this.stderrTail ? `: ${this.stderrTail}` : '';
      throw new AsrError('InputError', `ffmpeg capture exited with code ${code}${detail}`);
    }
  }

  /** Gracefully kill the ffmpeg process. Two-stage: SIGTERM, then SIGKILL after 2s. */
  kill(): void {
    if (!this._alive) return;
    this._alive = false;
    this.stopping = true;

    try {
      this.process.kill('SIGTERM');
    } catch (err) {
      logger.debug(`ffmpeg capture (${this.label}) already exited:`, err);
      return;
    }

    const sigkillTimer = setTimeout(() => {
      // Exit already observed: do not signal a reused pid
      if (this.process.exitCode !== null || this.process.signalCode !== null) return;
      try {
        this.process.kill('SIGKILL');
        logger.warn(`ffmpeg capture (${this.label}): SIGTERM ignored, sent SIGKILL (pid=${this.process.pid})`);
      } catch (err) {
        logger.debug(`ffmpeg capture (${this.label}) exited before SIGKILL:`, err);
      }
    }, 2000);
    sigkillTimer.unref();

    this.process.once('exit', () => {
      clearTimeout(sigkillTimer);
    });

    logger.debug(`ffmpeg capture killed (${this.label})`);
  }
}

/** Parse `<format>:<device>`, e.g. `alsa:default`, `avfoundation::0`, `dshow:audio=Microphone`. */
export function parseCaptureSpec(spec: string): CaptureConfig {
  const idx = spec.indexOf(':');
  if (idx <= 0 || idx === spec.length - 1) {
    throw new AsrError(
      'ConfigurationError',
      `capture must look like <format>:<device> (e.g. alsa:default), got "${spec}"`
    );
  }
  return { format: spec.slice(0, idx), device: spec.slice(idx + 1) };
}
