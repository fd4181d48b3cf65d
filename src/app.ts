import type { Readable, Writable } from 'stream';
import type { AppConfig } from './types/index.js';
import { EventSink } from './asr/event-sink.js';
import { buildSessionUrl } from './asr/protocol.js';
import { TranscriptionSession, type SessionOutcome } from './asr/session.js';
import { WsTransport, type Transport } from './asr/transport.js';
import { FfmpegCapture, stdinSource, type AudioSource } from './asr/audio-source.js';
import { startMonitoring, stopMonitoring } from './monitoring.js';
import { logger } from './logger.js';

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Cancelled: 130,
} as const;

export interface RunDependencies {
  stdin: Readable;
  stdout: Writable;
  /** Aborted on SIGINT/SIGTERM. */
  signal: AbortSignal;
  /** Defaults to a WebSocket transport to the configured endpoint. */
  transport?: Transport;
  /** Defaults to stdin, or an ffmpeg capture when one is configured. */
  source?: AudioSource;
}

export function exitCodeFor(outcome: SessionOutcome): number {
  if (outcome.state === 'failed') return ExitCode.Failure;
  return outcome.cancelled === null ? ExitCode.Ok : ExitCode.Cancelled;
}

function createSource(config: AppConfig, stdin: Readable): AudioSource {
  if (config.capture) {
    logger.info(`Capturing ${config.capture.format}:${config.capture.device} via ffmpeg`);
    return new FfmpegCapture(config.capture, config.audio);
  }
  return stdinSource(stdin);
}

/** Run one transcription session end to end and return the process exit code. */
export async function runTranscription(config: AppConfig, deps: RunDependencies): Promise<number> {
  const sink = new EventSink(deps.stdout);
  const transport = deps.transport ?? new WsTransport({
    url: buildSessionUrl(config.baseUrl, config.session.model),
    apiKey: config.apiKey,
    maxBufferedBytes: config.policy.maxBufferedBytes,
    connectTimeoutMs: config.policy.connectTimeoutMs,
  });
  const session = new TranscriptionSession({
    parameters: config.session,
    audio: config.audio,
    policy: config.policy,
    transport,
    sink,
  });
  const source = deps.source ?? createSource(config, deps.stdin);

  startMonitoring({
    eventLoopLagThresholdMs: config.eventLoopLagThresholdMs,
    statsIntervalSeconds: config.statsIntervalSeconds,
    sessionInfo: () => session.info,
  });

  try {
    const outcome = await session.run(source.stream, deps.signal);
    if (outcome.state === 'failed') {
      logger.error(`Transcription failed (${outcome.error.kind}): ${outcome.error.message}`);
    } else if (outcome.cancelled !== null) {
      logger.warn(`Transcription cancelled: ${outcome.cancelled}`);
    }
    return exitCodeFor(outcome);
  } finally {
    stopMonitoring();
    source.stop();
    await sink.flush();
  }
}
