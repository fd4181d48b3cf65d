import { EventEmitter } from 'events';
import type { AudioFormat, SessionParameters, SessionPolicy } from '../types/index.js';
import { AudioFramer, type AudioChunk } from './framer.js';
import { ProtocolCodec, decodeServiceEvent, type ServiceEvent } from './protocol.js';
import type { EventSink } from './event-sink.js';
import { describeClose, type Transport } from './transport.js';
import { AsrError, toAsrError } from './errors.js';
import { logger } from '../logger.js';

export type SessionState = 'connecting' | 'configuring' | 'streaming' | 'draining' | 'closed' | 'failed';

export interface SessionInfo {
  /** Assigned by the service in its acknowledgement; null until then. */
  sessionId: string | null;
  state: SessionState;
  parameters: SessionParameters;
  /** Audio bytes sent so far. */
  bytesSent: number;
  chunksSent: number;
  eventsReceived: number;
}

export type SessionOutcome =
  | { state: 'closed'; info: SessionInfo; cancelled: string | null }
  | { state: 'failed'; info: SessionInfo; error: AsrError };

export interface TranscriptionSessionOptions {
  parameters: SessionParameters;
  audio: AudioFormat;
  policy: SessionPolicy;
  /** Owned by this session for its whole life; closed on teardown. */
  transport: Transport;
  sink: EventSink;
  codec?: ProtocolCodec;
}

/**
 * One streaming transcription session: connect, configure, stream audio,
 * drain, close.
 *
 * Inbound events are relayed to the sink in arrival order whatever the state.
 * VAD events (speech started/stopped) are relayed only; turn-taking belongs to
 * the service. Outbound audio is sent only while streaming, and nothing is
 * sent once the session is closed or failed.
 *
 * Emits 'state' (state, previous), 'event' (ServiceEvent) and 'chunk'
 * (AudioChunk, after it was handed to the transport).
 */
export class TranscriptionSession extends EventEmitter {
  private readonly parameters: SessionParameters;
  private readonly policy: SessionPolicy;
  private readonly transport: Transport;
  private readonly sink: EventSink;
  private readonly codec: ProtocolCodec;
  private readonly framer: AudioFramer;

  private _state: SessionState = 'connecting';
  private started = false;
  private sessionId: string | null = null;
  private bytesSent = 0;
  private chunksSent = 0;
  private eventsReceived = 0;

  private acked = false;
  private inputEnded = false;
  private stopReason: string | null = null;
  /** Aborted on a stop request or when the session ends; interrupts the input read. */
  private readonly inputHalt = new AbortController();

  private settle: ((outcome: SessionOutcome) => void) | null = null;
  private ackResolver: ((acked: boolean) => void) | null = null;
  private drainResolver: (() => void) | null = null;
  private keepResolver: (() => void) | null = null;
  private timers = new Set<ReturnType<typeof setTimeout>>();

  constructor(options: TranscriptionSessionOptions) {
    super();
    this.parameters = { ...options.parameters };
    this.policy = options.policy;
    this.transport = options.transport;
    this.sink = options.sink;
    this.codec = options.codec ?? new ProtocolCodec();
    this.framer = new AudioFramer({
      chunkBytes: options.policy.chunkBytes,
      frameBytes: options.audio.bytesPerSample * options.audio.channels,
    });
  }

  get state(): SessionState {
    return this._state;
  }

  get terminal(): boolean {
    return this._state === 'closed' || this._state === 'failed';
  }

  get info(): SessionInfo {
    return {
      sessionId: this.sessionId,
      state: this._state,
      parameters: { ...this.parameters },
      bytesSent: this.bytesSent,
      chunksSent: this.chunksSent,
      eventsReceived: this.eventsReceived,
    };
  }

  /**
   * Run the session over `input` until it closes or fails. Never rejects: the
   * outcome carries the error of a failed session. Aborting `signal` drains
   * the session gracefully; it is forced closed if still running after
   * `stopDeadlineMs`.
   */
  async run(input: AsyncIterable<Buffer>, signal?: AbortSignal): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error('TranscriptionSession.run() may only be called once');
    }
    this.started = true;

    const outcome = new Promise<SessionOutcome>((resolve) => {
      this.settle = resolve;
    });

    const onAbort = () => this.requestStop(describeAbortReason(signal));
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.drive(input).catch((err: unknown) => {
      this.fail(toAsrError(err, 'TransportError'));
    });

    try {
      return await outcome;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Graceful stop: finish sending buffered audio, then drain. */
  requestStop(reason = 'stop requested'): void {
    if (this.terminal || this.stopReason !== null) return;
    this.stopReason = reason;
    logger.info(`Stop requested (${reason}) in state ${this._state}, draining session`);

    this.inputHalt.abort();
    this.keepResolver?.();
    this.schedule(() => this.forceClose(reason), this.policy.stopDeadlineMs);
  }

  // --- Lifecycle -----------------------------------------------------------

  private async drive(input: AsyncIterable<Buffer>): Promise<void> {
    try {
      await this.transport.connect({
        message: (text) => this.handleMessage(text),
        close: (code, reason) => this.handleClose(code, reason),
        error: (err) => this.handleTransportError(err),
      });
    } catch (err) {
      this.fail(toAsrError(err, 'ConnectFailure', 'connect failed'));
      return;
    }
    if (this.terminal) {
      this.transport.close();
      return;
    }

    this.transition('configuring');
    const acked = this.waitForAck();
    try {
      await this.sendFrame(this.codec.encodeSessionUpdate(this.parameters));
    } catch (err) {
      this.fail(toAsrError(err, 'TransportError'));
      return;
    }
    if (!(await acked)) return;

    this.transition('streaming');
    logger.info(
      `Session ${this.sessionId ?? '(no id)'} streaming: model=${this.parameters.model}, ` +
      `rate=${this.parameters.sampleRate}Hz, language=${this.parameters.language}`
    );

    await this.pump(input);
    if (this._state !== 'streaming') return;

    if (this.inputEnded && this.policy.keep && this.stopReason === null) {
      logger.info('Input ended; keeping session open until stopped');
      await new Promise<void>((resolve) => {
        this.keepResolver = resolve;
      });
      this.keepResolver = null;
      if (this._state !== 'streaming') return;
    }

    await this.drain();
  }

  /** Read input, frame it and send every chunk. Returns at end of input or stop. */
  private async pump(input: AsyncIterable<Buffer>): Promise<void> {
    try {
      for await (const burst of untilAborted(input, this.inputHalt.signal)) {
        if (this._state !== 'streaming') return;
        // Every chunk cut from this burst goes out before a stop is acted on
        for (const chunk of this.framer.push(burst)) {
          await this.sendChunk(chunk);
          if (this._state !== 'streaming') return;
        }
      }
      if (this._state !== 'streaming') return;
      this.inputEnded = !this.inputHalt.signal.aborted;
      logger.debug(`Input ${this.inputEnded ? 'ended' : 'stopped'} after ${this.bytesSent + this.framer.buffered} bytes`);

      const last = this.framer.flush();
      if (last) await this.sendChunk(last);
    } catch (err) {
      if (this.terminal) return;
      this.fail(toAsrError(err, 'InputError', 'audio input failed'));
    }
  }

  private async drain(): Promise<void> {
    this.transition('draining');
    const finished = new Promise<void>((resolve) => {
      this.drainResolver = resolve;
    });
    const timer = this.schedule(() => {
      logger.warn(`No session.finished within ${this.policy.drainTimeoutMs}ms, closing`);
      this.drainResolver?.();
    }, this.policy.drainTimeoutMs);

    try {
      await this.sendFrame(this.codec.encodeSessionFinish());
    } catch (err) {
      this.fail(toAsrError(err, 'TransportError'));
      return;
    }

    await finished;
    this.clearTimer(timer);
    this.close();
  }

  private waitForAck(): Promise<boolean> {
    if (this.acked) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const timer = this.schedule(() => {
        this.fail(new AsrError(
          'ConfigurationRejected',
          `no session acknowledgement within ${this.policy.configureTimeoutMs}ms`
        ));
      }, this.policy.configureTimeoutMs);
      this.ackResolver = (acked) => {
        this.clearTimer(timer);
        this.ackResolver = null;
        resolve(acked);
      };
    });
  }

  // --- Outbound ------------------------------------------------------------

  private async sendChunk(chunk: AudioChunk): Promise<void> {
    if (this._state !== 'streaming') return;
    await this.sendFrame(this.codec.encodeAudio(chunk));
    this.bytesSent += chunk.data.length;
    this.chunksSent++;
    this.emit('chunk', chunk);
  }

  private async sendFrame(frame: string): Promise<void> {
    if (this.terminal) {
      throw new AsrError('TransportError', `cannot send in state ${this._state}`);
    }
    try {
      await this.transport.send(frame);
    } catch (err) {
      throw toAsrError(err, 'TransportError', 'send failed');
    }
  }

  // --- Inbound -------------------------------------------------------------

  private handleMessage(text: string): void {
    if (this.terminal) return;

    let event: ServiceEvent;
    try {
      event = decodeServiceEvent(text);
    } catch (err) {
      this.fail(toAsrError(err, 'DecodeError'));
      return;
    }

    this.eventsReceived++;
    this.sink.write(event);
    this.emit('event', event);

    switch (event.kind) {
      case 'sessionCreated':
      case 'sessionUpdated':
        if (event.sessionId) this.sessionId = event.sessionId;
        if (this._state === 'connecting' || this._state === 'configuring') {
          this.acked = true;
          this.ackResolver?.(true);
        }
        break;
      case 'error':
        if (this._state === 'connecting' || this._state === 'configuring') {
          this.fail(new AsrError(
            'ConfigurationRejected',
            `service rejected the session configuration: ${event.message}`,
            { payload: event.raw }
          ));
        } else {
          logger.warn(`Service error${event.code ? ` (${event.code})` : ''}: ${event.message}`);
        }
        break;
      case 'sessionFinished':
        if (this._state === 'draining') this.drainResolver?.();
        break;
      case 'unknown':
        logger.debug(`Relaying unrecognized event type ${event.type}`);
        break;
      default:
        break;
    }
  }

  private handleClose(code: number, reason: string): void {
    if (this.terminal) return;
    if (this._state === 'draining') {
      logger.debug(`Service closed the connection while draining (${describeClose(code, reason)})`);
      this.drainResolver?.();
      return;
    }
    if (this._state === 'streaming' && this.policy.keep && this.inputEnded) {
      logger.info(`Service closed the connection (${describeClose(code, reason)})`);
      this.close();
      return;
    }
    this.fail(new AsrError('TransportError', `connection closed unexpectedly (${describeClose(code, reason)})`));
  }

  private handleTransportError(err: Error): void {
    if (this.terminal) return;
    this.fail(toAsrError(err, 'TransportError', 'transport error'));
  }

  // --- Terminal states -----------------------------------------------------

  private close(): void {
    if (this.terminal) return;
    this.transition('closed');
    this.teardown();
    logger.info(
      `Session ${this.sessionId ?? '(no id)'} closed: ${this.chunksSent} chunks, ` +
      `${this.bytesSent} bytes sent, ${this.eventsReceived} events received`
    );
    this.settle?.({ state: 'closed', info: this.info, cancelled: null });
  }

  private forceClose(reason: string): void {
    if (this.terminal) return;
    logger.warn(`Stop deadline of ${this.policy.stopDeadlineMs}ms elapsed in state ${this._state}, forcing close`);
    this.transition('closed');
    this.teardown();
    this.sink.reportCancelled(reason);
    this.settle?.({ state: 'closed', info: this.info, cancelled: reason });
  }

  private fail(error: AsrError): void {
    if (this.terminal) return;
    logger.error(`Session failed in state ${this._state}: ${error.kind}: ${error.message}`);
    this.transition('failed');
    this.teardown();
    this.sink.reportFailure(error);
    this.settle?.({ state: 'failed', info: this.info, error });
  }

  private teardown(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.inputHalt.abort();
    this.transport.close();
    this.ackResolver?.(false);
    this.drainResolver?.();
    this.keepResolver?.();
  }

  private transition(next: SessionState): void {
    const previous = this._state;
    this._state = next;
    logger.debug(`Session state ${previous} -> ${next}`);
    this.emit('state', next, previous);
  }

  private schedule(fn: () => void, ms: number): ReturnType<typeof setTimeout> {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    this.timers.add(timer);
    return timer;
  }

  private clearTimer(timer: ReturnType<typeof setTimeout>): void {
    clearTimeout(timer);
    this.timers.delete(timer);
  }
}

function describeAbortReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error && reason.name !== 'AbortError') return reason.message;
  return 'stop requested';
}

/**
 * Iterate `source` until it ends or `signal` aborts. A read still pending at
 * abort is abandoned; the source is asked to return.
 */
async function* untilAborted<T>(source: AsyncIterable<T>, signal: AbortSignal): AsyncGenerator<T> {
  if (signal.aborted) return;
  const iterator = source[Symbol.asyncIterator]();
  const aborted = new Promise<'aborted'>((resolve) => {
    signal.addEventListener('abort', () => resolve('aborted'), { once: true });
  });

  let finished = false;
  try {
    while (true) {
      const next = iterator.next();
      const result = await Promise.race([next, aborted]);
      if (result === 'aborted') {
        void next.catch((err: unknown) => logger.debug('Input read abandoned at stop:', err));
        return;
      }
      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!finished && iterator.return) {
      void iterator.return().catch((err: unknown) => logger.debug('Input source did not close cleanly:', err));
    }
  }
}
