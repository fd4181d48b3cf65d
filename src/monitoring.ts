import { monitorEventLoopDelay, type IntervalHistogram } from 'perf_hooks';
import type { SessionInfo } from './asr/session.js';
import { logger } from './logger.js';

export interface MonitoringOptions {
  eventLoopLagThresholdMs: number;
  statsIntervalSeconds: number;
  /** Snapshot of the live session, logged at debug level on every stats tick. */
  sessionInfo: () => SessionInfo;
}

let histogram: IntervalHistogram | null = null;
let lagInterval: ReturnType<typeof setInterval> | null = null;
let statsInterval: ReturnType<typeof setInterval> | null = null;

/**
 * Start monitoring event loop lag and session throughput.
 * Sustained lag means audio reaches the service late.
 */
export function startMonitoring(options: MonitoringOptions): void {
  stopMonitoring();

  // Event loop delay monitoring (20ms resolution)
  histogram = monitorEventLoopDelay({ resolution: 20 });
  histogram.enable();

  lagInterval = setInterval(() => {
    const p99Ms = getEventLoopLagMs();
    if (p99Ms !== null && p99Ms > options.eventLoopLagThresholdMs) {
      logger.warn(
        `Event loop lag: p99=${p99Ms.toFixed(1)}ms exceeds threshold ${options.eventLoopLagThresholdMs}ms -- audio may be sent late`
      );
    }
    histogram?.reset();
  }, 10_000);
  lagInterval.unref();

  let lastBytes = 0;
  statsInterval = setInterval(() => {
    const info = options.sessionInfo();
    const rate = (info.bytesSent - lastBytes) / options.statsIntervalSeconds;
    lastBytes = info.bytesSent;
    logger.debug(
      `Session ${info.sessionId ?? '(pending)'} [${info.state}]: ${info.chunksSent} chunks, ` +
      `${info.bytesSent} bytes sent (${rate.toFixed(0)} B/s), ${info.eventsReceived} events`
    );
  }, options.statsIntervalSeconds * 1000);
  statsInterval.unref();

  logger.debug('Monitoring started (event loop lag + session stats)');
}

/** Get current event loop lag p99 in ms. */
export function getEventLoopLagMs(): number | null {
  if (!histogram) return null;
  return histogram.percentile(99) / 1e6;
}

export function stopMonitoring(): void {
  if (histogram) {
    histogram.disable();
    histogram = null;
  }
  if (lagInterval) {
    clearInterval(lagInterval);
    lagInterval = null;
  }
  if (statsInterval) {
    clearInterval(statsInterval);
    statsInterval = null;
  }
}
