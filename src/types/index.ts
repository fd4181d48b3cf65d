/** Audio format of the input stream. Fixed for a run, never negotiated. */
export interface AudioFormat {
  sampleRate: number;
  /** Bytes per sample (s16le = 2). */
  bytesPerSample: number;
  channels: number;
}

/** Parameters sent to the service in the session-configuration message. */
export interface SessionParameters {
  model: string;
  sampleRate: number;
  language: string;
  /** Server VAD speech probability threshold, [0, 1]. */
  vadThreshold: number;
  /** Silence (ms) after which the server closes a speech turn. */
  vadSilenceMs: number;
}

/** Timing and buffering policy of the session engine. */
export interface SessionPolicy {
  chunkBytes: number;
  /** Outbound bytes allowed in flight before sends start blocking the input. */
  maxBufferedBytes: number;
  connectTimeoutMs: number;
  configureTimeoutMs: number;
  drainTimeoutMs: number;
  /** Hard bound after a stop request before the session is forced closed. */
  stopDeadlineMs: number;
  /** Keep relaying events after input ends until stopped or the server closes. */
  keep: boolean;
}

export interface CaptureConfig {
  /** ffmpeg input format (`alsa`, `avfoundation`, `dshow`, `pulse`, ...). */
  format: string;
  device: string;
}

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  session: SessionParameters;
  audio: AudioFormat;
  policy: SessionPolicy;
  capture: CaptureConfig | null;
  eventLoopLagThresholdMs: number;
  statsIntervalSeconds: number;
}
