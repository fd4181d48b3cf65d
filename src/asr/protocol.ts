import { z } from 'zod';
import { v7 as uuidv7 } from 'uuid';
import type { SessionParameters } from '../types/index.js';
import type { AudioChunk } from './framer.js';
import { AsrError } from './errors.js';

// --- Inbound ---------------------------------------------------------------

type Raw = Record<string, unknown>;

interface EventBase {
  /** Wire `type` field. */
  type: string;
  /** Parsed payload exactly as received. */
  raw: Raw;
}

export type ServiceEvent =
  | (EventBase & { kind: 'sessionCreated'; sessionId: string | null })
  | (EventBase & { kind: 'sessionUpdated'; sessionId: string | null })
  | (EventBase & { kind: 'speechStarted'; itemId: string | null; audioStartMs: number | null })
  | (EventBase & { kind: 'speechStopped'; itemId: string | null; audioEndMs: number | null })
  | (EventBase & { kind: 'transcriptionDelta'; itemId: string | null; text: string; stash: string | null })
  | (EventBase & { kind: 'transcriptionCompleted'; itemId: string | null; transcript: string })
  | (EventBase & { kind: 'error'; code: string | null; message: string })
  | (EventBase & { kind: 'sessionFinished' })
  | (EventBase & { kind: 'unknown' });

export type ServiceEventKind = ServiceEvent['kind'];

export const WireEventType = {
  SessionCreated: 'session.created',
  SessionUpdated: 'session.updated',
  SessionFinished: 'session.finished',
  SpeechStarted: 'input_audio_buffer.speech_started',
  SpeechStopped: 'input_audio_buffer.speech_stopped',
  TranscriptionText: 'conversation.item.input_audio_transcription.text',
  TranscriptionDelta: 'conversation.item.input_audio_transcription.delta',
  TranscriptionCompleted: 'conversation.item.input_audio_transcription.completed',
  TranscriptionFailed: 'conversation.item.input_audio_transcription.failed',
  Error: 'error',
} as const;

const envelopeSchema = z.object({ type: z.string() }).passthrough();

const sessionSchema = z.object({
  session: z.object({ id: z.string().nullish() }).passthrough().nullish(),
});

const speechSchema = z.object({
  item_id: z.string().nullish(),
  audio_start_ms: z.number().nullish(),
  audio_end_ms: z.number().nullish(),
});

const textSchema = z.object({
  item_id: z.string().nullish(),
  text: z.string(),
  stash: z.string().nullish(),
});

const deltaSchema = z.object({
  item_id: z.string().nullish(),
  delta: z.string(),
});

const completedSchema = z.object({
  item_id: z.string().nullish(),
  transcript: z.string(),
});

const errorBodySchema = z
  .object({
    code: z.union([z.string(), z.number()]).nullish(),
    type: z.string().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

const errorSchema = z.object({ error: errorBodySchema });

function parseFields<T extends z.ZodTypeAny>(schema: T, raw: Raw, type: string): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
    throw new AsrError('DecodeError', `malformed ${type} event: ${where}: ${issue?.message ?? 'invalid'}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Decode one inbound text frame into exactly one ServiceEvent.
 * Unrecognized but well-formed messages become `unknown`; anything that is not
 * a JSON object with a string `type` is a DecodeError.
 */
export function decodeServiceEvent(text: string): ServiceEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new AsrError('DecodeError', `inbound message is not valid JSON (${text.length} chars)`, { cause: err });
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    throw new AsrError('DecodeError', 'inbound message is not an object with a string "type"', {
      cause: envelope.error,
    });
  }
  const raw: Raw = envelope.data;
  const type = envelope.data.type;

  switch (type) {
    case WireEventType.SessionCreated: {
      const fields = parseFields(sessionSchema, raw, type);
      return { kind: 'sessionCreated', type, raw, sessionId: fields.session?.id ?? null };
    }
    case WireEventType.SessionUpdated: {
      const fields = parseFields(sessionSchema, raw, type);
      return { kind: 'sessionUpdated', type, raw, sessionId: fields.session?.id ?? null };
    }
    case WireEventType.SpeechStarted: {
      const fields = parseFields(speechSchema, raw, type);
      return {
        kind: 'speechStarted',
        type,
        raw,
        itemId: fields.item_id ?? null,
        audioStartMs: fields.audio_start_ms ?? null,
      };
    }
    case WireEventType.SpeechStopped: {
      const fields = parseFields(speechSchema, raw, type);
      return {
        kind: 'speechStopped',
        type,
        raw,
        itemId: fields.item_id ?? null,
        audioEndMs: fields.audio_end_ms ?? null,
      };
    }
    case WireEventType.TranscriptionText: {
      const fields = parseFields(textSchema, raw, type);
      return {
        kind: 'transcriptionDelta',
        type,
        raw,
        itemId: fields.item_id ?? null,
        text: fields.text,
        stash: fields.stash ?? null,
      };
    }
    case WireEventType.TranscriptionDelta: {
      const fields = parseFields(deltaSchema, raw, type);
      return {
        kind: 'transcriptionDelta',
        type,
        raw,
        itemId: fields.item_id ?? null,
        text: fields.delta,
        stash: null,
      };
    }
    case WireEventType.TranscriptionCompleted: {
      const fields = parseFields(completedSchema, raw, type);
      return {
        kind: 'transcriptionCompleted',
        type,
        raw,
        itemId: fields.item_id ?? null,
        transcript: fields.transcript,
      };
    }
    case WireEventType.Error:
    case WireEventType.TranscriptionFailed: {
      const { error } = parseFields(errorSchema, raw, type);
      const code = error.code ?? error.type ?? null;
      return {
        kind: 'error',
        type,
        raw,
        code: code === null ? null : String(code),
        message: error.message ?? 'service reported an error',
      };
    }
    case WireEventType.SessionFinished:
      return { kind: 'sessionFinished', type, raw };
    default:
      return { kind: 'unknown', type, raw };
  }
}

// --- Outbound --------------------------------------------------------------

export interface ProtocolCodecOptions {
  /** Event id generator. UUIDv7 by default. */
  newEventId?: () => string;
}

/**
 * Serializes client → service messages. Every message is a JSON text frame
 * carrying its own `event_id`.
 */
export class ProtocolCodec {
  private readonly newEventId: () => string;

  constructor(options: ProtocolCodecOptions = {}) {
    this.newEventId = options.newEventId ?? (() => uuidv7());
  }

  /**
   * Session configuration. The model id is not part of the message: the
   * service takes it from the connection URL.
   */
  encodeSessionUpdate(params: SessionParameters): string {
    return JSON.stringify({
      event_id: this.newEventId(),
      type: 'session.update',
      session: {
        modalities: ['text'],
        input_audio_format: 'pcm',
        sample_rate: params.sampleRate,
        input_audio_transcription: {
          language: params.language,
        },
        turn_detection: {
          type: 'server_vad',
          threshold: params.vadThreshold,
          silence_duration_ms: params.vadSilenceMs,
        },
      },
    });
  }

  encodeAudio(chunk: AudioChunk): string {
    return JSON.stringify({
      event_id: this.newEventId(),
      type: 'input_audio_buffer.append',
      audio: chunk.data.toString('base64'),
    });
  }

  encodeSessionFinish(): string {
    return JSON.stringify({
      event_id: this.newEventId(),
      type: 'session.finish',
    });
  }
}

/** Connection URL for a model: `<baseUrl>?model=<model>`, keeping any existing query. */
export function buildSessionUrl(baseUrl: string, model: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('model', model);
  return url.toString();
}
