import { describe, it, expect } from 'vitest';
import { EventSink } from '../../src/asr/event-sink.js';
import { AsrError } from '../../src/asr/errors.js';
import { decodeServiceEvent } from '../../src/asr/protocol.js';
import { lineCollector } from '../helpers/push-source.js';

describe('EventSink', () => {
  it('writes the service payload as one line per event', () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);

    sink.write(decodeServiceEvent('{"type":"input_audio_buffer.speech_started","audio_start_ms":0}'));
    sink.write(decodeServiceEvent('{"type":"conversation.item.input_audio_transcription.completed","transcript":"ok"}'));

    expect(output.lines()).toEqual([
      '{"type":"input_audio_buffer.speech_started","audio_start_ms":0}',
      '{"type":"conversation.item.input_audio_transcription.completed","transcript":"ok"}',
    ]);
    expect(sink.count).toBe(2);
  });

  it('escapes newlines inside transcripts so every record stays on one line', () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);
    sink.write(decodeServiceEvent(JSON.stringify({
      type: 'conversation.item.input_audio_transcription.completed',
      transcript: 'line one\nline two',
    })));

    expect(output.lines()).toHaveLength(1);
    expect(JSON.parse(output.lines()[0]).transcript).toBe('line one\nline two');
  });

  it('reports a failure with its kind and the service payload', () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);
    sink.reportFailure(new AsrError('ConfigurationRejected', 'rejected', { payload: { type: 'error' } }));
    sink.reportFailure(new AsrError('TransportError', 'gone'));

    expect(output.lines()).toEqual([
      '{"type":"client.error","error":{"kind":"ConfigurationRejected","message":"rejected","payload":{"type":"error"}}}',
      '{"type":"client.error","error":{"kind":"TransportError","message":"gone"}}',
    ]);
    expect(sink.count).toBe(0);
  });

  it('reports a cancellation', () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);
    sink.reportCancelled('SIGINT');
    expect(output.lines()).toEqual(['{"type":"client.cancelled","reason":"SIGINT"}']);
  });

  it('drops records once the output is destroyed', async () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);
    output.stream.destroy();

    sink.reportCancelled('SIGINT');
    await sink.flush();
    expect(output.lines()).toEqual([]);
  });

  it('flush resolves after pending writes', async () => {
    const output = lineCollector();
    const sink = new EventSink(output.stream);
    sink.write(decodeServiceEvent('{"type":"session.finished"}'));
    await sink.flush();
    expect(output.lines()).toEqual(['{"type":"session.finished"}']);
  });
});
