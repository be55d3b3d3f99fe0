import { describe, expect, it } from 'vitest';
import { RemoteProtocolError } from '../../../errors';
import { parseSessionConfig } from '../../../config';
import { buildAudioAppend, buildSessionUpdate, buildTextItem, parseInboundEnvelope } from '../protocol';

const config = parseSessionConfig({
  model: 'test-model',
  voice: 'sage',
  vadEnabled: true,
  functionCallingEnabled: true,
  systemPrompt: '',
  localeFlags: { includeTime: false, includeDate: false }
});

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }

  return undefined;
};

describe('parseInboundEnvelope', () => {
  it('decodes audio deltas from base64 with their turn id', () => {
    const parsed = parseInboundEnvelope(
      JSON.stringify({ type: 'response.audio.delta', turn_id: 4, delta: Buffer.from([1, 2, 3]).toString('base64') })
    );

    expect(parsed).toEqual({ kind: 'event', event: { type: 'audio_delta', turnId: 4, audio: Buffer.from([1, 2, 3]) } });
  });

  it('maps speech events', () => {
    expect(parseInboundEnvelope('{"type":"input_audio_buffer.speech_started"}')).toEqual({
      kind: 'event',
      event: { type: 'speech_started', turnId: undefined }
    });
    expect(parseInboundEnvelope('{"type":"input_audio_buffer.speech_stopped","turn_id":3}')).toEqual({
      kind: 'event',
      event: { type: 'speech_stopped', turnId: 3 }
    });
  });

  it('treats transcript deltas as text deltas', () => {
    expect(parseInboundEnvelope('{"type":"response.audio_transcript.delta","turn_id":2,"delta":"Hi"}')).toEqual({
      kind: 'event',
      event: { type: 'text_delta', turnId: 2, text: 'Hi' }
    });
  });

  it('defaults response.done to completed', () => {
    expect(parseInboundEnvelope('{"type":"response.done","turn_id":2}')).toEqual({
      kind: 'event',
      event: { type: 'response_done', turnId: 2, status: 'completed', text: undefined }
    });
    expect(
      parseInboundEnvelope('{"type":"response.done","turn_id":2,"response":{"status":"cancelled","output_text":"x"}}')
    ).toEqual({ kind: 'event', event: { type: 'response_done', turnId: 2, status: 'cancelled', text: 'x' } });
  });

  it('reads remote response ids', () => {
    expect(parseInboundEnvelope('{"type":"response.created","response":{"id":"resp_1"}}')).toEqual({
      kind: 'event',
      event: { type: 'response_created', turnId: undefined, responseId: 'resp_1' }
    });
    expect(parseInboundEnvelope('{"type":"response.text.delta","response_id":"resp_1","delta":"a"}')).toEqual({
      kind: 'event',
      event: { type: 'text_delta', turnId: undefined, responseId: 'resp_1', text: 'a' }
    });
  });

  it('maps error envelopes', () => {
    expect(parseInboundEnvelope('{"type":"error","error":{"message":"bad","code":"invalid_value"}}')).toEqual({
      kind: 'event',
      event: { type: 'error', message: 'bad', code: 'invalid_value' }
    });
  });

  it('ignores unknown types', () => {
    expect(parseInboundEnvelope('{"type":"rate_limits.updated","rate_limits":[]}')).toEqual({
      kind: 'ignored',
      type: 'rate_limits.updated'
    });
  });

  it('rejects frames that are not JSON', () => {
    const error = catchError(() => parseInboundEnvelope('not json'));

    expect(error).toBeInstanceOf(RemoteProtocolError);
    expect(error).toMatchObject({ remoteCode: 'malformed_frame', message: 'Realtime frame is not valid JSON' });
  });

  it('rejects frames without a type tag', () => {
    expect(catchError(() => parseInboundEnvelope('{"delta":"AA=="}'))).toMatchObject({
      remoteCode: 'malformed_frame',
      message: 'Realtime frame is missing a type tag'
    });
  });

  it('rejects a known type with an invalid payload', () => {
    const error = catchError(() => parseInboundEnvelope('{"type":"response.audio.delta","delta":42}'));

    expect(error).toBeInstanceOf(RemoteProtocolError);
    expect(error).toMatchObject({ remoteCode: 'malformed_event' });
  });

  it('rejects audio deltas that are not base64', () => {
    expect(catchError(() => parseInboundEnvelope('{"type":"response.audio.delta","delta":"@@@"}'))).toMatchObject({
      remoteCode: 'malformed_event',
      message: "Malformed 'response.audio.delta' event: delta: delta must be base64 encoded PCM16"
    });
  });
});

describe('outbound builders', () => {
  const tool = {
    type: 'function' as const,
    name: 'get_time',
    description: 'Returns the current time',
    parameters: { type: 'object', properties: {} }
  };

  it('builds session.update with tools when function calling is enabled', () => {
    expect(buildSessionUpdate(config, 'Be brief.', [tool])).toEqual({
      type: 'session.update',
      session: {
        model: 'test-model',
        voice: 'sage',
        instructions: 'Be brief.',
        modalities: ['text', 'audio'],
        input_audio_format: 'pcm16',
        output_audio_format: 'pcm16',
        turn_detection: null,
        tools: [tool],
        tool_choice: 'auto'
      }
    });
  });

  it('omits tools when function calling is disabled', () => {
    const update = buildSessionUpdate({ ...config, functionCallingEnabled: false }, 'x', [tool]);
    expect(update).toMatchObject({ session: { tools: [], tool_choice: 'none' } });
  });

  it('builds text items and audio appends', () => {
    expect(buildTextItem(5, 'hello')).toEqual({
      type: 'conversation.item.create',
      turn_id: 5,
      item: { type: 'message', role: 'user', content: [{ type: 'input_text', text: 'hello' }] }
    });
    expect(buildAudioAppend(Buffer.from([1, 2, 3]))).toEqual({ type: 'input_audio_buffer.append', audio: 'AQID' });
  });
});
