import { z } from 'zod';
import { RemoteProtocolError } from '../../errors';
import type { SessionConfig } from '../../types';

export type ResponseModality = 'text' | 'audio';

export interface RealtimeToolDefinition {
  type: 'function';
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface SessionUpdatePayload {
  model: string;
  voice: string;
  instructions: string;
  modalities: ResponseModality[];
  input_audio_format: 'pcm16';
  output_audio_format: 'pcm16';
  turn_detection: null;
  tools: RealtimeToolDefinition[];
  tool_choice: 'auto' | 'none';
}

export interface InputTextContent {
  type: 'input_text';
  text: string;
}

export interface ConversationMessageItem {
  type: 'message';
  role: 'user';
  content: InputTextContent[];
}

export type OutboundEnvelope =
  | { type: 'session.update'; session: SessionUpdatePayload }
  | { type: 'input_audio_buffer.append'; audio: string }
  | { type: 'input_audio_buffer.commit'; turn_id: number }
  | { type: 'conversation.item.create'; turn_id: number; item: ConversationMessageItem }
  | { type: 'response.create'; turn_id: number; response: { modalities: ResponseModality[] } }
  | { type: 'response.cancel'; turn_id: number };

export type OutboundEnvelopeType = OutboundEnvelope['type'];

export type ResponseStatus = 'completed' | 'cancelled' | 'failed' | 'incomplete';

// `responseId` is the remote response id; the transport maps it to a turn id.
export type InboundEvent =
  | { type: 'speech_started'; turnId?: number }
  | { type: 'speech_stopped'; turnId?: number }
  | { type: 'response_created'; turnId?: number; responseId?: string }
  | { type: 'audio_delta'; turnId?: number; responseId?: string; audio: Buffer }
  | { type: 'text_delta'; turnId?: number; responseId?: string; text: string }
  | { type: 'response_done'; turnId?: number; responseId?: string; status: ResponseStatus; text?: string }
  | { type: 'error'; message: string; code?: string };

export type ParsedEnvelope =
  | { kind: 'event'; event: InboundEvent }
  | { kind: 'ignored'; type: string };

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const turnIdField = z.number().int().nonnegative().optional();

const speechStartedSchema = z.object({
  type: z.literal('input_audio_buffer.speech_started'),
  turn_id: turnIdField
});

const speechStoppedSchema = z.object({
  type: z.literal('input_audio_buffer.speech_stopped'),
  turn_id: turnIdField
});

const responseIdField = z.string().min(1).optional();

const responseCreatedSchema = z.object({
  type: z.literal('response.created'),
  turn_id: turnIdField,
  response: z.object({ id: responseIdField }).optional()
});

const audioDeltaSchema = z.object({
  type: z.literal('response.audio.delta'),
  turn_id: turnIdField,
  response_id: responseIdField,
  delta: z.string().regex(BASE64_PATTERN, 'delta must be base64 encoded PCM16')
});

const textDeltaSchema = z.object({
  type: z.enum(['response.text.delta', 'response.audio_transcript.delta']),
  turn_id: turnIdField,
  response_id: responseIdField,
  delta: z.string()
});

const responseDoneSchema = z.object({
  type: z.literal('response.done'),
  turn_id: turnIdField,
  response: z
    .object({
      id: responseIdField,
      status: z.enum(['completed', 'cancelled', 'failed', 'incomplete']).optional(),
      output_text: z.string().optional()
    })
    .optional()
});

const errorSchema = z.object({
  type: z.literal('error'),
  error: z.object({
    message: z.string(),
    code: z.string().nullish(),
    type: z.string().optional()
  })
});

const RECOGNIZED_TYPES = new Set<string>([
  'input_audio_buffer.speech_started',
  'input_audio_buffer.speech_stopped',
  'response.created',
  'response.audio.delta',
  'response.text.delta',
  'response.audio_transcript.delta',
  'response.done',
  'error'
]);

const envelopeHeaderSchema = z.object({ type: z.string().min(1) }).passthrough();

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

const parseWith = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, type: string): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RemoteProtocolError(
      `Malformed '${type}' event: ${describeIssues(result.error)}`,
      'malformed_event'
    );
  }

  return result.data;
};

const toInboundEvent = (type: string, value: unknown): InboundEvent => {
  switch (type) {
    case 'input_audio_buffer.speech_started': {
      const parsed = parseWith(speechStartedSchema, value, type);
      return { type: 'speech_started', turnId: parsed.turn_id };
    }
    case 'input_audio_buffer.speech_stopped': {
      const parsed = parseWith(speechStoppedSchema, value, type);
      return { type: 'speech_stopped', turnId: parsed.turn_id };
    }
    case 'response.created': {
      const parsed = parseWith(responseCreatedSchema, value, type);
      return { type: 'response_created', turnId: parsed.turn_id, responseId: parsed.response?.id };
    }
    case 'response.audio.delta': {
      const parsed = parseWith(audioDeltaSchema, value, type);
      return {
        type: 'audio_delta',
        turnId: parsed.turn_id,
        responseId: parsed.response_id,
        audio: Buffer.from(parsed.delta, 'base64')
      };
    }
    case 'response.text.delta':
    case 'response.audio_transcript.delta': {
      const parsed = parseWith(textDeltaSchema, value, type);
      return { type: 'text_delta', turnId: parsed.turn_id, responseId: parsed.response_id, text: parsed.delta };
    }
    case 'response.done': {
      const parsed = parseWith(responseDoneSchema, value, type);
      return {
        type: 'response_done',
        turnId: parsed.turn_id,
        responseId: parsed.response?.id,
        status: parsed.response?.status ?? 'completed',
        text: parsed.response?.output_text
      };
    }
    default: {
      const parsed = parseWith(errorSchema, value, type);
      return {
        type: 'error',
        message: parsed.error.message,
        code: parsed.error.code ?? parsed.error.type
      };
    }
  }
};

/**
 * Decodes one inbound frame. Unknown envelope types are reported as ignored;
 * a frame that is not a JSON envelope, or a known type with an invalid
 * payload, throws `RemoteProtocolError`.
 */
export const parseInboundEnvelope = (raw: string): ParsedEnvelope => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new RemoteProtocolError('Realtime frame is not valid JSON', 'malformed_frame', {
      cause: error
    });
  }

  const header = envelopeHeaderSchema.safeParse(value);
  if (!header.success) {
    throw new RemoteProtocolError('Realtime frame is missing a type tag', 'malformed_frame');
  }

  const type = header.data.type;
  if (!RECOGNIZED_TYPES.has(type)) {
    return { kind: 'ignored', type };
  }

  return { kind: 'event', event: toInboundEvent(type, value) };
};

export const encodeEnvelope = (envelope: OutboundEnvelope): string => JSON.stringify(envelope);

export const buildSessionUpdate = (
  config: SessionConfig,
  instructions: string,
  tools: RealtimeToolDefinition[] = []
): OutboundEnvelope => ({
  type: 'session.update',
  session: {
    model: config.model,
    voice: config.voice,
    instructions,
    modalities: ['text', 'audio'],
    input_audio_format: 'pcm16',
    output_audio_format: 'pcm16',
    // Turn boundaries come from the local VAD or the operator, never the remote side.
    turn_detection: null,
    tools: config.functionCallingEnabled ? tools : [],
    tool_choice: config.functionCallingEnabled && tools.length > 0 ? 'auto' : 'none'
  }
});

export const buildTextItem = (turnId: number, text: string): OutboundEnvelope => ({
  type: 'conversation.item.create',
  turn_id: turnId,
  item: {
    type: 'message',
    role: 'user',
    content: [{ type: 'input_text', text }]
  }
});

export const buildAudioAppend = (audio: Buffer): OutboundEnvelope => ({
  type: 'input_audio_buffer.append',
  audio: audio.toString('base64')
});
