import { z } from 'zod';
import { isLanguageCode, type LanguageCode } from '@parley/shared';

const languageSchema = z.custom<LanguageCode>((value) => isLanguageCode(value), {
  message: 'Unsupported language',
});

const id = z.string().trim().min(1).max(128);

const agentStart = z.object({
  type: z.literal('agent:start'),
  payload: z.object({
    sessionId: id,
    participantId: id,
    language: languageSchema,
    preferences: z
      .object({
        formalTone: z.boolean().optional(),
        preserveEmotion: z.boolean().optional(),
      })
      .optional(),
    voiceId: z.string().min(1).optional(),
  }),
});

const agentStop = z.object({
  type: z.literal('agent:stop'),
  payload: z.object({}).optional(),
});

const participantJoined = z.object({
  type: z.literal('participant:joined'),
  payload: z.object({ participantId: id, language: languageSchema }),
});

const participantLeft = z.object({
  type: z.literal('participant:left'),
  payload: z.object({ participantId: id }),
});

const audioChunk = z.object({
  type: z.literal('audio:chunk'),
  payload: z.object({
    sourceId: id,
    trackId: id,
    audioData: z.string().min(1).base64(),
  }),
});

const transcript = z.object({
  sourceId: id,
  text: z.string(),
  confidence: z.number().finite(),
});

const sttInterim = z.object({ type: z.literal('stt:interim'), payload: transcript });
const sttFinal = z.object({ type: z.literal('stt:final'), payload: transcript });

const speaker = z.object({ participantId: id });
const speakerStart = z.object({ type: z.literal('speaker:start'), payload: speaker });
const speakerStop = z.object({ type: z.literal('speaker:stop'), payload: speaker });

export const clientMessageSchema = z.discriminatedUnion('type', [
  agentStart,
  agentStop,
  participantJoined,
  participantLeft,
  audioChunk,
  sttInterim,
  sttFinal,
  speakerStart,
  speakerStop,
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ParseResult = { ok: true; message: ClientMessage } | { ok: false; error: string };

export function parseClientMessage(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Invalid message format' };
  }

  const parsed = clientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `Invalid message (${where}${issue.message})` };
  }
  return { ok: true, message: parsed.data };
}
