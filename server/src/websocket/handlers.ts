import type { LanguageCode, TranscriptEventKind, TranslationPreferences, TranslationResult } from '@parley/shared';
import { TranslationAgent } from '../agents/translationAgent.js';
import { SessionFullError, errorMessage } from '../errors.js';
import type { SessionRegistry } from '../session/sessionRegistry.js';
import type { RecognizerFactory } from '../stt/recognizer.js';
import type { TranscriptAdapterOptions } from '../stt/transcriptAdapter.js';
import type { SpeechSynthesizer } from '../tts/types.js';
import type { BridgeClient, ClientDirectory } from './clients.js';
import type { ClientMessage } from './messages.js';

export interface BridgeContext {
  clients: ClientDirectory;
  registry: SessionRegistry;
  recognizerFactory: RecognizerFactory;
  synthesizer: SpeechSynthesizer;
  transcripts?: Omit<TranscriptAdapterOptions, 'createSegmentId'>;
}

interface AgentStart {
  sessionId: string;
  participantId: string;
  language: LanguageCode;
  preferences?: Partial<TranslationPreferences>;
  voiceId?: string;
}

export async function handleMessage(client: BridgeClient, message: ClientMessage, ctx: BridgeContext): Promise<void> {
  if (message.type !== 'audio:chunk') {
    console.log(`[Bridge] Message from ${client.id}:`, message.type);
  }

  switch (message.type) {
    case 'agent:start':
      handleAgentStart(client, message.payload, ctx);
      return;

    case 'agent:stop':
      await stopClientAgent(client, ctx);
      return;

    default:
      break;
  }

  const agent = client.agent;
  if (!agent) {
    ctx.clients.sendError(client, 'No agent running on this connection', 'NO_AGENT');
    return;
  }

  switch (message.type) {
    case 'participant:joined':
      try {
        agent.onRemoteParticipantJoined(message.payload.participantId, message.payload.language);
      } catch (error) {
        if (!(error instanceof SessionFullError)) throw error;
        ctx.clients.sendError(client, error.message, 'SESSION_FULL');
      }
      break;

    case 'participant:left':
      agent.onRemoteParticipantLeft(message.payload.participantId);
      break;

    case 'audio:chunk': {
      const { sourceId, trackId, audioData } = message.payload;
      agent.pushAudio(sourceId, trackId, Buffer.from(audioData, 'base64'));
      break;
    }

    case 'stt:interim':
    case 'stt:final': {
      const kind: TranscriptEventKind = message.type === 'stt:final' ? 'final' : 'interim';
      const { sourceId, text, confidence } = message.payload;
      agent.pushTranscript(sourceId, { kind, text, confidence });
      break;
    }

    case 'speaker:start':
      agent.onSpeakingChanged(message.payload.participantId, true);
      break;

    case 'speaker:stop':
      agent.onSpeakingChanged(message.payload.participantId, false);
      break;
  }
}

function handleAgentStart(client: BridgeClient, payload: AgentStart, ctx: BridgeContext): void {
  const { sessionId, participantId, language } = payload;

  if (client.agent) {
    ctx.clients.sendError(client, 'An agent is already running on this connection', 'AGENT_RUNNING');
    return;
  }

  const session = ctx.registry.getOrCreate(sessionId);
  if (session.getAgent(participantId)) {
    ctx.clients.sendError(client, `Participant ${participantId} already has an agent`, 'DUPLICATE_AGENT');
    return;
  }

  const agent = new TranslationAgent({
    participantId,
    language,
    preferences: payload.preferences,
    voiceId: payload.voiceId,
    recognizerFactory: ctx.recognizerFactory,
    synthesizer: ctx.synthesizer,
    output: ctx.clients.audioOutput(client),
    transcripts: ctx.transcripts,
    onTranslation: (result: TranslationResult) => {
      ctx.clients.send(client, 'translation:complete', result);
    },
  });

  // Bound before joining so the routing controls issued on join reach this client
  client.sessionId = sessionId;
  client.agent = agent;

  try {
    agent.start(session);
  } catch (error) {
    client.sessionId = undefined;
    client.agent = undefined;
    const code = error instanceof SessionFullError ? 'SESSION_FULL' : 'AGENT_START_FAILED';
    ctx.clients.sendError(client, errorMessage(error), code);
    releaseSession(sessionId, ctx);
    return;
  }

  session.getRouting().syncControls();
  console.log(`[Bridge] Agent ${participantId} (${language}) started for client ${client.id} in ${sessionId}`);

  broadcastSessionState(sessionId, ctx);
}

/**
 * Stop the agent a connection runs, if any, and drop its session once empty.
 * Also used when the connection closes.
 */
export async function stopClientAgent(client: BridgeClient, ctx: BridgeContext): Promise<void> {
  const { agent, sessionId } = client;
  client.agent = undefined;
  client.sessionId = undefined;
  if (!agent || !sessionId) return;

  await agent.stop();
  const destroyed = await ctx.registry.release(sessionId);
  if (!destroyed) {
    broadcastSessionState(sessionId, ctx);
  }
}

export function broadcastSessionState(sessionId: string, ctx: BridgeContext): void {
  const session = ctx.registry.get(sessionId);
  if (!session) return;

  const stats = session.getStats();
  for (const member of ctx.clients.inSession(sessionId)) {
    ctx.clients.send(member, 'session:state', {
      clientId: member.id,
      participantId: member.agent?.participantId ?? null,
      sessionId,
      participants: stats.participants,
      currentSpeaker: stats.currentSpeaker,
      routing: stats.routing,
    });
  }
}

function releaseSession(sessionId: string, ctx: BridgeContext): void {
  ctx.registry.release(sessionId).catch((error: unknown) => {
    console.error(`[Bridge] Failed to release session ${sessionId}:`, errorMessage(error));
  });
}
