import type { LanguageCode, SegmentUpdate } from '@parley/shared';
import type { TranslationAgent } from './translationAgent.js';

// What an agent needs from the session it runs in
export interface AgentSession {
  readonly sessionId: string;
  join(agent: TranslationAgent): void;
  leave(participantId: string): void;
  registerParticipant(participantId: string, language: LanguageCode): void;
  submit(agentId: string, update: SegmentUpdate): boolean;
  discard(agentId: string, segmentId: string, speakerId: string): boolean;
  setCurrentSpeaker(participantId: string | null): void;
  getCurrentSpeaker(): string | null;
  acceptsTranslatedAudio(sourceId: string, targetId: string): boolean;
}
