/**
 * Session Coordinator
 *
 * Tracks every agent in one call. Owns the session's translation buffer and
 * routing policy; when the buffer dispatches a speaker's segment, fans it out
 * to one translation request per listening agent whose language differs.
 */

import type {
  LanguageCode,
  Segment,
  SegmentUpdate,
  SessionStats,
  TranslationResult,
} from '@parley/shared';
import { DEFAULT_TRANSLATION_TIMEOUT_MS } from '@parley/shared';
import type { AgentSession } from '../agents/types.js';
import type { TranslationAgent } from '../agents/translationAgent.js';
import { FanOutError, SessionFullError, errorMessage } from '../errors.js';
import { AudioRoutingPolicy, type AudioControlSink } from '../routing/audioRoutingPolicy.js';
import { withTimeout } from '../translation/timeout.js';
import { TranslationBuffer, type TranslationBufferOptions } from '../translation/translationBuffer.js';
import type { TranslationProvider } from '../translation/types.js';

const BUFFER_LISTENER_ID = 'session-coordinator';

export interface SessionCoordinatorOptions {
  sessionId: string;
  translator: TranslationProvider;
  controlSink?: AudioControlSink;
  buffer?: Omit<TranslationBufferOptions, 'now'>;
  translationTimeoutMs?: number;
  maxParticipants?: number;
  now?: () => number;
}

export class SessionCoordinator implements AgentSession {
  readonly sessionId: string;

  private readonly translator: TranslationProvider;
  private readonly translationTimeoutMs: number;
  private readonly maxParticipants: number;
  private readonly now: () => number;
  private readonly buffer: TranslationBuffer;
  private readonly routing: AudioRoutingPolicy;

  // Insertion order is join order
  private agents: Map<string, TranslationAgent> = new Map();
  private languages: Map<string, LanguageCode> = new Map();
  // speakerId -> agent recognizing that speaker
  private recognitionOwners: Map<string, string> = new Map();

  private translationFailures = 0;
  private droppedSubmissions = 0;

  constructor(options: SessionCoordinatorOptions) {
    this.sessionId = options.sessionId;
    this.translator = options.translator;
    this.translationTimeoutMs = options.translationTimeoutMs ?? DEFAULT_TRANSLATION_TIMEOUT_MS;
    this.maxParticipants = options.maxParticipants ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? (() => performance.now());

    this.buffer = new TranslationBuffer({ ...options.buffer, now: this.now });
    this.routing = new AudioRoutingPolicy(options.controlSink);
    this.buffer.registerListener(BUFFER_LISTENER_ID, (segment) => this.handleSegment(segment));
  }

  start(): void {
    this.buffer.start();
  }

  async close(): Promise<void> {
    this.buffer.unregisterListener(BUFFER_LISTENER_ID);
    await this.buffer.stop();
    console.log(`[Session] ${this.sessionId} closed`);
  }

  join(agent: TranslationAgent): void {
    const { participantId, language } = agent;
    if (!this.languages.has(participantId) && this.languages.size >= this.maxParticipants) {
      throw new SessionFullError(this.sessionId, this.maxParticipants);
    }

    this.agents.set(participantId, agent);
    console.log(`[Session] ${this.sessionId}: agent ${participantId} (${language}) joined, ${this.agents.size} agent(s)`);

    this.registerParticipant(participantId, language);

    // Bring the newcomer up to date with everyone already here
    for (const [otherId, otherLanguage] of this.languages) {
      if (otherId !== participantId) {
        agent.onRemoteParticipantJoined(otherId, otherLanguage);
      }
    }
    this.updateRecognitionOwners();
  }

  /**
   * Remove a participant (and its agent, if any) from the session.
   */
  leave(participantId: string): void {
    const hadAgent = this.agents.delete(participantId);
    const hadLanguage = this.languages.delete(participantId);
    if (!hadAgent && !hadLanguage) return;

    this.routing.unregister(participantId);
    this.recognitionOwners.delete(participantId);

    for (const agent of this.agents.values()) {
      if (agent.tracks(participantId)) {
        agent.onRemoteParticipantLeft(participantId);
      }
    }

    this.updateRecognitionOwners();
    console.log(`[Session] ${this.sessionId}: ${participantId} left, ${this.agents.size} agent(s) remaining`);
  }

  registerParticipant(participantId: string, language: LanguageCode): void {
    if (this.languages.get(participantId) !== language) {
      if (!this.languages.has(participantId) && this.languages.size >= this.maxParticipants) {
        throw new SessionFullError(this.sessionId, this.maxParticipants);
      }

      this.languages.set(participantId, language);
      this.routing.register(participantId, language);

      for (const agent of this.agents.values()) {
        if (agent.participantId !== participantId && agent.trackedLanguage(participantId) !== language) {
          agent.onRemoteParticipantJoined(participantId, language);
        }
      }
    }

    this.updateRecognitionOwners();
  }

  setCurrentSpeaker(participantId: string | null): void {
    this.routing.setCurrentSpeaker(participantId);
  }

  getCurrentSpeaker(): string | null {
    return this.routing.getCurrentSpeaker();
  }

  acceptsTranslatedAudio(sourceId: string, targetId: string): boolean {
    return this.routing.acceptsTranslatedAudio(sourceId, targetId);
  }

  /**
   * Accept a segment update only from the agent that owns recognition of
   * its speaker; a second agent would submit the same speech again.
   */
  submit(agentId: string, update: SegmentUpdate): boolean {
    if (update.speakerId === agentId || this.recognitionOwners.get(update.speakerId) !== agentId) {
      this.droppedSubmissions++;
      return false;
    }
    return this.buffer.submit(update);
  }

  /**
   * Drop a pending segment whose recognizer went away mid-utterance.
   * Only the recognition owner of the speaker may do so.
   */
  discard(agentId: string, segmentId: string, speakerId: string): boolean {
    if (this.recognitionOwners.get(speakerId) !== agentId) {
      return false;
    }
    return this.buffer.discard(segmentId, speakerId);
  }

  /**
   * Translate one segment for every other agent whose language differs.
   * Failed or timed-out requests are left out of the result.
   */
  async coordinate(speakerId: string, segment: Readonly<Segment>): Promise<Map<string, TranslationResult>> {
    const results: Map<string, TranslationResult> = new Map();

    await Promise.all(
      this.targetsFor(speakerId, segment).map(async (agent) => {
        const startedAt = this.now();
        const controller = new AbortController();

        try {
          const translatedText = await withTimeout(
            this.translator.translate({
              text: segment.text,
              sourceLanguage: segment.sourceLanguage,
              targetLanguage: agent.language,
              preferences: agent.preferences,
              signal: controller.signal,
            }),
            this.translationTimeoutMs,
            `Translation ${segment.sourceLanguage}→${agent.language} for ${agent.participantId}`,
            controller
          );

          const completedAt = this.now();
          results.set(
            agent.participantId,
            Object.freeze({
              segmentId: segment.segmentId,
              speakerId,
              targetParticipantId: agent.participantId,
              originalText: segment.text,
              translatedText,
              sourceLanguage: segment.sourceLanguage,
              targetLanguage: agent.language,
              translationLatencyMs: completedAt - startedAt,
              totalLatencyMs: completedAt - segment.createdAt,
            })
          );
        } catch (error) {
          this.translationFailures++;
          console.warn(
            `[Session] ${this.sessionId}: translation of ${segment.segmentId} for ${agent.participantId} failed:`,
            errorMessage(error)
          );
        }
      })
    );

    return results;
  }

  getAgent(participantId: string): TranslationAgent | undefined {
    return this.agents.get(participantId);
  }

  getAgentCount(): number {
    return this.agents.size;
  }

  getParticipants(): Record<string, LanguageCode> {
    return Object.fromEntries(this.languages);
  }

  getRecognitionOwner(speakerId: string): string | undefined {
    return this.recognitionOwners.get(speakerId);
  }

  getRouting(): AudioRoutingPolicy {
    return this.routing;
  }

  getStats(): SessionStats & { translationFailures: number; droppedSubmissions: number } {
    return {
      sessionId: this.sessionId,
      participants: this.getParticipants(),
      currentSpeaker: this.routing.getCurrentSpeaker(),
      recognitionOwners: Object.fromEntries(this.recognitionOwners),
      buffer: this.buffer.getStats(),
      routing: this.routing.getRoutingInfo(),
      agents: Array.from(this.agents.values(), (agent) => agent.getStats()),
      translationFailures: this.translationFailures,
      droppedSubmissions: this.droppedSubmissions,
    };
  }

  private targetsFor(speakerId: string, segment: Readonly<Segment>): TranslationAgent[] {
    return Array.from(this.agents.values()).filter(
      (agent) => agent.participantId !== speakerId && agent.language !== segment.sourceLanguage
    );
  }

  private async handleSegment(segment: Readonly<Segment>): Promise<void> {
    const attempted = this.targetsFor(segment.speakerId, segment).length;
    const results = await this.coordinate(segment.speakerId, segment);

    for (const [listenerId, result] of results) {
      this.agents.get(listenerId)?.deliver(result);
    }

    if (attempted > 0 && results.size === 0) {
      throw new FanOutError(segment.segmentId, attempted);
    }
  }

  // Earliest-joined agent tracking a speaker recognizes it; the rest stay idle
  private updateRecognitionOwners(): void {
    for (const speakerId of this.languages.keys()) {
      let owner: string | undefined;

      for (const agent of this.agents.values()) {
        if (agent.participantId === speakerId || !agent.tracks(speakerId)) continue;

        const isOwner = owner === undefined;
        if (isOwner) {
          owner = agent.participantId;
        }
        agent.setRecognizing(speakerId, isOwner);
      }

      const previous = this.recognitionOwners.get(speakerId);
      if (owner === undefined) {
        this.recognitionOwners.delete(speakerId);
      } else if (previous !== owner) {
        this.recognitionOwners.set(speakerId, owner);
        console.log(`[Session] ${this.sessionId}: ${owner} now recognizes ${speakerId}`);
      }
    }
  }
}
