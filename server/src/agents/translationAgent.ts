/**
 * Per-User Translation Agent
 *
 * Owns one participant's pipeline: a transcript adapter per remote speaker
 * feeding the session, and a playback queue voicing the translations that
 * the session delivers back to this participant.
 */

import type {
  AgentStats,
  LanguageCode,
  TranscriptEvent,
  TranslationPreferences,
  TranslationResult,
} from '@parley/shared';
import { DEFAULT_TRANSLATION_PREFERENCES, TTS_TRACK_PREFIX, getLanguageInfo } from '@parley/shared';
import { errorMessage } from '../errors.js';
import type { RecognizerFactory } from '../stt/recognizer.js';
import { StreamingTranscriptAdapter, type TranscriptAdapterOptions } from '../stt/transcriptAdapter.js';
import { PlaybackQueue } from '../tts/playbackQueue.js';
import type { AudioOutput, SpeechSynthesizer } from '../tts/types.js';
import type { AgentSession } from './types.js';

export interface TranslationAgentOptions {
  participantId: string;
  language: LanguageCode;
  preferences?: Partial<TranslationPreferences>;
  voiceId?: string;
  recognizerFactory: RecognizerFactory;
  synthesizer: SpeechSynthesizer;
  output: AudioOutput;
  transcripts?: Omit<TranscriptAdapterOptions, 'createSegmentId'>;
  createSegmentId?: () => string;
  onTranslation?: (result: TranslationResult) => void;
}

interface RemoteParticipant {
  language: LanguageCode;
  adapter: StreamingTranscriptAdapter;
}

export class TranslationAgent {
  readonly participantId: string;
  readonly language: LanguageCode;
  readonly preferences: TranslationPreferences;
  readonly outputTrackId: string;

  private readonly options: TranslationAgentOptions;
  private readonly playback: PlaybackQueue;
  private remotes: Map<string, RemoteParticipant> = new Map();
  private ownTracks: Set<string> = new Set();
  private session: AgentSession | null = null;
  private running = false;
  private stopped = false;

  private translationsDelivered = 0;
  private translationsDiscarded = 0;
  private feedbackFramesDropped = 0;

  constructor(options: TranslationAgentOptions) {
    this.options = options;
    this.participantId = options.participantId;
    this.language = options.language;
    this.preferences = { ...DEFAULT_TRANSLATION_PREFERENCES, ...options.preferences };
    this.outputTrackId = `${TTS_TRACK_PREFIX}${options.participantId}`;

    this.playback = new PlaybackQueue(
      this.participantId,
      this.outputTrackId,
      options.synthesizer,
      options.output,
      options.voiceId ?? getLanguageInfo(options.language).defaultVoiceId
    );
    this.markOwnTrack(this.outputTrackId);
  }

  start(session: AgentSession): void {
    if (this.running) return;
    if (this.stopped) {
      throw new Error(`Agent ${this.participantId} was stopped and cannot be restarted`);
    }

    this.session = session;
    this.running = true;
    try {
      session.join(this);
    } catch (error) {
      this.session = null;
      this.running = false;
      throw error;
    }
    console.log(`[Agent] ${this.participantId} (${this.language}) joined session ${session.sessionId}`);
  }

  /**
   * Leaves routing and the coordinator before releasing recognizers, so no
   * new work is addressed to this agent while it shuts down.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.stopped = true;

    const session = this.session;
    this.session = null;
    session?.leave(this.participantId);

    const remotes = Array.from(this.remotes.values());
    this.remotes.clear();
    const closing = await Promise.allSettled(remotes.map((remote) => remote.adapter.close()));
    closing.forEach((outcome) => {
      if (outcome.status === 'rejected') {
        console.error(`[Agent] ${this.participantId} failed to close a recognizer:`, errorMessage(outcome.reason));
      }
    });

    this.playback.clear();
    console.log(`[Agent] ${this.participantId} stopped`);
  }

  isRunning(): boolean {
    return this.running;
  }

  onRemoteParticipantJoined(participantId: string, language: LanguageCode): void {
    if (!this.running || participantId === this.participantId) return;

    const existing = this.remotes.get(participantId);
    if (existing?.language === language) return;

    if (existing) {
      this.closeAdapter(participantId, existing.adapter);
    }

    const recognizer = this.options.recognizerFactory(participantId, language);
    const adapter = new StreamingTranscriptAdapter(
      participantId,
      language,
      recognizer,
      {
        submit: (update) => {
          this.session?.submit(this.participantId, update);
        },
        discard: (segmentId, speakerId) => {
          this.session?.discard(this.participantId, segmentId, speakerId);
        },
      },
      { ...this.options.transcripts, createSegmentId: this.options.createSegmentId }
    );
    // Idle until the session makes this agent the recognition owner
    adapter.setActive(false);
    this.remotes.set(participantId, { language, adapter });

    try {
      this.session?.registerParticipant(participantId, language);
    } catch (error) {
      // Not admitted: forget the participant rather than track it outside the session
      if (this.remotes.get(participantId)?.adapter === adapter) {
        this.remotes.delete(participantId);
      }
      this.closeAdapter(participantId, adapter);
      throw error;
    }
  }

  onRemoteParticipantLeft(participantId: string): void {
    const remote = this.remotes.get(participantId);
    if (remote) {
      this.remotes.delete(participantId);
      this.closeAdapter(participantId, remote.adapter);
    }

    this.session?.leave(participantId);
  }

  tracks(participantId: string): boolean {
    return this.remotes.has(participantId);
  }

  trackedLanguage(participantId: string): LanguageCode | undefined {
    return this.remotes.get(participantId)?.language;
  }

  setRecognizing(participantId: string, active: boolean): void {
    this.remotes.get(participantId)?.adapter.setActive(active);
  }

  isRecognizing(participantId: string): boolean {
    return this.remotes.get(participantId)?.adapter.isActive() ?? false;
  }

  markOwnTrack(trackId: string): void {
    this.ownTracks.add(trackId);
  }

  pushAudio(sourceId: string, trackId: string, frame: Buffer): void {
    if (this.isOwnAudio(sourceId, trackId)) {
      this.feedbackFramesDropped++;
      return;
    }
    this.remotes.get(sourceId)?.adapter.write(frame);
  }

  pushTranscript(sourceId: string, event: TranscriptEvent): void {
    if (sourceId === this.participantId) return;
    this.remotes.get(sourceId)?.adapter.accept(event);
  }

  onSpeakingChanged(participantId: string, speaking: boolean): void {
    const session = this.session;
    if (!session) return;

    if (speaking) {
      session.setCurrentSpeaker(participantId);
      return;
    }

    this.remotes.get(participantId)?.adapter.onSilence();
    if (session.getCurrentSpeaker() === participantId) {
      session.setCurrentSpeaker(null);
    }
  }

  /**
   * Accept a translation for playback. Returns false when it was discarded.
   */
  deliver(result: TranslationResult): boolean {
    if (!this.running || !this.session) {
      return this.discard(result, 'agent stopped');
    }
    if (result.speakerId === this.participantId) {
      return this.discard(result, 'own speech');
    }
    if (result.targetParticipantId !== this.participantId) {
      return this.discard(result, `addressed to ${result.targetParticipantId}`);
    }
    if (!this.session.acceptsTranslatedAudio(result.speakerId, this.participantId)) {
      return this.discard(result, 'translated route inactive');
    }

    this.translationsDelivered++;
    this.options.onTranslation?.(result);
    this.playback.enqueue({
      segmentId: result.segmentId,
      speakerId: result.speakerId,
      text: result.translatedText,
      language: this.language,
    });
    return true;
  }

  getStats(): AgentStats {
    const remoteParticipants: Record<string, LanguageCode> = {};
    const recognizing: string[] = [];
    for (const [participantId, remote] of this.remotes) {
      remoteParticipants[participantId] = remote.language;
      if (remote.adapter.isActive()) {
        recognizing.push(participantId);
      }
    }

    return {
      participantId: this.participantId,
      language: this.language,
      isRunning: this.running,
      remoteParticipants,
      recognizing,
      translationsDelivered: this.translationsDelivered,
      translationsDiscarded: this.translationsDiscarded,
      feedbackFramesDropped: this.feedbackFramesDropped,
    };
  }

  // Resolves once queued playback has finished
  whenIdle(): Promise<void> {
    return this.playback.idle();
  }

  private isOwnAudio(sourceId: string, trackId: string): boolean {
    return sourceId === this.participantId || this.ownTracks.has(trackId);
  }

  private discard(result: TranslationResult, reason: string): boolean {
    this.translationsDiscarded++;
    console.log(`[Agent] ${this.participantId} discarded ${result.segmentId}: ${reason}`);
    return false;
  }

  private closeAdapter(participantId: string, adapter: StreamingTranscriptAdapter): void {
    adapter.close().catch((error: unknown) => {
      console.error(`[Agent] ${this.participantId} failed to close recognizer for ${participantId}:`, errorMessage(error));
    });
  }
}
