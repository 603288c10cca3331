// Languages an agent can listen or speak in
export type LanguageCode =
  | 'en' | 'es' | 'fr' | 'de' | 'pt' | 'it'
  | 'ig' | 'yo' | 'ha'
  | 'zh' | 'ja' | 'ko';

// Per-language lookup entry used by recognizers, translation prompts and synthesis
export interface LanguageInfo {
  code: LanguageCode;
  name: string;
  nativeName: string;
  recognizerLocale: string;
  defaultVoiceId: string;
}

// ==========================================
// Segments & translation results
// ==========================================

export type SegmentState = 'pending' | 'translating' | 'completed' | 'failed';

// A recognized, possibly still evolving span of one speaker's utterance
export interface Segment {
  segmentId: string;
  speakerId: string;
  text: string;
  sourceLanguage: LanguageCode;
  createdAt: number;           // monotonic ms (performance.now)
  isFinal: boolean;
  confidence: number;          // 0-1
  state: SegmentState;
  translationStartedAt: number | null;
  translationCompletedAt: number | null;
}

// What a transcript adapter proposes to the buffer
export interface SegmentUpdate {
  segmentId: string;
  speakerId: string;
  text: string;
  sourceLanguage: LanguageCode;
  isFinal: boolean;
  confidence: number;
}

export interface TranslationResult {
  segmentId: string;
  speakerId: string;
  targetParticipantId: string;
  originalText: string;
  translatedText: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  translationLatencyMs: number;
  totalLatencyMs: number;
}

export interface TranslationPreferences {
  formalTone: boolean;
  preserveEmotion: boolean;
}

// ==========================================
// Audio routing
// ==========================================

export type AudioStreamType = 'original' | 'translated';

// Effective decision for one (listener, source) pair
export type AudioDisposition = 'original' | 'translated' | 'muted';

export interface ParticipantAudioConfig {
  participantId: string;
  nativeLanguage: LanguageCode;
  hearOriginal: Set<string>;
  hearTranslated: Set<string>;
  mute: Set<string>;
}

export interface AudioRoute {
  sourceId: string;
  targetId: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  streamType: AudioStreamType;
  active: boolean;
}

// Serializable view of the routing table
export interface RoutingInfo {
  currentSpeaker: string | null;
  participants: Record<string, {
    nativeLanguage: LanguageCode;
    hearOriginal: string[];
    hearTranslated: string[];
    mute: string[];
  }>;
  routes: AudioRoute[];
}

// ==========================================
// Recognizer events
// ==========================================

export type TranscriptEventKind = 'interim' | 'final';

export interface TranscriptEvent {
  kind: TranscriptEventKind;
  text: string;
  confidence: number;
}

// ==========================================
// Statistics
// ==========================================

export interface BufferStats {
  segmentsReceived: number;
  segmentsDispatched: number;
  forcedDispatches: number;
  segmentsCompleted: number;
  segmentsFailed: number;
  listenerFailures: number;
  avgDispatchLatencyMs: number;
  maxDispatchLatencyMs: number;
  pendingSegments: number;
  queueSize: number;
  maxDelayMs: number;
}

export interface AgentStats {
  participantId: string;
  language: LanguageCode;
  isRunning: boolean;
  remoteParticipants: Record<string, LanguageCode>;
  recognizing: string[];
  translationsDelivered: number;
  translationsDiscarded: number;
  feedbackFramesDropped: number;
}

export interface SessionStats {
  sessionId: string;
  participants: Record<string, LanguageCode>;
  currentSpeaker: string | null;
  recognitionOwners: Record<string, string>;
  buffer: BufferStats;
  routing: RoutingInfo;
  agents: AgentStats[];
}

// ==========================================
// WebSocket bridge messages
// ==========================================

export type WSMessageType =
  // Client -> Server
  | 'agent:start'
  | 'agent:stop'
  | 'participant:joined'
  | 'participant:left'
  | 'audio:chunk'
  | 'stt:interim'
  | 'stt:final'
  | 'speaker:start'
  | 'speaker:stop'
  // Server -> Client
  | 'session:state'
  | 'translation:complete'
  | 'audio:control'
  | 'tts:start'
  | 'tts:audio_chunk'
  | 'tts:end'
  | 'tts:error'
  | 'error';

export interface WSMessage<T = unknown> {
  type: WSMessageType;
  payload: T;
}

export interface AgentStartPayload {
  sessionId: string;
  participantId: string;
  language: LanguageCode;
  preferences?: Partial<TranslationPreferences>;
  voiceId?: string;
}

export interface ParticipantJoinedPayload {
  participantId: string;
  language: LanguageCode;
}

export interface ParticipantLeftPayload {
  participantId: string;
}

export interface AudioChunkPayload {
  sourceId: string;
  trackId: string;
  audioData: string;  // Base64 encoded PCM (16-bit, 16kHz, mono)
}

export interface TranscriptPayload {
  sourceId: string;
  text: string;
  confidence: number;
}

export interface SpeakerPayload {
  participantId: string;
}

export interface AudioControlPayload {
  listenerId: string;
  sourceId: string;
  muted: boolean;
}

export interface TTSAudioChunkPayload {
  segmentId: string;
  speakerId: string;
  chunkIndex: number;
  audioData: string;  // Base64 encoded MP3 chunk
  trackId: string;
}

export interface TTSEventPayload {
  segmentId: string;
  speakerId: string;
  text?: string;
  error?: string;
}

export interface ErrorPayload {
  message: string;
  code?: string;
}
