import type { LanguageCode } from '@parley/shared';

export interface SynthesisRequest {
  text: string;
  voiceId: string;
  language: LanguageCode;
  onChunk: (chunk: Buffer) => void;
}

// Resolves once the whole utterance has been streamed through onChunk
export interface SpeechSynthesizer {
  synthesize(request: SynthesisRequest): Promise<void>;
  isReady(): boolean;
}

export interface OutputChunk {
  segmentId: string;
  speakerId: string;
  trackId: string;
  chunkIndex: number;
  audio: Buffer;
}

export interface PlaybackItem {
  segmentId: string;
  speakerId: string;
  text: string;
  language: LanguageCode;
}

/**
 * Where an agent's synthesized speech goes. The lifecycle hooks are optional;
 * play() is called for every audio chunk.
 */
export interface AudioOutput {
  play(participantId: string, chunk: OutputChunk): void;
  playbackStarted?(participantId: string, item: PlaybackItem): void;
  playbackEnded?(participantId: string, item: PlaybackItem): void;
  playbackFailed?(participantId: string, item: PlaybackItem, error: Error): void;
}
