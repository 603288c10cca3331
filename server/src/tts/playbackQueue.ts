/**
 * Playback Queue
 *
 * One per agent. Synthesizes accepted translations one at a time so that
 * utterances never overlap, and keeps going after a failed one.
 */

import { errorMessage } from '../errors.js';
import type { AudioOutput, PlaybackItem, SpeechSynthesizer } from './types.js';

export class PlaybackQueue {
  private queue: PlaybackItem[] = [];
  private processing: Promise<void> | null = null;
  // Bumped by clear(); chunks from an older generation are dropped
  private generation = 0;
  private played = 0;
  private failed = 0;

  constructor(
    private readonly participantId: string,
    private readonly trackId: string,
    private readonly synthesizer: SpeechSynthesizer,
    private readonly output: AudioOutput,
    private voiceId: string
  ) {}

  enqueue(item: PlaybackItem): void {
    this.queue.push(item);
    console.log(`[Playback] Queued ${item.segmentId} for ${this.participantId}, queue length: ${this.queue.length}`);

    if (!this.processing) {
      this.processing = this.processQueue().finally(() => {
        this.processing = null;
      });
    }
  }

  setVoice(voiceId: string): void {
    this.voiceId = voiceId;
  }

  /**
   * Drop everything queued; the utterance in progress stops emitting audio.
   */
  clear(): void {
    const clearedCount = this.queue.length;
    this.queue = [];
    this.generation++;
    if (clearedCount > 0) {
      console.log(`[Playback] Cleared ${clearedCount} queued utterance(s) for ${this.participantId}`);
    }
  }

  isPlaying(): boolean {
    return this.processing !== null;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getStats(): { played: number; failed: number; queued: number } {
    return { played: this.played, failed: this.failed, queued: this.queue.length };
  }

  // Resolves once the queue has drained
  async idle(): Promise<void> {
    while (this.processing) {
      await this.processing;
    }
  }

  private async processQueue(): Promise<void> {
    let item = this.queue.shift();

    while (item) {
      await this.play(item);
      item = this.queue.shift();
    }
  }

  private async play(item: PlaybackItem): Promise<void> {
    const generation = this.generation;
    let chunkIndex = 0;

    try {
      this.output.playbackStarted?.(this.participantId, item);
      await this.synthesizer.synthesize({
        text: item.text,
        voiceId: this.voiceId,
        language: item.language,
        onChunk: (audio) => {
          if (generation !== this.generation) return;
          this.output.play(this.participantId, {
            segmentId: item.segmentId,
            speakerId: item.speakerId,
            trackId: this.trackId,
            chunkIndex: chunkIndex++,
            audio,
          });
        },
      });

      this.played++;
      this.output.playbackEnded?.(this.participantId, item);
    } catch (error) {
      this.failed++;
      console.error(`[Playback] TTS error for ${this.participantId}:`, errorMessage(error));
      this.output.playbackFailed?.(
        this.participantId,
        item,
        error instanceof Error ? error : new Error(errorMessage(error))
      );
    }
  }
}
