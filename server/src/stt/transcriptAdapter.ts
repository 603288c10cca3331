/**
 * Streaming Transcript Adapter
 *
 * Wraps one language-tagged recognizer for one remote speaker and turns its
 * interim/final events into segment updates with a stable id per utterance.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LanguageCode, SegmentUpdate, TranscriptEvent } from '@parley/shared';
import { DEFAULT_SILENCE_GAP_MS } from '@parley/shared';
import type { SpeechRecognizer } from './recognizer.js';

// Where normalized updates go; discard() abandons a segment that will never be finished
export interface SegmentSink {
  submit(update: SegmentUpdate): void;
  discard(segmentId: string, speakerId: string): void;
}

export interface TranscriptAdapterOptions {
  enableInterimResults?: boolean;
  silenceGapMs?: number;
  now?: () => number;
  createSegmentId?: () => string;
}

export class StreamingTranscriptAdapter {
  private readonly enableInterimResults: boolean;
  private readonly silenceGapMs: number;
  private readonly now: () => number;
  private readonly createSegmentId: () => string;

  private currentSegmentId: string | null = null;
  private lastEventAt = 0;
  private active = true;
  private eventsDropped = 0;

  constructor(
    readonly speakerId: string,
    readonly sourceLanguage: LanguageCode,
    private readonly recognizer: SpeechRecognizer,
    private readonly sink: SegmentSink,
    options: TranscriptAdapterOptions = {}
  ) {
    this.enableInterimResults = options.enableInterimResults ?? true;
    this.silenceGapMs = options.silenceGapMs ?? DEFAULT_SILENCE_GAP_MS;
    this.now = options.now ?? (() => performance.now());
    this.createSegmentId = options.createSegmentId ?? uuidv4;

    recognizer.on('transcript', (event) => this.accept(event));
    recognizer.on('error', (error) => {
      console.error(`[TranscriptAdapter] Recognizer error for ${speakerId}:`, error.message);
      this.onDisconnect();
    });
    recognizer.on('close', () => this.onDisconnect());
  }

  /**
   * Non-owners stay idle: audio is not forwarded and events are dropped.
   */
  setActive(active: boolean): void {
    if (this.active === active) return;
    this.active = active;
    this.currentSegmentId = null;
  }

  isActive(): boolean {
    return this.active;
  }

  write(frame: Buffer): void {
    if (!this.active) return;
    this.recognizer.write(frame);
  }

  accept(event: TranscriptEvent): void {
    if (event.kind === 'final') {
      this.onFinal(event.text, event.confidence);
    } else {
      this.onInterim(event.text, event.confidence);
    }
  }

  onInterim(text: string, confidence: number): void {
    if (!this.enableInterimResults) return;
    this.forward(text, confidence, false);
  }

  onFinal(text: string, confidence: number): void {
    this.forward(text, confidence, true);
    this.currentSegmentId = null;
  }

  // End of utterance without a final: the next event opens a new segment
  onSilence(): void {
    this.currentSegmentId = null;
  }

  // The partial segment is dropped, never translated
  onDisconnect(): void {
    const segmentId = this.currentSegmentId;
    this.currentSegmentId = null;
    if (segmentId) {
      console.warn(`[TranscriptAdapter] Recognizer for ${this.speakerId} disconnected mid-utterance, dropping ${segmentId}`);
      this.sink.discard(segmentId, this.speakerId);
    }
  }

  getCurrentSegmentId(): string | null {
    return this.currentSegmentId;
  }

  getDroppedCount(): number {
    return this.eventsDropped;
  }

  async close(): Promise<void> {
    this.active = false;
    this.currentSegmentId = null;
    await this.recognizer.close();
  }

  private forward(text: unknown, confidence: unknown, isFinal: boolean): void {
    if (!this.active) return;

    if (typeof text !== 'string' || typeof confidence !== 'number' || !Number.isFinite(confidence)) {
      this.eventsDropped++;
      console.warn(`[TranscriptAdapter] Dropping malformed event for ${this.speakerId}`);
      return;
    }

    const trimmed = text.trim();
    if (!trimmed) return;

    const now = this.now();
    if (this.currentSegmentId === null || now - this.lastEventAt > this.silenceGapMs) {
      this.currentSegmentId = this.createSegmentId();
    }
    this.lastEventAt = now;

    this.sink.submit({
      segmentId: this.currentSegmentId,
      speakerId: this.speakerId,
      text: trimmed,
      sourceLanguage: this.sourceLanguage,
      isFinal,
      confidence: Math.min(1, Math.max(0, confidence)),
    });
  }
}
