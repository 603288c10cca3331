/**
 * Speech recognizer contract shared by the transcript adapter and the
 * concrete recognizers.
 */

import type { LanguageCode, TranscriptEvent } from '@parley/shared';
import type { RecognitionError } from '../errors.js';

export interface RecognizerEvents {
  transcript: (event: TranscriptEvent) => void;
  error: (error: RecognitionError) => void;
  close: () => void;
}

export interface SpeechRecognizer {
  readonly participantId: string;
  readonly language: LanguageCode;
  on<E extends keyof RecognizerEvents>(event: E, listener: RecognizerEvents[E]): void;
  write(frame: Buffer): void;
  close(): Promise<void>;
}

export type RecognizerFactory = (participantId: string, language: LanguageCode) => SpeechRecognizer;

type ListenerTable = { [E in keyof RecognizerEvents]: RecognizerEvents[E][] };

export abstract class BaseRecognizer implements SpeechRecognizer {
  private listeners: ListenerTable = { transcript: [], error: [], close: [] };
  protected closed = false;

  constructor(
    readonly participantId: string,
    readonly language: LanguageCode
  ) {}

  on<E extends keyof RecognizerEvents>(event: E, listener: RecognizerEvents[E]): void {
    this.listeners[event].push(listener);
  }

  abstract write(frame: Buffer): void;

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.emitClose();
  }

  isClosed(): boolean {
    return this.closed;
  }

  protected emitTranscript(event: TranscriptEvent): void {
    for (const listener of this.listeners.transcript) {
      listener(event);
    }
  }

  protected emitError(error: RecognitionError): void {
    for (const listener of this.listeners.error) {
      listener(error);
    }
  }

  protected emitClose(): void {
    for (const listener of this.listeners.close) {
      listener();
    }
  }
}

/**
 * Recognizer for transcripts produced elsewhere (a client-side recognizer, a
 * test). Audio frames are discarded; events arrive through push().
 */
export class PushRecognizer extends BaseRecognizer {
  write(_frame: Buffer): void {}

  push(event: TranscriptEvent): void {
    if (this.closed) return;
    this.emitTranscript(event);
  }

  fail(error: RecognitionError): void {
    if (this.closed) return;
    this.emitError(error);
  }
}
