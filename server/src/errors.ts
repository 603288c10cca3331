import type { LanguageCode } from '@parley/shared';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TranslationError extends Error {
  constructor(
    message: string,
    readonly sourceLanguage: LanguageCode,
    readonly targetLanguage: LanguageCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

export class TranslationTimeoutError extends Error {
  constructor(readonly timeoutMs: number, label: string) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TranslationTimeoutError';
  }
}

export class RecognitionError extends Error {
  constructor(message: string, readonly participantId: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecognitionError';
  }
}

// Raised when a segment had listeners to translate for and none of them succeeded
export class FanOutError extends Error {
  constructor(readonly segmentId: string, readonly attempted: number) {
    super(`All ${attempted} translation request(s) failed for segment ${segmentId}`);
    this.name = 'FanOutError';
  }
}

export class SessionFullError extends Error {
  constructor(readonly sessionId: string, readonly maxParticipants: number) {
    super(`Session ${sessionId} is full (${maxParticipants} participants)`);
    this.name = 'SessionFullError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
