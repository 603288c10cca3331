import type { LanguageCode, TranslationPreferences } from '@parley/shared';

export interface TranslationRequest {
  text: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  preferences: TranslationPreferences;
  // Aborted once the caller has stopped waiting for the result
  signal?: AbortSignal;
}

// Raises TranslationError when the text cannot be translated
export interface TranslationProvider {
  translate(request: TranslationRequest): Promise<string>;
  isReady(): boolean;
}
