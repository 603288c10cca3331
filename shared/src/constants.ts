import type { LanguageCode, LanguageInfo, TranslationPreferences } from './types.js';

// Buffer dispatch policy
export const DEFAULT_MAX_DELAY_MS = 500;
export const DEFAULT_HIGH_CONFIDENCE_THRESHOLD = 0.8;
export const DEFAULT_SEGMENT_CLEANUP_MS = 2000;

// A pause longer than this starts a new utterance
export const DEFAULT_SILENCE_GAP_MS = 650;

// Per-listener translation call budget
export const DEFAULT_TRANSLATION_TIMEOUT_MS = 3000;

export const DEFAULT_TRANSLATION_PREFERENCES: TranslationPreferences = {
  formalTone: false,
  preserveEmotion: true,
};

// Synthesized output tracks are published under this prefix
export const TTS_TRACK_PREFIX = 'tts-';

export const LANGUAGES: LanguageInfo[] = [
  { code: 'en', name: 'English', nativeName: 'English', recognizerLocale: 'en-US', defaultVoiceId: 'EXAVITQu4vr4xnSDxMaL' },
  { code: 'es', name: 'Spanish', nativeName: 'Español', recognizerLocale: 'es-US', defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX' },
  { code: 'fr', name: 'French', nativeName: 'Français', recognizerLocale: 'fr-FR', defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX' },
  { code: 'de', name: 'German', nativeName: 'Deutsch', recognizerLocale: 'de-DE', defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX' },
  { code: 'pt', name: 'Portuguese', nativeName: 'Português', recognizerLocale: 'pt-BR', defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX' },
  { code: 'it', name: 'Italian', nativeName: 'Italiano', recognizerLocale: 'it-IT', defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX' },
  { code: 'ig', name: 'Igbo', nativeName: 'Igbo', recognizerLocale: 'ig-NG', defaultVoiceId: 'EXAVITQu4vr4xnSDxMaL' },
  { code: 'yo', name: 'Yoruba', nativeName: 'Yorùbá', recognizerLocale: 'yo-NG', defaultVoiceId: 'EXAVITQu4vr4xnSDxMaL' },
  { code: 'ha', name: 'Hausa', nativeName: 'Hausa', recognizerLocale: 'ha-NG', defaultVoiceId: 'EXAVITQu4vr4xnSDxMaL' },
  { code: 'zh', name: 'Chinese', nativeName: '中文', recognizerLocale: 'zh-CN', defaultVoiceId: 'ThT5KcBeYPX3keUQqHPh' },
  { code: 'ja', name: 'Japanese', nativeName: '日本語', recognizerLocale: 'ja-JP', defaultVoiceId: 'ThT5KcBeYPX3keUQqHPh' },
  { code: 'ko', name: 'Korean', nativeName: '한국어', recognizerLocale: 'ko-KR', defaultVoiceId: 'jBpfuIE2acCO8z3wKNLl' },
];

export const LANGUAGE_CODES: LanguageCode[] = LANGUAGES.map(l => l.code);

export function isLanguageCode(value: unknown): value is LanguageCode {
  return typeof value === 'string' && LANGUAGES.some(l => l.code === value);
}

export function getLanguageInfo(code: LanguageCode): LanguageInfo {
  const info = LANGUAGES.find(l => l.code === code);
  if (!info) {
    throw new Error(`Unknown language: ${code}`);
  }
  return info;
}

export function getLanguageName(code: LanguageCode): string {
  return LANGUAGES.find(l => l.code === code)?.name ?? code;
}
