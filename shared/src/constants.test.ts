import { describe, expect, it } from 'vitest';
import { LANGUAGE_CODES, getLanguageInfo, getLanguageName, isLanguageCode } from './constants.js';

describe('language table', () => {
  it('recognizes supported codes only', () => {
    expect(isLanguageCode('yo')).toBe(true);
    expect(isLanguageCode('xx')).toBe(false);
    expect(isLanguageCode(42)).toBe(false);
  });

  it('resolves recognizer locales and voices', () => {
    expect(getLanguageInfo('es')).toEqual({
      code: 'es',
      name: 'Spanish',
      nativeName: 'Español',
      recognizerLocale: 'es-US',
      defaultVoiceId: 'XrExE9yKIg1WjnnlVkGX',
    });
    expect(getLanguageName('ja')).toBe('Japanese');
    expect(LANGUAGE_CODES).toHaveLength(12);
  });
});
