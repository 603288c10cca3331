/**
 * Gemini Translation Service
 *
 * Conversational translation using Gemini 2.0 Flash, shaped by each
 * listener's tone and emotion preferences.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { LanguageCode, TranslationPreferences } from '@parley/shared';
import { getLanguageName } from '@parley/shared';
import { TranslationError, errorMessage } from '../errors.js';
import { sleep } from './timeout.js';
import type { TranslationProvider, TranslationRequest } from './types.js';

const MAX_RETRIES = 2;
const RETRYABLE_MARKERS = ['503', '429', 'timeout', 'ECONNRESET', 'network'];

const PROMPT_LEAKAGE_PATTERNS = [
  /CRITICAL RULES:/i,
  /Output ONLY/i,
  /NEVER generate/i,
  /NEVER add/i,
  /INPUT TEXT:/i,
  /real-time interpreter/i,
  /translate.*literally/i,
  /no quotes.*labels.*explanations/i,
];

function isRetryable(error: unknown): boolean {
  const message = errorMessage(error);
  return RETRYABLE_MARKERS.some((marker) => message.includes(marker));
}

export class GeminiTranslationService implements TranslationProvider {
  private model: GenerativeModel | null = null;
  private isInitialized = false;

  constructor(private readonly apiKey?: string) {}

  initialize(): boolean {
    if (!this.apiKey) {
      console.warn('[Translation] GEMINI_API_KEY not set - translation disabled');
      return false;
    }

    try {
      const genAI = new GoogleGenerativeAI(this.apiKey);
      this.model = genAI.getGenerativeModel({
        model: 'gemini-2.0-flash',
        generationConfig: {
          temperature: 0.3,
          maxOutputTokens: 1024,
        },
      });
      this.isInitialized = true;
      console.log('[Translation] Initialized successfully');
      return true;
    } catch (error) {
      console.error('[Translation] Failed to initialize:', errorMessage(error));
      return false;
    }
  }

  isReady(): boolean {
    return this.isInitialized;
  }

  async translate({ text, sourceLanguage, targetLanguage, preferences, signal }: TranslationRequest): Promise<string> {
    if (sourceLanguage === targetLanguage) {
      return text;
    }

    // Gemini tends to "fill in" content for minimal input like "." or single characters
    const trimmedText = text.trim();
    if (trimmedText.length < 3 || /^[.\s,!?]+$/.test(trimmedText)) {
      return trimmedText;
    }

    const model = this.model;
    if (!this.isInitialized || !model) {
      throw new TranslationError('Translation service not initialized', sourceLanguage, targetLanguage);
    }

    const prompt = this.buildTranslationPrompt(trimmedText, sourceLanguage, targetLanguage, preferences);
    const startTime = Date.now();

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new TranslationError(
          `Translation ${sourceLanguage}→${targetLanguage} abandoned after ${attempt} attempt(s)`,
          sourceLanguage,
          targetLanguage,
          { cause: signal.reason }
        );
      }

      try {
        const result = await model.generateContent(prompt, signal ? { signal } : undefined);
        const translatedText = this.cleanTranslation(result.response.text());

        if (!translatedText) {
          throw new TranslationError(
            `Empty or leaked ${sourceLanguage}→${targetLanguage} translation`,
            sourceLanguage,
            targetLanguage
          );
        }

        console.log(
          `[Translation] ${sourceLanguage}→${targetLanguage} in ${Date.now() - startTime}ms: "${translatedText.substring(0, 50)}"`
        );
        return translatedText;
      } catch (error) {
        if (error instanceof TranslationError) {
          throw error;
        }

        console.error('[Translation] Error:', errorMessage(error));

        if (attempt < MAX_RETRIES && isRetryable(error)) {
          const delayMs = Math.pow(2, attempt) * 500; // 500ms, 1s
          console.log(`[Translation] Retrying in ${delayMs}ms... (attempt ${attempt + 2}/${MAX_RETRIES + 1})`);
          await sleep(delayMs);
          continue;
        }

        throw new TranslationError(
          `Translation ${sourceLanguage}→${targetLanguage} failed: ${errorMessage(error)}`,
          sourceLanguage,
          targetLanguage,
          { cause: error }
        );
      }
    }
  }

  buildTranslationPrompt(
    text: string,
    sourceLanguage: LanguageCode,
    targetLanguage: LanguageCode,
    preferences: TranslationPreferences
  ): string {
    const sourceName = getLanguageName(sourceLanguage);
    const targetName = getLanguageName(targetLanguage);
    const tone = preferences.formalTone ? 'formal and professional' : 'natural and conversational';
    const emotion = preferences.preserveEmotion
      ? 'Preserve the emotional tone and intensity of the speaker'
      : 'Favor clarity over emotional nuance';

    return `Translate this ${sourceName} speech to ${targetName}. You are a real-time interpreter in a live voice call.

CRITICAL RULES:
- Output ONLY the direct translation of the input text
- NEVER generate, add, or invent any content not present in the original
- If the input is short (e.g., "Yes", "Thank you"), translate it literally - do NOT expand it
- Keep the translation ${tone}
- ${emotion}
- Keep the length similar to the original; use colloquialisms of ${targetName} for informal speech
- Output ONLY the translation - no quotes, labels, or explanations

INPUT TEXT:
${text}

TRANSLATION:`;
  }

  /**
   * Strip labels and quotes. Returns '' when the output echoes the prompt.
   */
  cleanTranslation(text: string): string {
    const cleaned = text
      .replace(/^(TRANSLATION:|Translation:)\s*/i, '')
      .replace(/^["']|["']$/g, '')
      .trim();

    for (const pattern of PROMPT_LEAKAGE_PATTERNS) {
      if (pattern.test(cleaned)) {
        console.error(`[Translation] Prompt leakage detected: "${cleaned.substring(0, 100)}"`);
        return '';
      }
    }

    return cleaned;
  }
}
