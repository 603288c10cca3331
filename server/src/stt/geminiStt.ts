/**
 * Gemini STT Service
 *
 * Uses Gemini 2.0 Flash's multimodal capabilities to transcribe audio.
 * Each recognizer buffers one speaker's PCM and sends batches for
 * transcription, emitting one final event per batch.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { LanguageCode } from '@parley/shared';
import { getLanguageName } from '@parley/shared';
import { RecognitionError, errorMessage } from '../errors.js';
import { BaseRecognizer, type SpeechRecognizer } from './recognizer.js';

// At 16kHz, 16-bit mono: 32,000 bytes per second
const BYTES_PER_SECOND = 32000;
const BUFFER_DURATION_MS = 3000;
const BUFFER_SIZE_BYTES = (BUFFER_DURATION_MS / 1000) * BYTES_PER_SECOND;
const IDLE_FLUSH_MS = 500;
const MIN_AUDIO_BYTES = BYTES_PER_SECOND * 0.5;
const SILENCE_RMS = 100;

// Gemini doesn't provide confidence scores
const TRANSCRIPT_CONFIDENCE = 0.9;

// Gemini meta-responses, not actual transcriptions
const META_PATTERNS = [
  /^\[silence\]$/i,
  /^\[silent\]$/i,
  /^no audio/i,
  /^the audio/i,
  /^this audio/i,
  /^i cannot/i,
  /^i can't/i,
  /^there is no/i,
  /^audio not detected/i,
  /^no speech/i,
];

/**
 * Wrap raw PCM in a 44-byte WAV header. Gemini requires a proper audio format.
 */
export function pcmToWav(pcm: Buffer, sampleRate = 16000, channels = 1, bitsPerSample = 16): Buffer {
  const header = Buffer.alloc(44);

  header.write('RIFF', 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8);

  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE((sampleRate * channels * bitsPerSample) / 8, 28);
  header.writeUInt16LE((channels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);

  header.write('data', 36);
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

export function computeRms(pcm: Buffer): number {
  const sampleCount = Math.floor(pcm.length / 2);
  if (sampleCount === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = pcm.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

/**
 * Returns the usable transcription, or null for meta responses and noise.
 */
export function filterTranscription(raw: string): string | null {
  const text = raw.trim();
  if (!text) return null;

  if (META_PATTERNS.some((pattern) => pattern.test(text))) {
    console.log(`[GeminiSTT] Skipping meta-response: "${text}"`);
    return null;
  }

  // Gemini returns "." for unclear audio
  const withoutPunctuation = text.replace(/[\s.,!?;:\-…·•]+/g, '');
  if (withoutPunctuation.length <= 2) {
    console.log(`[GeminiSTT] Skipping punctuation-only or too-short response: "${text}"`);
    return null;
  }

  return text;
}

export class GeminiRecognizer extends BaseRecognizer {
  private chunks: Buffer[] = [];
  private bufferSize = 0;
  private flushTimer: NodeJS.Timeout | null = null;
  private pendingFlush: Promise<void> | null = null;

  constructor(
    participantId: string,
    language: LanguageCode,
    private readonly model: GenerativeModel
  ) {
    super(participantId, language);
  }

  write(frame: Buffer): void {
    if (this.closed) return;

    this.chunks.push(frame);
    this.bufferSize += frame.length;

    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.bufferSize >= BUFFER_SIZE_BYTES) {
      this.startFlush();
    } else {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.startFlush();
      }, IDLE_FLUSH_MS);
    }
  }

  /**
   * Remaining audio is discarded rather than flushed; in-flight batches finish first.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.pendingFlush) {
      await this.pendingFlush;
    }

    if (this.bufferSize > 0) {
      console.log(`[GeminiSTT] Discarding ${this.bufferSize} bytes of buffered audio for ${this.participantId}`);
    }
    this.chunks = [];
    this.bufferSize = 0;

    this.emitClose();
  }

  private startFlush(): void {
    const previous = this.pendingFlush ?? Promise.resolve();
    const flush = previous.then(() => this.flush());
    this.pendingFlush = flush;
    flush.then(
      () => {
        if (this.pendingFlush === flush) this.pendingFlush = null;
      },
      (error: unknown) => {
        console.error(`[GeminiSTT] Flush failed for ${this.participantId}:`, errorMessage(error));
      }
    );
  }

  private async flush(): Promise<void> {
    if (this.chunks.length === 0) return;

    const pcm = Buffer.concat(this.chunks);
    this.chunks = [];
    this.bufferSize = 0;

    if (pcm.length < MIN_AUDIO_BYTES) {
      console.log(`[GeminiSTT] Audio too short (${pcm.length} bytes), skipping`);
      return;
    }

    const rms = computeRms(pcm);
    if (rms < SILENCE_RMS) {
      console.log(`[GeminiSTT] Audio too quiet (RMS=${Math.round(rms)}), likely silence - skipping`);
      return;
    }

    try {
      const text = await this.transcribe(pcm);
      if (text === null || this.closed) return;

      console.log(`[GeminiSTT] Transcribed ${this.participantId}: "${text.substring(0, 50)}"`);
      this.emitTranscript({ kind: 'final', text, confidence: TRANSCRIPT_CONFIDENCE });
    } catch (error) {
      this.emitError(
        new RecognitionError(`Transcription failed: ${errorMessage(error)}`, this.participantId, { cause: error })
      );
    }
  }

  private async transcribe(pcm: Buffer): Promise<string | null> {
    const languageName = getLanguageName(this.language);

    try {
      const result = await this.model.generateContent([
        {
          inlineData: {
            mimeType: 'audio/wav',
            data: pcmToWav(pcm).toString('base64'),
          },
        },
        {
          text: `Transcribe this audio. The speaker is speaking in ${languageName}.
Return ONLY the transcription text, nothing else.
If you cannot understand the audio or it's silent, return an empty string.`,
        },
      ]);

      return filterTranscription(result.response.text());
    } catch (error) {
      const message = errorMessage(error);
      if (message.includes('Could not find audio') || message.includes('no audio') || message.includes('silent')) {
        return null;
      }
      throw error;
    }
  }
}

export class GeminiSttService {
  private model: GenerativeModel | null = null;

  constructor(private readonly apiKey?: string) {}

  initialize(): boolean {
    if (!this.apiKey) {
      console.warn('[GeminiSTT] GEMINI_API_KEY not set - transcription disabled');
      return false;
    }

    try {
      const genAI = new GoogleGenerativeAI(this.apiKey);
      this.model = genAI.getGenerativeModel({ model: 'gemini-2.0-flash' });
      console.log('[GeminiSTT] Initialized successfully');
      return true;
    } catch (error) {
      console.error('[GeminiSTT] Failed to initialize:', errorMessage(error));
      return false;
    }
  }

  isReady(): boolean {
    return this.model !== null;
  }

  createRecognizer(participantId: string, language: LanguageCode): SpeechRecognizer {
    if (!this.model) {
      throw new RecognitionError('Gemini STT not initialized', participantId);
    }
    return new GeminiRecognizer(participantId, language, this.model);
  }
}
