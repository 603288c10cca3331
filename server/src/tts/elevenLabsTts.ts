/**
 * ElevenLabs TTS Service
 *
 * Streaming text-to-speech synthesis using the ElevenLabs API, tuned for
 * low-latency interpretation playback.
 */

import type { LanguageCode } from '@parley/shared';
import { getLanguageInfo } from '@parley/shared';
import { errorMessage } from '../errors.js';
import type { SpeechSynthesizer, SynthesisRequest } from './types.js';

interface ElevenLabsConfig {
  apiKey: string;
  modelId: string;
  outputFormat: string;
  baseUrl: string;
}

export interface VoiceSettings {
  stability: number;
  similarity_boost: number;
  style: number;
  use_speaker_boost: boolean;
}

const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.55,
  similarity_boost: 0.75,
  style: 0,                 // ElevenLabs recommends 0 for stability
  use_speaker_boost: true,
};

const MAX_TEXT_LENGTH = 40000;

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  private config: ElevenLabsConfig | null = null;

  constructor(
    private readonly apiKey?: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  initialize(): boolean {
    if (!this.apiKey) {
      console.warn('[ElevenLabsTTS] ELEVENLABS_API_KEY not set - TTS service disabled');
      return false;
    }

    this.config = {
      apiKey: this.apiKey,
      modelId: 'eleven_flash_v2_5',  // Flash for lowest latency (~75ms)
      outputFormat: 'mp3_44100_64',
      baseUrl: 'https://api.elevenlabs.io',
    };

    console.log(`[ElevenLabsTTS] Service initialized, model: ${this.config.modelId}`);
    return true;
  }

  isReady(): boolean {
    return this.config !== null;
  }

  getDefaultVoice(language: LanguageCode): string {
    return getLanguageInfo(language).defaultVoiceId;
  }

  async synthesize({ text, voiceId, language, onChunk }: SynthesisRequest): Promise<void> {
    const config = this.config;
    if (!config) {
      throw new Error('ElevenLabs TTS service not initialized');
    }

    const processedText = this.preprocessForTTS(text);
    if (!processedText) {
      console.warn('[ElevenLabsTTS] Empty text after preprocessing, skipping TTS');
      return;
    }

    const url = new URL(`${config.baseUrl}/v1/text-to-speech/${voiceId || this.getDefaultVoice(language)}/stream`);
    url.searchParams.set('optimize_streaming_latency', '3');
    url.searchParams.set('output_format', config.outputFormat);

    console.log(`[ElevenLabsTTS] Generating TTS for ${processedText.length} chars (${language})`);

    const response = await this.fetchImpl(url.toString(), {
      method: 'POST',
      headers: {
        'Accept': 'audio/mpeg',
        'Content-Type': 'application/json',
        'xi-api-key': config.apiKey,
      },
      body: JSON.stringify({
        text: processedText,
        model_id: config.modelId,
        voice_settings: DEFAULT_VOICE_SETTINGS,
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`ElevenLabs API error: ${response.status} - ${errorText}`);
    }

    if (!response.body) {
      throw new Error('No response body from ElevenLabs');
    }

    const reader = response.body.getReader();
    let totalBytes = 0;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        if (value) {
          totalBytes += value.length;
          onChunk(Buffer.from(value));
        }
      }
    } catch (error) {
      throw new Error(`ElevenLabs stream interrupted: ${errorMessage(error)}`, { cause: error });
    } finally {
      reader.releaseLock();
    }

    console.log(`[ElevenLabsTTS] Stream complete, total bytes: ${totalBytes}`);
  }

  /**
   * Normalize text that reads badly aloud (URLs, abbreviations)
   */
  preprocessForTTS(text: string): string {
    let processed = text
      .replace(/https?:\/\//g, '')
      .replace(/@/g, ' at ')
      .replace(/\.com\b/g, ' dot com')
      .replace(/\.org\b/g, ' dot org')
      .replace(/\.net\b/g, ' dot net')
      .replace(/\.io\b/g, ' dot I O');

    processed = processed
      .replace(/\bvs\.?(?=\s|$)/gi, 'versus')
      .replace(/\be\.g\.(?=\s|$)/gi, 'for example')
      .replace(/\bi\.e\.(?=\s|$)/gi, 'that is')
      .replace(/\betc\.(?=\s|$)/gi, 'et cetera');

    processed = processed.replace(/\s+/g, ' ').trim();

    if (processed.length > MAX_TEXT_LENGTH) {
      console.warn('[ElevenLabsTTS] Text exceeds 40K limit, truncating');
      processed = processed.slice(0, MAX_TEXT_LENGTH - 100) + '...';
    }

    return processed;
  }
}
