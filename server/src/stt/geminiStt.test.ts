import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TranscriptEvent } from '@parley/shared';
import { RecognitionError } from '../errors.js';
import { GeminiSttService, computeRms, filterTranscription, pcmToWav } from './geminiStt.js';
import type { SpeechRecognizer } from './recognizer.js';

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel() {
      return { generateContent };
    }
  },
}));

// One second of 16 kHz mono PCM at a constant amplitude
const tone = (amplitude: number, seconds = 1): Buffer => {
  const pcm = Buffer.alloc(32000 * seconds);
  for (let i = 0; i < pcm.length / 2; i++) {
    pcm.writeInt16LE(amplitude, i * 2);
  }
  return pcm;
};

const reply = (text: string) => ({ response: { text: () => text } });

describe('pcm helpers', () => {
  it('wraps PCM in a WAV header', () => {
    const wav = pcmToWav(Buffer.alloc(100));

    expect(wav.length).toBe(144);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt32LE(40)).toBe(100);
  });

  it('computes the RMS of 16-bit samples', () => {
    expect(computeRms(tone(1000))).toBe(1000);
    expect(computeRms(Buffer.alloc(0))).toBe(0);
  });

  it('filters meta responses and noise', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(filterTranscription('  Hola a todos ')).toBe('Hola a todos');
    expect(filterTranscription('[silence]')).toBeNull();
    expect(filterTranscription('No speech detected.')).toBeNull();
    expect(filterTranscription('...')).toBeNull();
    expect(filterTranscription('Hi.')).toBeNull();
  });
});

describe('GeminiRecognizer', () => {
  let recognizer: SpeechRecognizer;
  let events: TranscriptEvent[];
  let errors: RecognitionError[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    generateContent.mockReset();

    const service = new GeminiSttService('test-key');
    service.initialize();
    recognizer = service.createRecognizer('bob', 'es');
    events = [];
    errors = [];
    recognizer.on('transcript', (event) => events.push(event));
    recognizer.on('error', (error) => errors.push(error));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('transcribes buffered audio after a pause', async () => {
    generateContent.mockResolvedValue(reply('Hola a todos'));

    recognizer.write(tone(1000));
    await vi.advanceTimersByTimeAsync(499);
    expect(generateContent).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);

    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(events).toEqual([{ kind: 'final', text: 'Hola a todos', confidence: 0.9 }]);
  });

  it('flushes immediately once the buffer is full', async () => {
    generateContent.mockResolvedValue(reply('Hola a todos'));

    recognizer.write(tone(1000, 3));
    await vi.advanceTimersByTimeAsync(0);

    expect(generateContent).toHaveBeenCalledTimes(1);
  });

  it('skips silent and too-short audio', async () => {
    recognizer.write(tone(0));
    await vi.advanceTimersByTimeAsync(500);
    recognizer.write(Buffer.alloc(1000, 1));
    await vi.advanceTimersByTimeAsync(500);

    expect(generateContent).not.toHaveBeenCalled();
  });

  it('reports transcription failures as recognition errors', async () => {
    generateContent.mockRejectedValue(new Error('quota exceeded'));

    recognizer.write(tone(1000));
    await vi.advanceTimersByTimeAsync(500);

    expect(events).toHaveLength(0);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Transcription failed: quota exceeded');
    expect(errors[0].participantId).toBe('bob');
  });

  it('discards buffered audio on close', async () => {
    const closed = vi.fn();
    recognizer.on('close', closed);

    recognizer.write(tone(1000));
    await recognizer.close();
    await vi.advanceTimersByTimeAsync(1000);

    expect(generateContent).not.toHaveBeenCalled();
    expect(closed).toHaveBeenCalledTimes(1);
  });

  it('refuses to create recognizers when disabled', () => {
    const disabled = new GeminiSttService();

    expect(disabled.initialize()).toBe(false);
    expect(() => disabled.createRecognizer('bob', 'es')).toThrow(RecognitionError);
  });
});
