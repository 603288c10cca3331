import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SegmentUpdate } from '@parley/shared';
import { RecognitionError } from '../errors.js';
import { PushRecognizer } from './recognizer.js';
import { StreamingTranscriptAdapter, type TranscriptAdapterOptions } from './transcriptAdapter.js';

describe('StreamingTranscriptAdapter', () => {
  let clock: number;
  let updates: SegmentUpdate[];
  let discarded: string[];
  let recognizer: PushRecognizer;

  const createAdapter = (options: TranscriptAdapterOptions = {}) => {
    let counter = 0;
    return new StreamingTranscriptAdapter(
      'bob',
      'es',
      recognizer,
      {
        submit: (update) => updates.push(update),
        discard: (segmentId) => discarded.push(segmentId),
      },
      {
        now: () => clock,
        createSegmentId: () => `seg-${++counter}`,
        ...options,
      }
    );
  };

  beforeEach(() => {
    clock = 0;
    updates = [];
    discarded = [];
    recognizer = new PushRecognizer('bob', 'es');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('keeps one segment id across interim updates and closes it on final', () => {
    createAdapter();

    recognizer.push({ kind: 'interim', text: 'hola', confidence: 0.4 });
    clock = 100;
    recognizer.push({ kind: 'interim', text: 'hola amigo', confidence: 0.6 });
    clock = 200;
    recognizer.push({ kind: 'final', text: 'hola amigo mío', confidence: 0.95 });
    clock = 300;
    recognizer.push({ kind: 'interim', text: 'qué tal', confidence: 0.5 });

    expect(updates.map((u) => [u.segmentId, u.text, u.isFinal])).toEqual([
      ['seg-1', 'hola', false],
      ['seg-1', 'hola amigo', false],
      ['seg-1', 'hola amigo mío', true],
      ['seg-2', 'qué tal', false],
    ]);
  });

  it('always stamps the speaker and source language', () => {
    createAdapter();

    recognizer.push({ kind: 'final', text: 'buenos días', confidence: 0.9 });

    expect(updates[0]).toEqual({
      segmentId: 'seg-1',
      speakerId: 'bob',
      text: 'buenos días',
      sourceLanguage: 'es',
      isFinal: true,
      confidence: 0.9,
    });
  });

  it('starts a new segment after a silence gap', () => {
    createAdapter({ silenceGapMs: 650 });

    recognizer.push({ kind: 'interim', text: 'uno', confidence: 0.5 });
    clock = 600;
    recognizer.push({ kind: 'interim', text: 'uno dos', confidence: 0.5 });
    clock = 1300;
    recognizer.push({ kind: 'interim', text: 'tres', confidence: 0.5 });

    expect(updates.map((u) => u.segmentId)).toEqual(['seg-1', 'seg-1', 'seg-2']);
  });

  it('starts a new segment after an explicit silence', () => {
    const adapter = createAdapter();

    adapter.onInterim('uno', 0.5);
    adapter.onSilence();
    adapter.onInterim('dos', 0.5);

    expect(updates.map((u) => u.segmentId)).toEqual(['seg-1', 'seg-2']);
  });

  it('drops interim events when interim results are disabled', () => {
    createAdapter({ enableInterimResults: false });

    recognizer.push({ kind: 'interim', text: 'hola', confidence: 0.9 });
    recognizer.push({ kind: 'final', text: 'hola', confidence: 0.9 });

    expect(updates).toHaveLength(1);
    expect(updates[0].isFinal).toBe(true);
  });

  it('clamps confidence into [0, 1]', () => {
    const adapter = createAdapter();

    adapter.onInterim('alto', 1.4);
    adapter.onInterim('bajo', -0.2);

    expect(updates.map((u) => u.confidence)).toEqual([1, 0]);
  });

  it('drops events with a non-finite confidence', () => {
    const adapter = createAdapter();

    adapter.onInterim('hola', Number.NaN);

    expect(updates).toHaveLength(0);
    expect(adapter.getDroppedCount()).toBe(1);
  });

  it('ignores blank text without opening a segment', () => {
    const adapter = createAdapter();

    adapter.onInterim('   ', 0.5);

    expect(updates).toHaveLength(0);
    expect(adapter.getCurrentSegmentId()).toBeNull();
  });

  it('opens a fresh segment after the recognizer fails', () => {
    createAdapter();

    recognizer.push({ kind: 'interim', text: 'hola', confidence: 0.5 });
    recognizer.fail(new RecognitionError('stream lost', 'bob'));
    recognizer.push({ kind: 'interim', text: 'hola otra vez', confidence: 0.5 });

    expect(updates.map((u) => u.segmentId)).toEqual(['seg-1', 'seg-2']);
    expect(discarded).toEqual(['seg-1']);
  });

  it('has nothing to drop when the recognizer closes between utterances', async () => {
    createAdapter();

    recognizer.push({ kind: 'final', text: 'hola', confidence: 0.9 });
    await recognizer.close();

    expect(discarded).toEqual([]);
  });

  it('stays silent and does not forward audio while idle', () => {
    const adapter = createAdapter();
    const write = vi.spyOn(recognizer, 'write');

    adapter.setActive(false);
    adapter.write(Buffer.alloc(320));
    recognizer.push({ kind: 'final', text: 'hola', confidence: 0.9 });

    expect(write).not.toHaveBeenCalled();
    expect(updates).toHaveLength(0);

    adapter.setActive(true);
    adapter.write(Buffer.alloc(320));
    expect(write).toHaveBeenCalledTimes(1);
  });

  it('closes the wrapped recognizer', async () => {
    const adapter = createAdapter();

    await adapter.close();

    expect(recognizer.isClosed()).toBe(true);
    expect(adapter.isActive()).toBe(false);
  });
});
