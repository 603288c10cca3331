/**
 * Translation Buffer
 *
 * Session-scoped queue of in-flight transcript segments. Decides when a segment
 * is ready to translate and hands it to every registered listener:
 * - immediately, once a segment is final or above the confidence threshold
 * - forcibly, once a pending segment is older than maxDelayMs
 *
 * Each segment is dispatched at most once; the pending -> translating
 * transition is the guard.
 */

import type { BufferStats, Segment, SegmentUpdate } from '@parley/shared';
import {
  DEFAULT_HIGH_CONFIDENCE_THRESHOLD,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_SEGMENT_CLEANUP_MS,
} from '@parley/shared';
import { errorMessage } from '../errors.js';

export type SegmentListener = (segment: Readonly<Segment>) => Promise<void> | void;

export interface TranslationBufferOptions {
  maxDelayMs?: number;
  highConfidenceThreshold?: number;
  cleanupDelayMs?: number;
  // How often pending segments are checked against maxDelayMs. Never above maxDelayMs.
  pollIntervalMs?: number;
  now?: () => number;
}

interface Counters {
  segmentsReceived: number;
  segmentsDispatched: number;
  forcedDispatches: number;
  segmentsCompleted: number;
  segmentsFailed: number;
  listenerFailures: number;
  totalDispatchLatencyMs: number;
  maxDispatchLatencyMs: number;
}

export class TranslationBuffer {
  readonly maxDelayMs: number;
  readonly highConfidenceThreshold: number;
  private readonly cleanupDelayMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;

  private segments: Map<string, Segment> = new Map();
  private listeners: Map<string, SegmentListener> = new Map();
  private queue: string[] = [];
  private queued: Set<string> = new Set();
  private inFlight: Set<Promise<void>> = new Set();
  private cleanupTimers: Map<string, NodeJS.Timeout> = new Map();
  private pollTimer: NodeJS.Timeout | null = null;
  private drainScheduled = false;
  private running = false;

  private counters: Counters = {
    segmentsReceived: 0,
    segmentsDispatched: 0,
    forcedDispatches: 0,
    segmentsCompleted: 0,
    segmentsFailed: 0,
    listenerFailures: 0,
    totalDispatchLatencyMs: 0,
    maxDispatchLatencyMs: 0,
  };

  constructor(options: TranslationBufferOptions = {}) {
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.highConfidenceThreshold = options.highConfidenceThreshold ?? DEFAULT_HIGH_CONFIDENCE_THRESHOLD;
    this.cleanupDelayMs = options.cleanupDelayMs ?? DEFAULT_SEGMENT_CLEANUP_MS;
    this.pollIntervalMs = Math.min(
      options.pollIntervalMs ?? Math.max(10, Math.floor(this.maxDelayMs / 10)),
      this.maxDelayMs
    );
    this.now = options.now ?? (() => performance.now());
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.pollTimer = setInterval(() => this.dispatchOverdue(), this.pollIntervalMs);
    this.scheduleDrain();
    console.log(`[TranslationBuffer] Started (max delay ${this.maxDelayMs}ms, poll ${this.pollIntervalMs}ms)`);
  }

  /**
   * Stop dispatching. In-flight dispatches are allowed to finish; every
   * tracked segment is dropped afterwards.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    await Promise.allSettled(Array.from(this.inFlight));

    for (const timer of this.cleanupTimers.values()) {
      clearTimeout(timer);
    }
    this.cleanupTimers.clear();
    this.segments.clear();
    this.queue = [];
    this.queued.clear();
    console.log('[TranslationBuffer] Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  registerListener(listenerId: string, callback: SegmentListener): void {
    this.listeners.set(listenerId, callback);
  }

  unregisterListener(listenerId: string): void {
    this.listeners.delete(listenerId);
  }

  /**
   * Create or merge a segment by id.
   * Returns false when the update was ignored (empty text, or segment no longer pending).
   */
  submit(update: SegmentUpdate): boolean {
    const text = update.text.trim();
    if (!text) {
      return false;
    }

    let segment = this.segments.get(update.segmentId);

    if (segment) {
      if (segment.state !== 'pending') {
        return false;
      }
      if (segment.speakerId !== update.speakerId) {
        console.warn(
          `[TranslationBuffer] Rejected update for ${update.segmentId}: speaker ${update.speakerId} does not own it`
        );
        return false;
      }
      segment.text = text;
      segment.isFinal = update.isFinal;
      segment.confidence = update.confidence;
    } else {
      segment = {
        segmentId: update.segmentId,
        speakerId: update.speakerId,
        text,
        sourceLanguage: update.sourceLanguage,
        createdAt: this.now(),
        isFinal: update.isFinal,
        confidence: update.confidence,
        state: 'pending',
        translationStartedAt: null,
        translationCompletedAt: null,
      };
      this.segments.set(update.segmentId, segment);
      this.counters.segmentsReceived++;
    }

    if (segment.isFinal || segment.confidence > this.highConfidenceThreshold) {
      this.enqueue(segment.segmentId);
    }

    return true;
  }

  /**
   * Fail a still-pending segment without dispatching it.
   * Returns false when it is unknown, owned by another speaker, or already dispatched.
   */
  discard(segmentId: string, speakerId: string): boolean {
    const segment = this.segments.get(segmentId);
    if (!segment || segment.state !== 'pending' || segment.speakerId !== speakerId) {
      return false;
    }

    segment.state = 'failed';
    this.counters.segmentsFailed++;
    if (this.queued.delete(segmentId)) {
      this.queue = this.queue.filter((id) => id !== segmentId);
    }
    console.log(`[TranslationBuffer] Discarded ${segmentId} before dispatch: "${segment.text.substring(0, 50)}"`);

    this.scheduleCleanup(segmentId);
    return true;
  }

  getSegment(segmentId: string): Readonly<Segment> | undefined {
    const segment = this.segments.get(segmentId);
    return segment ? { ...segment } : undefined;
  }

  getStats(): BufferStats {
    const { totalDispatchLatencyMs, ...counters } = this.counters;
    return {
      ...counters,
      avgDispatchLatencyMs:
        counters.segmentsDispatched > 0 ? totalDispatchLatencyMs / counters.segmentsDispatched : 0,
      pendingSegments: Array.from(this.segments.values()).filter(s => s.state === 'pending').length,
      queueSize: this.queue.length,
      maxDelayMs: this.maxDelayMs,
    };
  }

  private enqueue(segmentId: string): void {
    if (this.queued.has(segmentId)) return;

    this.queued.add(segmentId);
    this.queue.push(segmentId);
    this.scheduleDrain();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled || !this.running || this.queue.length === 0) return;

    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (this.running && this.queue.length > 0) {
      const segmentId = this.queue.shift();
      if (segmentId === undefined) break;
      this.queued.delete(segmentId);
      this.track(this.dispatch(segmentId, false));
    }
  }

  private dispatchOverdue(): void {
    const now = this.now();

    for (const segment of this.segments.values()) {
      if (segment.state === 'pending' && now - segment.createdAt >= this.maxDelayMs) {
        this.track(this.dispatch(segment.segmentId, true));
      }
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    task.then(
      () => this.inFlight.delete(task),
      (error: unknown) => {
        this.inFlight.delete(task);
        console.error('[TranslationBuffer] Dispatch error:', errorMessage(error));
      }
    );
  }

  private async dispatch(segmentId: string, forced: boolean): Promise<void> {
    const segment = this.segments.get(segmentId);
    if (!segment || segment.state !== 'pending') {
      return;
    }

    segment.state = 'translating';
    segment.translationStartedAt = this.now();

    const latency = segment.translationStartedAt - segment.createdAt;
    this.counters.segmentsDispatched++;
    this.counters.totalDispatchLatencyMs += latency;
    this.counters.maxDispatchLatencyMs = Math.max(this.counters.maxDispatchLatencyMs, latency);
    if (forced) {
      this.counters.forcedDispatches++;
    }

    console.log(
      `[TranslationBuffer] Dispatching ${segmentId}${forced ? ' (max delay reached)' : ''} after ${Math.round(latency)}ms: "${segment.text.substring(0, 50)}"`
    );

    const snapshot: Readonly<Segment> = Object.freeze({ ...segment });
    const listeners = Array.from(this.listeners.entries());

    const outcomes = await Promise.allSettled(
      listeners.map(([, callback]) => Promise.resolve().then(() => callback(snapshot)))
    );

    let failures = 0;
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        failures++;
        console.error(
          `[TranslationBuffer] Listener ${listeners[index][0]} failed for ${segmentId}:`,
          errorMessage(outcome.reason)
        );
      }
    });
    this.counters.listenerFailures += failures;

    segment.translationCompletedAt = this.now();
    if (listeners.length > 0 && failures === listeners.length) {
      segment.state = 'failed';
      this.counters.segmentsFailed++;
      console.warn(`[TranslationBuffer] Segment ${segmentId} failed for every listener, discarding`);
    } else {
      segment.state = 'completed';
      this.counters.segmentsCompleted++;
    }

    this.scheduleCleanup(segmentId);
  }

  private scheduleCleanup(segmentId: string): void {
    if (!this.running) {
      this.segments.delete(segmentId);
      return;
    }

    const timer = setTimeout(() => {
      this.cleanupTimers.delete(segmentId);
      this.segments.delete(segmentId);
    }, this.cleanupDelayMs);
    this.cleanupTimers.set(segmentId, timer);
  }
}
