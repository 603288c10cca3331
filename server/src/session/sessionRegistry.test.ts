import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EchoSynthesizer, FakeTranslator, RecordingOutput, createTestAgent } from '../testing/fakes.js';
import { SessionCoordinator } from './sessionCoordinator.js';
import { SessionRegistry } from './sessionRegistry.js';

describe('SessionRegistry', () => {
  let registry: SessionRegistry;
  let created: string[];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    created = [];
    registry = new SessionRegistry((sessionId) => {
      created.push(sessionId);
      return new SessionCoordinator({ sessionId, translator: new FakeTranslator() });
    });
  });

  afterEach(async () => {
    await registry.closeAll();
    vi.restoreAllMocks();
  });

  it('creates a session once and reuses it', () => {
    const first = registry.getOrCreate('call-1');
    const second = registry.getOrCreate('call-1');

    expect(second).toBe(first);
    expect(created).toEqual(['call-1']);
    expect(registry.get('call-2')).toBeUndefined();
  });

  it('keeps a session alive while agents remain', async () => {
    const session = registry.getOrCreate('call-1');
    const { agent } = createTestAgent('alice', 'en', {
      synthesizer: new EchoSynthesizer(),
      output: new RecordingOutput(),
    });
    agent.start(session);

    expect(await registry.release('call-1')).toBe(false);
    expect(registry.list()).toEqual([{ sessionId: 'call-1', agents: 1, participants: 1, currentSpeaker: null }]);

    await agent.stop();

    expect(await registry.release('call-1')).toBe(true);
    expect(registry.get('call-1')).toBeUndefined();
    expect(registry.size()).toBe(0);
  });

  it('keeps sessions independent', () => {
    registry.getOrCreate('call-1');
    registry.getOrCreate('call-2');

    expect(registry.list().map((s) => s.sessionId)).toEqual(['call-1', 'call-2']);
  });

  it('reports unknown sessions as not released', async () => {
    expect(await registry.release('missing')).toBe(false);
  });
});
