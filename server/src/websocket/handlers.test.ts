import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { WSMessage } from '@parley/shared';
import { SessionCoordinator } from '../session/sessionCoordinator.js';
import { SessionRegistry } from '../session/sessionRegistry.js';
import { PushRecognizer } from '../stt/recognizer.js';
import { EchoSynthesizer, FakeTranslator } from '../testing/fakes.js';
import { ClientDirectory, type BridgeClient } from './clients.js';
import { handleMessage, stopClientAgent, type BridgeContext } from './handlers.js';
import { parseClientMessage } from './messages.js';

const settle = () => vi.advanceTimersByTimeAsync(0);

class FakeSocket {
  readyState = 1;
  messages: WSMessage[] = [];

  send(data: string): void {
    this.messages.push(JSON.parse(data));
  }

  ofType(type: WSMessage['type']): unknown[] {
    return this.messages.filter((m) => m.type === type).map((m) => m.payload);
  }
}

describe('bridge handlers', () => {
  let ctx: BridgeContext;
  let sockets: Map<string, FakeSocket>;

  const connect = (id: string): BridgeClient => {
    const socket = new FakeSocket();
    sockets.set(id, socket);
    const client: BridgeClient = { id, socket };
    ctx.clients.add(client);
    return client;
  };

  const socketOf = (id: string): FakeSocket => {
    const socket = sockets.get(id);
    if (!socket) throw new Error(`no socket ${id}`);
    return socket;
  };

  const send = async (client: BridgeClient, raw: unknown): Promise<void> => {
    const parsed = parseClientMessage(JSON.stringify(raw));
    if (!parsed.ok) throw new Error(parsed.error);
    await handleMessage(client, parsed.message, ctx);
  };

  const start = (client: BridgeClient, participantId: string, language: string) =>
    send(client, { type: 'agent:start', payload: { sessionId: 'call-1', participantId, language } });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const clients = new ClientDirectory();
    sockets = new Map();
    ctx = {
      clients,
      registry: new SessionRegistry(
        (sessionId) =>
          new SessionCoordinator({
            sessionId,
            translator: new FakeTranslator(),
            controlSink: clients.controlSink(sessionId),
            maxParticipants: 2,
          })
      ),
      recognizerFactory: (participantId, language) => new PushRecognizer(participantId, language),
      synthesizer: new EchoSynthesizer(),
    };
  });

  afterEach(async () => {
    await ctx.registry.closeAll();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('rejects malformed and unsupported messages', () => {
    expect(parseClientMessage('{not json')).toEqual({ ok: false, error: 'Invalid message format' });
    expect(
      parseClientMessage(
        JSON.stringify({ type: 'agent:start', payload: { sessionId: 'call-1', participantId: 'alice', language: 'xx' } })
      )
    ).toEqual({ ok: false, error: 'Invalid message (payload.language: Unsupported language)' });
  });

  it('requires an agent before routing audio commands', async () => {
    const client = connect('c1');

    await send(client, { type: 'speaker:start', payload: { participantId: 'bob' } });

    expect(socketOf('c1').ofType('error')).toEqual([
      { message: 'No agent running on this connection', code: 'NO_AGENT' },
    ]);
  });

  it('starts an agent and shares the session state', async () => {
    const alice = connect('c1');
    const bob = connect('c2');

    await start(alice, 'alice', 'en');
    await start(bob, 'bob', 'es');

    expect(ctx.registry.get('call-1')?.getParticipants()).toEqual({ alice: 'en', bob: 'es' });
    expect(socketOf('c1').ofType('session:state').at(-1)).toMatchObject({
      clientId: 'c1',
      participantId: 'alice',
      sessionId: 'call-1',
      participants: { alice: 'en', bob: 'es' },
      currentSpeaker: null,
    });
  });

  it('voices a pushed transcript to the other participant', async () => {
    const alice = connect('c1');
    const bob = connect('c2');
    await start(alice, 'alice', 'en');
    await start(bob, 'bob', 'es');

    await send(alice, { type: 'stt:final', payload: { sourceId: 'bob', text: 'hola amigos', confidence: 0.95 } });
    await settle();

    const socket = socketOf('c1');
    expect(socket.ofType('translation:complete')).toMatchObject([
      { speakerId: 'bob', targetParticipantId: 'alice', translatedText: '[en] hola amigos' },
    ]);
    expect(socket.ofType('tts:start')).toMatchObject([{ speakerId: 'bob', text: '[en] hola amigos' }]);
    expect(socket.ofType('tts:audio_chunk')).toMatchObject([
      { chunkIndex: 0, trackId: 'tts-alice', audioData: Buffer.from('[en] hola amigos').toString('base64') },
    ]);
    expect(socket.ofType('tts:end')).toHaveLength(1);
    expect(socketOf('c2').ofType('translation:complete')).toEqual([]);
  });

  it('tells a newly started listener to mute raw speech in another language', async () => {
    const alice = connect('c1');
    const bob = connect('c2');
    await start(alice, 'alice', 'en');
    await start(bob, 'bob', 'es');

    await send(alice, { type: 'speaker:start', payload: { participantId: 'alice' } });

    expect(socketOf('c2').ofType('audio:control')).toEqual([{ listenerId: 'bob', sourceId: 'alice', muted: true }]);
    expect(socketOf('c1').ofType('audio:control')).toEqual([{ listenerId: 'alice', sourceId: 'bob', muted: true }]);
  });

  it('reports a participant the full session cannot admit', async () => {
    const alice = connect('c1');
    await start(alice, 'alice', 'en');
    await start(connect('c2'), 'bob', 'es');

    await send(alice, { type: 'participant:joined', payload: { participantId: 'carol', language: 'fr' } });

    expect(socketOf('c1').ofType('error')).toEqual([
      { message: 'Session call-1 is full (2 participants)', code: 'SESSION_FULL' },
    ]);
    expect(alice.agent?.tracks('carol')).toBe(false);
    expect(ctx.registry.get('call-1')?.getParticipants()).toEqual({ alice: 'en', bob: 'es' });
  });

  it('unmutes a same-language speaker for the listener', async () => {
    const alice = connect('c1');
    const carol = connect('c2');
    await start(alice, 'alice', 'en');
    await start(carol, 'carol', 'en');

    await send(alice, { type: 'speaker:start', payload: { participantId: 'carol' } });

    expect(socketOf('c1').ofType('audio:control').at(-1)).toEqual({
      listenerId: 'alice',
      sourceId: 'carol',
      muted: false,
    });
  });

  it('reports a full session and keeps the connection agent-free', async () => {
    await start(connect('c1'), 'alice', 'en');
    await start(connect('c2'), 'bob', 'es');
    const late = connect('c3');

    await start(late, 'carol', 'fr');

    expect(socketOf('c3').ofType('error')).toEqual([
      { message: 'Session call-1 is full (2 participants)', code: 'SESSION_FULL' },
    ]);
    expect(late.agent).toBeUndefined();
  });

  it('refuses a second agent for the same participant', async () => {
    await start(connect('c1'), 'alice', 'en');
    const duplicate = connect('c2');

    await start(duplicate, 'alice', 'en');

    expect(socketOf('c2').ofType('error')).toEqual([
      { message: 'Participant alice already has an agent', code: 'DUPLICATE_AGENT' },
    ]);
  });

  it('destroys the session once the last agent stops', async () => {
    const alice = connect('c1');
    const bob = connect('c2');
    await start(alice, 'alice', 'en');
    await start(bob, 'bob', 'es');

    await send(alice, { type: 'agent:stop' });
    expect(ctx.registry.get('call-1')?.getParticipants()).toEqual({ bob: 'es' });

    await stopClientAgent(bob, ctx);
    expect(ctx.registry.get('call-1')).toBeUndefined();
    expect(bob.agent).toBeUndefined();
  });
});
