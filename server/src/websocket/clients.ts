import { WebSocket } from 'ws';
import type { AudioControlPayload, WSMessage, WSMessageType } from '@parley/shared';
import type { TranslationAgent } from '../agents/translationAgent.js';
import type { AudioControlSink } from '../routing/audioRoutingPolicy.js';
import type { AudioOutput, OutputChunk, PlaybackItem } from '../tts/types.js';

// The part of a ws socket the bridge writes to
export interface MessageSocket {
  readonly readyState: number;
  send(data: string): void;
}

export interface BridgeClient {
  id: string;
  socket: MessageSocket;
  sessionId?: string;
  agent?: TranslationAgent;
}

/**
 * Connected clients, looked up by connection id or by the participant whose
 * agent they run.
 */
export class ClientDirectory {
  private clients: Map<string, BridgeClient> = new Map();

  add(client: BridgeClient): void {
    this.clients.set(client.id, client);
  }

  remove(clientId: string): void {
    this.clients.delete(clientId);
  }

  get(clientId: string): BridgeClient | undefined {
    return this.clients.get(clientId);
  }

  size(): number {
    return this.clients.size;
  }

  findParticipant(sessionId: string, participantId: string): BridgeClient | undefined {
    for (const client of this.clients.values()) {
      if (client.sessionId === sessionId && client.agent?.participantId === participantId) {
        return client;
      }
    }
    return undefined;
  }

  inSession(sessionId: string): BridgeClient[] {
    return Array.from(this.clients.values()).filter((client) => client.sessionId === sessionId);
  }

  send<T>(client: BridgeClient, type: WSMessageType, payload: T): boolean {
    if (client.socket.readyState !== WebSocket.OPEN) {
      return false;
    }
    const message: WSMessage<T> = { type, payload };
    client.socket.send(JSON.stringify(message));
    return true;
  }

  sendError(client: BridgeClient, message: string, code?: string): void {
    this.send(client, 'error', { message, code });
  }

  broadcast<T>(sessionId: string, type: WSMessageType, payload: T): void {
    for (const client of this.inSession(sessionId)) {
      this.send(client, type, payload);
    }
  }

  // Mute/unmute instructions for the listener's own client
  controlSink(sessionId: string): AudioControlSink {
    return {
      setSourceMuted: (listenerId, sourceId, muted) => {
        const client = this.findParticipant(sessionId, listenerId);
        if (!client) return false;
        const payload: AudioControlPayload = { listenerId, sourceId, muted };
        return this.send(client, 'audio:control', payload);
      },
    };
  }

  audioOutput(client: BridgeClient): AudioOutput {
    return new SocketAudioOutput(this, client);
  }
}

class SocketAudioOutput implements AudioOutput {
  constructor(
    private readonly directory: ClientDirectory,
    private readonly client: BridgeClient
  ) {}

  play(_participantId: string, chunk: OutputChunk): void {
    this.directory.send(this.client, 'tts:audio_chunk', {
      segmentId: chunk.segmentId,
      speakerId: chunk.speakerId,
      chunkIndex: chunk.chunkIndex,
      audioData: chunk.audio.toString('base64'),
      trackId: chunk.trackId,
    });
  }

  playbackStarted(_participantId: string, item: PlaybackItem): void {
    this.directory.send(this.client, 'tts:start', {
      segmentId: item.segmentId,
      speakerId: item.speakerId,
      text: item.text,
    });
  }

  playbackEnded(_participantId: string, item: PlaybackItem): void {
    this.directory.send(this.client, 'tts:end', {
      segmentId: item.segmentId,
      speakerId: item.speakerId,
    });
  }

  playbackFailed(_participantId: string, item: PlaybackItem, error: Error): void {
    this.directory.send(this.client, 'tts:error', {
      segmentId: item.segmentId,
      speakerId: item.speakerId,
      error: error.message,
    });
  }
}
