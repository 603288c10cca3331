import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import { v4 as uuid } from 'uuid';
import { errorMessage } from '../errors.js';
import type { BridgeClient } from './clients.js';
import { handleMessage, stopClientAgent, type BridgeContext } from './handlers.js';
import { parseClientMessage } from './messages.js';

const HEARTBEAT_INTERVAL_MS = 30000;

interface Connection {
  client: BridgeClient;
  socket: WebSocket;
  isAlive: boolean;
}

export class BridgeServer {
  private wss: WebSocketServer;
  private connections: Map<string, Connection> = new Map();
  private heartbeat: NodeJS.Timeout;

  constructor(server: Server, private readonly ctx: BridgeContext) {
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.heartbeat = this.setupHeartbeat();
    this.setupConnectionHandler();
    console.log('[Bridge] WebSocket server initialized');
  }

  private setupHeartbeat(): NodeJS.Timeout {
    // Ping all clients every 30 seconds to detect dead connections
    return setInterval(() => {
      for (const connection of this.connections.values()) {
        if (!connection.isAlive) {
          console.log(`[Bridge] Client ${connection.client.id} timed out`);
          connection.socket.terminate();
          continue;
        }
        connection.isAlive = false;
        connection.socket.ping();
      }
    }, HEARTBEAT_INTERVAL_MS);
  }

  private setupConnectionHandler(): void {
    this.wss.on('connection', (socket: WebSocket) => {
      const client: BridgeClient = { id: uuid(), socket };
      const connection: Connection = { client, socket, isAlive: true };

      this.connections.set(client.id, connection);
      this.ctx.clients.add(client);
      console.log(`[Bridge] Client connected: ${client.id}`);

      this.ctx.clients.send(client, 'session:state', { clientId: client.id });

      socket.on('pong', () => {
        connection.isAlive = true;
      });

      socket.on('message', (data) => {
        const parsed = parseClientMessage(data.toString());
        if (!parsed.ok) {
          console.error(`[Bridge] Rejected message from ${client.id}: ${parsed.error}`);
          this.ctx.clients.sendError(client, parsed.error, 'INVALID_MESSAGE');
          return;
        }

        handleMessage(client, parsed.message, this.ctx).catch((error: unknown) => {
          console.error(`[Bridge] Failed to handle ${parsed.message.type} from ${client.id}:`, errorMessage(error));
          this.ctx.clients.sendError(client, errorMessage(error));
        });
      });

      socket.on('close', () => {
        console.log(`[Bridge] Client disconnected: ${client.id}`);
        this.connections.delete(client.id);
        this.ctx.clients.remove(client.id);
        stopClientAgent(client, this.ctx).catch((error: unknown) => {
          console.error(`[Bridge] Failed to stop agent for ${client.id}:`, errorMessage(error));
        });
      });

      socket.on('error', (error) => {
        console.error(`[Bridge] Client ${client.id} error:`, error.message);
      });
    });
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  async close(): Promise<void> {
    clearInterval(this.heartbeat);
    const clients = Array.from(this.connections.values(), (connection) => connection.client);
    await Promise.allSettled(clients.map((client) => stopClientAgent(client, this.ctx)));
    for (const connection of this.connections.values()) {
      connection.socket.close(1001, 'Server shutting down');
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

export function setupWebSocketServer(server: Server, ctx: BridgeContext): BridgeServer {
  return new BridgeServer(server, ctx);
}
