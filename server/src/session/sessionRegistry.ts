/**
 * Session Registry
 *
 * Creates a session's coordinator when its first agent arrives and closes it
 * once the last agent has left. One registry is constructed at startup and
 * handed to the transport layer.
 */

import type { SessionCoordinator } from './sessionCoordinator.js';

export type CoordinatorFactory = (sessionId: string) => SessionCoordinator;

export interface SessionSummary {
  sessionId: string;
  agents: number;
  participants: number;
  currentSpeaker: string | null;
}

export class SessionRegistry {
  private sessions: Map<string, SessionCoordinator> = new Map();

  constructor(private readonly createCoordinator: CoordinatorFactory) {}

  getOrCreate(sessionId: string): SessionCoordinator {
    let session = this.sessions.get(sessionId);

    if (!session) {
      session = this.createCoordinator(sessionId);
      session.start();
      this.sessions.set(sessionId, session);
      console.log(`[Sessions] Created session ${sessionId}`);
    }

    return session;
  }

  get(sessionId: string): SessionCoordinator | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Close and forget a session with no agents left.
   * Returns true when the session was destroyed.
   */
  async release(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session || session.getAgentCount() > 0) {
      return false;
    }

    this.sessions.delete(sessionId);
    await session.close();
    console.log(`[Sessions] Destroyed session ${sessionId}`);
    return true;
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values(), (session) => ({
      sessionId: session.sessionId,
      agents: session.getAgentCount(),
      participants: Object.keys(session.getParticipants()).length,
      currentSpeaker: session.getCurrentSpeaker(),
    }));
  }

  size(): number {
    return this.sessions.size;
  }

  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.allSettled(sessions.map((session) => session.close()));
  }
}
