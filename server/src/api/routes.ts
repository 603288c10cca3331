import type { Express, Request, Response } from 'express';
import type { SessionRegistry } from '../session/sessionRegistry.js';

export interface ServiceStatus {
  stt: boolean;
  translation: boolean;
  tts: boolean;
}

export function setupRoutes(app: Express, registry: SessionRegistry, services: () => ServiceStatus): void {
  // Health check
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now(), sessions: registry.size(), services: services() });
  });

  app.get('/api/sessions', (_req: Request, res: Response) => {
    res.json({ sessions: registry.list() });
  });

  app.get('/api/sessions/:sessionId', (req: Request, res: Response) => {
    const session = registry.get(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json({ session: session.getStats() });
  });
}
