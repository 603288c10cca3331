import express from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { setupRoutes } from './api/routes.js';
import { loadEnvConfig } from './config/config.js';
import { errorMessage } from './errors.js';
import { SessionCoordinator } from './session/sessionCoordinator.js';
import { SessionRegistry } from './session/sessionRegistry.js';
import { GeminiSttService } from './stt/geminiStt.js';
import { PushRecognizer, type RecognizerFactory } from './stt/recognizer.js';
import { GeminiTranslationService } from './translation/geminiTranslation.js';
import { ElevenLabsSynthesizer } from './tts/elevenLabsTts.js';
import { ClientDirectory } from './websocket/clients.js';
import { setupWebSocketServer } from './websocket/server.js';

const config = loadEnvConfig();

const sttService = new GeminiSttService(config.geminiApiKey);
const translationService = new GeminiTranslationService(config.geminiApiKey);
const synthesizer = new ElevenLabsSynthesizer(config.elevenLabsApiKey);

const sttReady = sttService.initialize();
const translationReady = translationService.initialize();
const ttsReady = synthesizer.initialize();

console.log(
  `[Services] STT: ${sttReady ? '✓' : '✗'}, Translation: ${translationReady ? '✓' : '✗'}, TTS: ${ttsReady ? '✓' : '✗'}`
);
if (!sttReady) {
  console.log('[Services] Without GEMINI_API_KEY clients must send stt:interim/stt:final transcripts');
}
if (!ttsReady) {
  console.log('[Services] Set ELEVENLABS_API_KEY to enable voice synthesis');
}

// Server-side recognition when Gemini is available; otherwise transcripts arrive over the socket
const recognizerFactory: RecognizerFactory = sttReady
  ? (participantId, language) => sttService.createRecognizer(participantId, language)
  : (participantId, language) => new PushRecognizer(participantId, language);

const clients = new ClientDirectory();
const registry = new SessionRegistry(
  (sessionId) =>
    new SessionCoordinator({
      sessionId,
      translator: translationService,
      controlSink: clients.controlSink(sessionId),
      buffer: {
        maxDelayMs: config.buffer.maxDelayMs,
        highConfidenceThreshold: config.buffer.confidenceThreshold,
        cleanupDelayMs: config.buffer.cleanupDelayMs,
      },
      translationTimeoutMs: config.translationTimeoutMs,
      maxParticipants: config.maxParticipants,
    })
);

const app = express();
app.use(cors());
app.use(express.json());

setupRoutes(app, registry, () => ({
  stt: sttService.isReady(),
  translation: translationService.isReady(),
  tts: synthesizer.isReady(),
}));

const server = createServer(app);
const bridge = setupWebSocketServer(server, {
  clients,
  registry,
  recognizerFactory,
  synthesizer,
  transcripts: config.transcripts,
});

server.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`WebSocket available at ws://localhost:${config.port}/ws`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[Server] ${signal} received, shutting down`);

  await bridge.close();
  await registry.closeAll();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  console.log('[Server] Shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Server] Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
  });
}
