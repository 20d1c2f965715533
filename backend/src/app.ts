import express from 'express';
import cors from 'cors';
import { createConversationsRouter } from './routes (APIs)/conversations';
import type { ConversationEngine } from './services/conversationEngine';

export function createApp(engine: ConversationEngine) {
  const app = express();

  // Middlewares
  app.use(cors());
  app.use(express.json());

  // Routes
  app.use('/api', createConversationsRouter(engine));

  // Healthcheck
  app.get('/health', (_req, res) => res.json({ ok: true }));

  return app;
}
