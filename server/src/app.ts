import express from 'express';
import cors from 'cors';
import type { Assistant } from './services/assistant.js';
import { createWebhookRouter } from './routes/webhook.js';
import { createAskRouter } from './routes/ask.js';

export function createApp(assistant: Assistant): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.type('text/plain').send('Server is running');
  });

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/webhook', createWebhookRouter(assistant));
  app.use('/api/ask', createAskRouter(assistant));

  return app;
}
