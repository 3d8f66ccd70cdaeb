import { Router } from 'express';
import { z } from 'zod';
import type { Assistant } from '../services/assistant.js';

const AskRequestSchema = z.object({
  question: z.string().min(1).max(500)
});

export function createAskRouter(assistant: Assistant): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const parsed = AskRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', details: parsed.error.flatten() });
    }
    try {
      const answer = await assistant.answer(parsed.data.question);
      res.json(answer);
    } catch (err) {
      console.error(err);
      res.status(500).json({ error: 'Failed to answer question' });
    }
  });

  return router;
}
