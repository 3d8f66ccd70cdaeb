import { Router } from 'express';
import { z } from 'zod';
import type { Assistant } from '../services/assistant.js';
import type { Answer } from '../types.js';

// Dialogflow ES sends queryResult.queryText, Dialogflow CX sends text,
// a hand-rolled chat client sends question or message.
const WebhookRequestSchema = z
  .object({
    queryResult: z.object({ queryText: z.string().optional() }).passthrough().optional(),
    text: z.string().optional(),
    question: z.string().optional(),
    message: z.string().optional()
  })
  .passthrough();

type WebhookRequest = z.infer<typeof WebhookRequestSchema>;

type Dialect = 'dialogflow-es' | 'dialogflow-cx' | 'plain';

function extractQuestion(body: WebhookRequest): { question: string; dialect: Dialect } | undefined {
  const candidates: [string | undefined, Dialect][] = [
    [body.queryResult?.queryText, 'dialogflow-es'],
    [body.text, 'dialogflow-cx'],
    [body.question, 'plain'],
    [body.message, 'plain']
  ];
  for (const [value, dialect] of candidates) {
    if (value && value.trim()) return { question: value, dialect };
  }
  return undefined;
}

function shapeReply(dialect: Dialect, reply: string, source?: string) {
  switch (dialect) {
    case 'dialogflow-es':
      return { fulfillmentText: reply, fulfillmentMessages: [{ text: { text: [reply] } }] };
    case 'dialogflow-cx':
      return { fulfillment_response: { messages: [{ text: { text: [reply] } }] } };
    default:
      return { reply, source };
  }
}

export function createWebhookRouter(assistant: Assistant): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ status: 'Webhook ready' });
  });

  router.post('/', async (req, res) => {
    const parsed = WebhookRequestSchema.safeParse(req.body ?? {});
    const extracted = parsed.success ? extractQuestion(parsed.data) : undefined;
    if (!extracted) {
      return res.status(400).json({ error: 'Invalid request' });
    }
    console.log(`webhook question (${extracted.dialect}): ${extracted.question}`);
    let answer: Answer;
    try {
      answer = await assistant.answer(extracted.question);
    } catch (err) {
      // the platform shows whatever text comes back, even for errors
      console.error(err);
      answer = assistant.fallback();
    }
    res.json(shapeReply(extracted.dialect, answer.reply, answer.source));
  });

  return router;
}
