import { Router } from 'express';
import type { ChatInput } from '../types.js';
import { processChatRequest, type ChatDeps } from '../ai/orchestrator.js';
import { ChatHttpError, errorMessage } from '../helpers/errors.js';
import { createLogger } from '../helpers/logger.js';

const log = createLogger('CHAT');

function readText(body: ChatInput): string {
  const text = body.text;
  if (typeof text !== 'string' || !text.trim()) {
    throw new ChatHttpError(400, 'text is required');
  }
  return text;
}

export function createChatRouter(deps: ChatDeps): Router {
  const router = Router();

  router.post('/chat', async (req, res) => {
    try {
      const body: ChatInput = typeof req.body === 'object' && req.body !== null ? req.body : {};
      const result = await processChatRequest(readText(body), deps);
      return res.json({ response: result.response, backend: result.backend });
    } catch (err) {
      if (err instanceof ChatHttpError) {
        return res.status(err.status).json({ error: 'bad_request', message: err.message });
      }
      log.error('chat endpoint failed:', err);
      return res.status(500).json({ error: 'chat_failed', message: errorMessage(err) });
    }
  });

  return router;
}
