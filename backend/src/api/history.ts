/**
 * API endpoints for a user's saved conversations
 */

import { Router } from 'express';
import { HistoryStore } from '../utils/conversation-store';
import { HttpError } from './middleware';

function userKeyFrom(query: unknown): string {
  const key = typeof query === 'string' ? query.trim().toLowerCase() : '';
  if (!key) {
    throw new HttpError(400, 'user_email is required');
  }
  return key;
}

export function createHistoryRouter(history: HistoryStore): Router {
  const router = Router();

  /**
   * GET /api/history?user_email=
   * All conversations of a user, oldest first
   */
  router.get('/', async (req, res, next) => {
    try {
      const userKey = userKeyFrom(req.query.user_email ?? req.query.email);
      const conversations = await history.fetch(userKey);
      res.json({ conversations });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/history/:conversationName?user_email=
   */
  router.get('/:conversationName', async (req, res, next) => {
    try {
      const userKey = userKeyFrom(req.query.user_email ?? req.query.email);
      const conversation = await history.getConversation(userKey, req.params.conversationName);
      if (!conversation) {
        throw new HttpError(404, 'Conversation not found');
      }
      res.json(conversation);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
