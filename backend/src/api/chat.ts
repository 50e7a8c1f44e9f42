import { Request, Response, NextFunction, RequestHandler } from 'express';
import { NewsAssistant } from '../agents/assistant';
import { ChatRequestSchema } from '../schemas';
import { validateUserMessage, sanitizeForLog } from '../utils/sanitize';
import { debugLogger } from '../utils/debug-logger';

/**
 * POST /chat
 * Body: { message, user_email? | email?, conversation_name? | conversation?, prefer_recent? }
 */
export function createChatHandler(assistant: NewsAssistant): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const body = ChatRequestSchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ error: 'Invalid request body' });
      return;
    }

    const validation = validateUserMessage(body.data.message);
    if (!validation.valid) {
      debugLogger.warn('CHAT_REQUEST', 'Rejected message', { error: validation.error });
      res.status(400).json({ error: validation.error });
      return;
    }

    const userEmail = body.data.user_email ?? body.data.email;
    const conversationName = body.data.conversation_name ?? body.data.conversation;

    debugLogger.info('CHAT_REQUEST', 'Chat request received', {
      message: sanitizeForLog(validation.sanitized),
      hasEmail: Boolean(userEmail),
      conversationName,
    });

    try {
      const result = await assistant({
        message: validation.sanitized,
        userEmail,
        conversationName,
        preferRecent: body.data.prefer_recent,
      });
      res.json(result);
    } catch (error) {
      next(error);
    }
  };
}
