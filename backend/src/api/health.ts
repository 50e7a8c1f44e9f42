import { Request, Response, RequestHandler } from 'express';
import { HistoryStore } from '../utils/conversation-store';

export function createHealthCheck(history: HistoryStore): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'healthy',
      historyBackend: history.backendKind,
      timestamp: new Date().toISOString(),
    });
  };
}
