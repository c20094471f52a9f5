import { Router, type Request, type Response } from 'express';
import { toSafetyConfigFile } from '@hearthwatch/engine';
import type { SafetyChecker } from '@hearthwatch/engine';
import { requireAdmin } from '../middleware/auth.js';

export function createConfigRouter(checker: SafetyChecker): Router {
  const configRouter = Router();

  // GET /api/config: read-only; thresholds are fixed for the life of the process
  configRouter.get('/api/config', (_req: Request, res: Response) => {
    res.json(toSafetyConfigFile(checker.getConfig()));
  });

  // POST /api/cooldowns/reset: admin auth, forget every last-emission time
  configRouter.post('/api/cooldowns/reset', requireAdmin, (_req: Request, res: Response) => {
    checker.resetCooldowns();
    console.log('[config] cooldown state cleared');
    res.json({ reset: true });
  });

  return configRouter;
}
