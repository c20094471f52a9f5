import { Router, type Request, type Response } from 'express';
import { toAlertJson } from '@hearthwatch/shared';
import type { AlertListResponse } from '@hearthwatch/shared';
import type { FrameProcessor } from '../services/frameProcessor.js';
import type { DailyAlertLog } from '../services/alertLog.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

function parseLimit(value: unknown): number {
  if (typeof value !== 'string' || value === '') return DEFAULT_LIMIT;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) return DEFAULT_LIMIT;
  return Math.min(Math.max(parsed, 0), MAX_LIMIT);
}

function parseDay(value: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  return date.getMonth() === Number(m) - 1 ? date : null;
}

export function createAlertsRouter(processor: FrameProcessor, alertLog: DailyAlertLog): Router {
  const alertsRouter = Router();

  // GET /api/alerts: recent emitted alerts from memory, oldest first
  alertsRouter.get('/api/alerts', (req: Request, res: Response) => {
    const alerts = processor.getRecentAlerts(parseLimit(req.query.limit)).map(toAlertJson);
    const response: AlertListResponse = { alerts, total: alerts.length };
    res.json(response);
  });

  // GET /api/alerts/summary?date=YYYYMMDD: counts from the daily log
  alertsRouter.get('/api/alerts/summary', async (req: Request, res: Response) => {
    try {
      const { date } = req.query;
      let day = new Date();
      if (typeof date === 'string' && date !== '') {
        const parsed = parseDay(date);
        if (!parsed) {
          res.status(400).json({ error: 'date must be YYYYMMDD' });
          return;
        }
        day = parsed;
      }

      res.json(await alertLog.getSummary(day));
    } catch (err) {
      console.error('[alerts] summary error:', err);
      res.status(500).json({ error: 'Failed to read alert log' });
    }
  });

  return alertsRouter;
}
