import express, { type Express } from 'express';
import cors from 'cors';
import type { SafetyChecker } from '@hearthwatch/engine';
import { APP_VERSION } from '@hearthwatch/shared';
import type { HealthResponse } from '@hearthwatch/shared';
import { handleBodyErrors } from './middleware/bodyErrors.js';
import { createFramesRouter } from './routes/frames.js';
import { createAlertsRouter } from './routes/alerts.js';
import { createConfigRouter } from './routes/config.js';
import type { FrameProcessor } from './services/frameProcessor.js';
import type { DailyAlertLog } from './services/alertLog.js';

export interface AppDeps {
  checker: SafetyChecker;
  processor: FrameProcessor;
  alertLog: DailyAlertLog;
}

export function createApp({ checker, processor, alertLog }: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      service: 'hearthwatch-api',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    };
    res.json(response);
  });

  app.use(createFramesRouter(processor));
  app.use(createAlertsRouter(processor, alertLog));
  app.use(createConfigRouter(checker));
  app.use(handleBodyErrors);

  return app;
}
