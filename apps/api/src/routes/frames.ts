import { Router, type Request, type Response } from 'express';
import { toAlertJson } from '@hearthwatch/shared';
import type { EvaluateFrameResponse, InvalidFrameResponse } from '@hearthwatch/shared';
import type { FrameProcessor } from '../services/frameProcessor.js';

export function createFramesRouter(processor: FrameProcessor): Router {
  const framesRouter = Router();

  // POST /api/frames: evaluate one detection/classification pair
  framesRouter.post('/api/frames', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null) {
        const response: InvalidFrameResponse = {
          error: 'Request body must be { detections, classifications }',
          issues: [],
        };
        res.status(400).json(response);
        return;
      }

      const result = await processor.process(
        Reflect.get(body, 'detections'),
        Reflect.get(body, 'classifications'),
      );

      if (!result.ok) {
        const response: InvalidFrameResponse = {
          error: 'Invalid frame input',
          issues: result.error.issues,
        };
        res.status(400).json(response);
        return;
      }

      const response: EvaluateFrameResponse = {
        frameNumber: result.frameNumber,
        alerts: result.alerts.map(toAlertJson),
        status: result.status,
      };
      res.json(response);
    } catch (err) {
      console.error('[frames] evaluate error:', err);
      res.status(500).json({ error: 'Failed to evaluate frame' });
    }
  });

  // GET /api/status: status of the last evaluated frame
  framesRouter.get('/api/status', (_req: Request, res: Response) => {
    res.json({
      ...processor.getLastStatus(),
      framesProcessed: processor.getFramesProcessed(),
    });
  });

  return framesRouter;
}
