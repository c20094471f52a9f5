import type { ErrorRequestHandler } from 'express';
import type { InvalidFrameResponse } from '@hearthwatch/shared';

function bodyErrorType(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const type: unknown = Reflect.get(err, 'type');
  return typeof type === 'string' ? type : undefined;
}

/** Answers body-parser failures as JSON instead of Express's HTML error page. */
export const handleBodyErrors: ErrorRequestHandler = (err, _req, res, next) => {
  const type = bodyErrorType(err);

  if (type === 'entity.parse.failed') {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[frames] unparsable request body: ${message}`);
    const response: InvalidFrameResponse = { error: 'Request body is not valid JSON', issues: [message] };
    res.status(400).json(response);
    return;
  }

  if (type === 'entity.too.large') {
    console.warn('[frames] request body too large');
    res.status(413).json({ error: 'Request body is too large' });
    return;
  }

  next(err);
};
