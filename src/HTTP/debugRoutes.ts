import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { joinTopic } from '@mqtt/topics';
import { getConnectionManager } from '@mqtt/mqtt';
import { ConnectionError, errorMessage, TimeoutError } from '@utils/errors';
import { logWarn } from '@utils/logger';
import { eventDataSchema } from '@utils/options.schema';
import type { Application } from '../Service/Application';

const publishSchema = z.object({
  exchange: z.string().default(''),
  routing: z.string().min(1),
  message: eventDataSchema,
});

const subscribeSchema = z.object({
  exchange: z.string().default(''),
  routing: z.string().min(1),
});

const badRequest = (res: Response, error: z.ZodError) =>
  res.status(400).json({
    error: 'Invalid request body',
    issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });

/** Debugging and diagnostics endpoints for the message broker connection. */
export const debugRoutes = (app: Application): Router => {
  const router = Router();
  const manager = getConnectionManager(app);

  router.post('/_debug/publish', async (req: Request, res: Response) => {
    const parsed = publishSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    const { exchange, routing, message } = parsed.data;
    const topic = joinTopic(exchange, routing, manager.syntax);
    try {
      await manager.publish(topic, message);
      return res.status(200).json({ topic });
    } catch (error) {
      logWarn(`[HTTP] Debug publish to ${topic} failed: ${errorMessage(error)}`);
      const status = error instanceof ConnectionError || error instanceof TimeoutError ? 503 : 500;
      return res.status(status).json({ error: errorMessage(error) });
    }
  });

  // Messages received for this subscription are logged and then discarded, unless something listens
  router.post('/_debug/subscribe', (req: Request, res: Response) => {
    const parsed = subscribeSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error);

    const { exchange, routing } = parsed.data;
    const subscription = manager.subscribe(exchange, routing);
    return res.status(200).json(subscription);
  });

  return router;
};
