import express from 'express';
import type { Express } from 'express';
import type { WebhookReceiver } from './webhook-receiver';

export interface WebhookAppOptions {
  path: string;

  /** Largest accepted request body, in express size notation */
  bodyLimit?: string;
}

export function createWebhookApp(
  receiver: WebhookReceiver,
  options: WebhookAppOptions,
): Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', busy: receiver.busy });
  });

  // the signature covers the exact bytes, so the body stays raw
  app.post(
    options.path,
    express.raw({ type: () => true, limit: options.bodyLimit ?? '1mb' }),
    (req, res) => {
      const rawBody: Buffer = Buffer.isBuffer(req.body)
        ? req.body
        : Buffer.alloc(0);
      const result = receiver.handle({ headers: req.headers, rawBody });

      res.status(result.status).json(result.body);
    },
  );

  return app;
}
