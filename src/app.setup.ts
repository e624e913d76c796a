import { INestApplication } from '@nestjs/common';
import { json, raw } from 'express';

export interface AppSetupOptions {
  /** Maximum request body size, in body-parser notation (e.g. `25mb`). */
  bodyLimit: string;
}

/**
 * Body parsing for an app created with `bodyParser: false`. Webhook bodies
 * stay raw Buffers whatever their content type; signatures are computed over
 * those exact bytes. Everything else is parsed as JSON.
 */
export function configureApp(app: INestApplication, { bodyLimit }: AppSetupOptions): void {
  app.use('/webhooks', raw({ type: () => true, limit: bodyLimit }));
  app.use(json({ limit: bodyLimit }));
}
