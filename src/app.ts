import express, { type NextFunction, type Request, type Response } from 'express';
import { fileURLToPath } from 'url';
import { createRouter, type RouteDeps } from './routes';
import { ApiError, errorMessage } from './errors';

const STATIC_DIR = fileURLToPath(new URL('../static', import.meta.url));

function hasStatus(err: unknown): err is { status: number } {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

export function createApp(deps: RouteDeps) {
  const app = express();
  app.use(express.json());
  app.use('/api', createRouter(deps));

  // serve static UI
  app.use('/', express.static(STATIC_DIR));

  app.use((req: Request, res: Response) => {
    res.status(404).send({ error: 'not-found', message: `no route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof ApiError) {
      return res.status(err.status).send({ error: err.code, message: err.message });
    }
    // body-parser marks malformed JSON with a 4xx status
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      return res.status(err.status).send({ error: 'validation', message: errorMessage(err) });
    }
    console.error(`[API] ${req.method} ${req.path} failed:`, err);
    res.status(500).send({ error: 'internal', message: 'internal server error' });
  });

  return app;
}
