/**
 * Express app factory. Storage is injected so tests get a fresh registry per app.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import type { ActivityStorage } from './storage/MemoryStorage';
import { createActivitiesRouter } from './routes/activities';
import { resolveStaticDir } from './config';
import { logError } from './utils/log';

export interface ServerDeps {
  storage: ActivityStorage;
  /** Directory served under /static. Defaults to ./static under the working directory. */
  staticDir?: string;
}

export const LANDING_PAGE_PATH = '/static/index.html';

/** 4xx status carried by an error (e.g. a malformed path segment), or null. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status <= 499) return status;
  return null;
}

export function createServer(deps: ServerDeps): Express {
  const app = express();
  const staticDir = deps.staticDir ?? resolveStaticDir(undefined);

  app.use('/static', express.static(staticDir));

  app.get('/', (_req: Request, res: Response) => {
    res.redirect(307, LANDING_PAGE_PATH);
  });

  app.use('/activities', createActivitiesRouter({ storage: deps.storage }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ code: 'not_found', detail: 'Not Found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ code: 'invalid', detail: 'Bad Request' });
      return;
    }
    logError('[server] unhandled error', req.method, req.originalUrl, err);
    res.status(500).json({ code: 'internal', detail: 'Internal Server Error' });
  });

  return app;
}
