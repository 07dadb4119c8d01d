/**
 * Activities API (GET /activities, GET :activityName, POST :activityName/signup, DELETE :activityName/unregister)
 * Error bodies are { code, detail }; the status comes from the registry error code.
 */

import { Router, Request, Response } from 'express';
import type { RegistryErrorCode, RegistryResult } from '../types/activity';
import { ACTIVITY_NOT_FOUND, type ActivityStorage } from '../storage/MemoryStorage';
import { devLog } from '../utils/log';

export interface ActivitiesDeps {
  storage: ActivityStorage;
}

const STATUS_BY_CODE: Record<RegistryErrorCode, number> = {
  not_found: 404,
  invalid_operation: 400,
};

// Passed through as sent; a repeated parameter uses its last value.
function readQueryValue(value: unknown): string | undefined {
  const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
  return typeof last === 'string' ? last : undefined;
}

function requireEmail(req: Request, res: Response): string | null {
  const email = readQueryValue(req.query.email);
  if (email === undefined) {
    res.status(422).json({ code: 'invalid', detail: 'email query parameter is required' });
    return null;
  }
  return email;
}

function sendResult(res: Response, result: RegistryResult): boolean {
  if (!result.success) {
    res.status(STATUS_BY_CODE[result.error.code]).json({
      code: result.error.code,
      detail: result.error.message,
    });
    return false;
  }
  res.json({ message: result.message });
  return true;
}

export function createActivitiesRouter(deps: ActivitiesDeps): Router {
  const router = Router();
  const { storage } = deps;

  // GET /activities
  router.get('/', (_req: Request, res: Response) => {
    res.json(storage.listActivities());
  });

  // GET /activities/:activityName
  router.get('/:activityName', (req: Request, res: Response) => {
    const activity = storage.getActivity(req.params.activityName);
    if (!activity) {
      res.status(404).json({ code: 'not_found', detail: ACTIVITY_NOT_FOUND });
      return;
    }
    res.json(activity);
  });

  // POST /activities/:activityName/signup?email=
  router.post('/:activityName/signup', (req: Request, res: Response) => {
    const email = requireEmail(req, res);
    if (email === null) return;

    const { activityName } = req.params;
    if (sendResult(res, storage.signup(activityName, email))) {
      devLog('[activities] signup', { activityName, email });
    }
  });

  // DELETE /activities/:activityName/unregister?email=
  router.delete('/:activityName/unregister', (req: Request, res: Response) => {
    const email = requireEmail(req, res);
    if (email === null) return;

    const { activityName } = req.params;
    if (sendResult(res, storage.unregister(activityName, email))) {
      devLog('[activities] unregister', { activityName, email });
    }
  });

  return router;
}
