import { Router, Request, Response, NextFunction } from 'express';
import type { ActivityRegistry } from '../services/registry.js';
import type { ActivityCatalog, ActivityView, MessageResponse } from '../types/activity.js';
import {
  activityParamsSchema,
  participantQuerySchema,
  validateRequest
} from '../middleware/validateRequest.js';
import { logger } from '../utils/logger.js';

export function createActivitiesRouter(registry: ActivityRegistry): Router {
  const router = Router();

  // Get all activities
  router.get('/', (_req: Request, res: Response<ActivityCatalog>) => {
    const catalog = registry.list();
    logger.debug('Listing activities', { count: Object.keys(catalog).length });
    res.json(catalog);
  });

  // Get a single activity
  router.get('/:activityName', (req: Request, res: Response<ActivityView>, next: NextFunction) => {
    try {
      const { activityName } = validateRequest(activityParamsSchema, req.params, 'path');
      res.json(registry.get(activityName));
    } catch (error) {
      next(error);
    }
  });

  // Sign up a student for an activity
  router.post('/:activityName/signup', async (req: Request, res: Response<MessageResponse>, next: NextFunction) => {
    try {
      const { activityName } = validateRequest(activityParamsSchema, req.params, 'path');
      const { email } = validateRequest(participantQuerySchema, req.query, 'query');

      const message = await registry.signup(activityName, email);
      res.json({ message });
    } catch (error) {
      next(error);
    }
  });

  // Unregister a student from an activity
  router.delete('/:activityName/unregister', async (req: Request, res: Response<MessageResponse>, next: NextFunction) => {
    try {
      const { activityName } = validateRequest(activityParamsSchema, req.params, 'path');
      const { email } = validateRequest(participantQuerySchema, req.query, 'query');

      const message = await registry.unregister(activityName, email);
      res.json({ message });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
