import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { validateQuery } from '../middleware/validateRequest.js';
import { ActivityRegistry } from '../services/activities.js';

const participantQuerySchema = z.object({
  email: z.string({ required_error: 'Field required' }).min(1, 'Email must not be empty')
});

export function createActivitiesRouter(registry: ActivityRegistry): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    res.json(registry.list());
  });

  router.get('/:activityName', (req: Request, res: Response) => {
    res.json(registry.get(req.params.activityName));
  });

  // Express decodes path params, so "Chess%20Club" arrives as "Chess Club"
  router.post('/:activityName/signup', (req: Request, res: Response) => {
    const { email } = validateQuery(participantQuerySchema, req);
    res.json(registry.signup(req.params.activityName, email));
  });

  router.post('/:activityName/unregister', (req: Request, res: Response) => {
    const { email } = validateQuery(participantQuerySchema, req);
    res.json(registry.unregister(req.params.activityName, email));
  });

  return router;
}

export default createActivitiesRouter;
