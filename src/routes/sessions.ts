import { Router } from 'express';
import type { SessionRegistry } from '../calls/sessionRegistry';

/** Read-only view of the bridges currently held by the registry. */
export function createSessionsRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ sessions: registry.list() });
  });

  router.get('/:streamSid', (req, res) => {
    const session = registry.get(req.params.streamSid);
    if (!session) {
      res.status(404).json({ error: 'session_not_found' });
      return;
    }
    res.status(200).json(session.describe());
  });

  return router;
}
