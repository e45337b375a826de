import { Router } from 'express';
import type { SessionRegistry } from '../calls/sessionRegistry';

export function createHealthRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ ok: true, sessions: registry.size });
  });

  return router;
}
