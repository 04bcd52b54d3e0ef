import { Router } from 'express';

export interface HealthDeps {
  backend: string;
  completionReady: () => boolean;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      backend: deps.backend,
      completion: deps.completionReady() ? 'configured' : 'unconfigured',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
