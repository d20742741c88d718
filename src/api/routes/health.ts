import { Router, Request, Response } from 'express';
import { TestTypesConfig } from '../../models/config';

const startTime = Date.now();

export function createHealthRoute(testTypes: TestTypesConfig): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: process.env.npm_package_version || '1.0.0',
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      test_types: Object.keys(testTypes),
    });
  });

  return router;
}
