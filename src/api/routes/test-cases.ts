import { Router, Request, Response, NextFunction } from 'express';
import { listRecentDocuments } from '../../storage/test-case-store';
import { ApiError } from '../middleware/error-handler';

const MAX_LIMIT = 100;

export function createTestCasesRoute(): Router {
  const router = Router();

  router.get('/recent', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const rawLimit = typeof req.query.limit === 'string' ? req.query.limit : '20';
      const limit = parseInt(rawLimit, 10);

      if (Number.isNaN(limit) || limit < 1) {
        throw new ApiError('Limit must be a positive integer', 400);
      }
      if (limit > MAX_LIMIT) {
        throw new ApiError(`Limit cannot exceed ${MAX_LIMIT}`, 400);
      }

      const documents = await listRecentDocuments(limit);
      res.json({ total: documents.length, documents });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
