import { Router, Request, Response, NextFunction } from 'express';
import { updateTestCaseStatus } from '../../storage/test-case-store';
import { validateUpdateStatusRequest } from '../middleware/request-validator';
import { ApiError } from '../middleware/error-handler';

export function createUpdateStatusRoute(): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { key, test_case_id, status } = validateUpdateStatusRequest(req.body);

      const document = await updateTestCaseStatus(key, test_case_id, status);
      if (!document) {
        throw new ApiError(`Test cases not found: ${key}`, 404);
      }

      res.json({
        success: true,
        key,
        test_case_id,
        status,
        status_updated_at: document.status_updated_at,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
