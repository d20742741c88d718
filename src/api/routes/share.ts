import { Router, Request, Response, NextFunction } from 'express';
import { saveTestCaseDocument } from '../../storage/test-case-store';
import { validateShareRequest } from '../middleware/request-validator';

export function createShareRoute(): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateShareRequest(req.body);

      const document = await saveTestCaseDocument({
        source_type: body.source_type,
        item_ids: body.item_ids,
        test_types: body.test_types,
        raw_text: body.raw_text,
        test_data: body.test_cases,
        status: body.status_values,
      });

      res.status(201).json({
        url_key: document.url_key,
        test_case_count: document.test_data.length,
        created_at: document.created_at,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
