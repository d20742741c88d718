import { Router, Request, Response, NextFunction } from 'express';
import { getTestCaseDocument, replaceStatusValues } from '../../storage/test-case-store';
import { validateStatusValuesRequest } from '../middleware/request-validator';
import { ApiError } from '../middleware/error-handler';

export function createResultsRoute(): Router {
  const router = Router();

  router.get('/:urlKey/test-cases', async (req: Request, res: Response, next: NextFunction) => {
    const { urlKey } = req.params;

    try {
      const document = await getTestCaseDocument(urlKey);

      if (!document) {
        throw new ApiError(`Test cases not found: ${urlKey}`, 404);
      }

      res.json({
        url_key: document.url_key,
        source_type: document.source_type,
        item_ids: document.item_ids,
        test_types: document.test_types,
        created_at: document.created_at,
        test_cases: document.test_data,
        status_values: document.status,
        ...(document.test_data.length === 0 && { raw_text: document.raw_text }),
      });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:urlKey/status-values', async (req: Request, res: Response, next: NextFunction) => {
    const { urlKey } = req.params;

    try {
      const { status_values } = validateStatusValuesRequest(req.body);
      const document = await replaceStatusValues(urlKey, status_values);

      if (!document) {
        throw new ApiError(`Test cases not found: ${urlKey}`, 404);
      }

      res.json({
        success: true,
        url_key: urlKey,
        status_values: document.status,
        status_updated_at: document.status_updated_at,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
