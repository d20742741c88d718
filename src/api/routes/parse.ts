import { Router, Request, Response, NextFunction } from 'express';
import { parseTestCases } from '../../pipeline/test-case-parser';
import { validateParseRequest } from '../middleware/request-validator';
import logger from '../../utils/logger';

export function createParseRoute(): Router {
  const router = Router();

  // Callers fall back to showing the raw text when nothing parses
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = validateParseRequest(req.body);
      const result = parseTestCases(body.text, { defaultSection: body.default_section });

      logger.debug('Parse request handled', {
        test_case_count: result.test_cases.length,
        sections: result.sections,
      });

      if (result.test_cases.length === 0) {
        res.json({ parsed: false, test_cases: [], sections: result.sections, raw_text: body.text });
        return;
      }

      res.json({ parsed: true, test_cases: result.test_cases, sections: result.sections });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
