import { Router, Request, Response, NextFunction } from 'express';
import { getTestCaseDocument } from '../../storage/test-case-store';
import { generateExcelReport } from '../../export/excel-generator';
import { formatTestCasesAsText } from '../../export/text-formatter';
import { parseStatusOverrides } from '../middleware/request-validator';
import { ApiError } from '../middleware/error-handler';
import logger from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export function createExportRoute(): Router {
  const router = Router();

  router.get('/:urlKey/excel', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { urlKey } = req.params;

    try {
      const statusOverrides = parseStatusOverrides(req.query.status);
      const document = await getTestCaseDocument(urlKey);

      if (!document) {
        throw new ApiError(`Test cases not found: ${urlKey}`, 404);
      }

      logger.info('Excel export requested', {
        url_key: urlKey,
        test_case_count: document.test_data.length,
        status_overrides: Object.keys(statusOverrides).length,
      });

      const workbook = await generateExcelReport(document, statusOverrides);

      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename="test-cases-${urlKey}.xlsx"`);

      await workbook.xlsx.write(res);
      res.end();
    } catch (error) {
      if (res.headersSent) {
        // Part of the workbook is already on the wire; the status line cannot change
        logger.error('Excel export failed while streaming', { url_key: urlKey, error: errorMessage(error) });
        res.destroy();
        return;
      }
      next(error);
    }
  });

  router.get('/:urlKey/txt', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { urlKey } = req.params;

    try {
      const document = await getTestCaseDocument(urlKey);

      if (!document) {
        throw new ApiError(`Test cases not found: ${urlKey}`, 404);
      }

      const text = document.test_data.length > 0
        ? formatTestCasesAsText(document.test_data, document.status)
        : document.raw_text;

      logger.info('Text export requested', { url_key: urlKey, test_case_count: document.test_data.length });

      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="test-cases-${urlKey}.txt"`);
      res.send(text);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
