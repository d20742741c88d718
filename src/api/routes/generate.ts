import { Router, Request, Response, NextFunction } from 'express';
import { GenerationRequest } from '../../models/generation-request';
import { Job } from '../../models/job';
import { OrchestratorDeps, runGeneration } from '../../pipeline/generation-orchestrator';
import { saveJob, updateJob } from '../../storage/job-store';
import { generateJobId } from '../../utils/uuid-generator';
import { GenerationError, errorMessage } from '../../utils/errors';
import { validateGenerateRequest } from '../middleware/request-validator';
import logger from '../../utils/logger';

export function createGenerateRoute(deps: OrchestratorDeps): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = validateGenerateRequest(req.body);

      const job: Job = {
        job_id: generateJobId(),
        status: 'processing',
        // Uploaded images stay out of the job file
        request: { ...request, image_data: undefined },
        created_at: new Date().toISOString(),
      };

      await saveJob(job);

      res.status(202).json({
        job_id: job.job_id,
        status: 'processing',
        message: 'Test case generation started',
        created_at: job.created_at,
      });

      processJobAsync(job.job_id, request, deps).catch(error => {
        logger.error('Failed to record job outcome', { job_id: job.job_id, error: errorMessage(error) });
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}

async function processJobAsync(jobId: string, request: GenerationRequest, deps: OrchestratorDeps): Promise<void> {
  try {
    logger.info('Starting async job processing', { job_id: jobId, source_type: request.source_type });

    const result = await runGeneration(request, deps, jobId);

    await updateJob(jobId, {
      status: 'completed',
      completed_at: new Date().toISOString(),
      result: {
        url_key: result.document.url_key,
        test_case_count: result.document.test_data.length,
        generated_types: result.generated_types,
        failed_types: result.failed_types,
      },
    });

    logger.info('Job completed successfully', { job_id: jobId, url_key: result.document.url_key });
  } catch (error) {
    logger.error('Job failed', { job_id: jobId, error: errorMessage(error) });

    await updateJob(jobId, {
      status: 'failed',
      completed_at: new Date().toISOString(),
      error: errorMessage(error),
      ...(error instanceof GenerationError && {
        result: {
          url_key: '',
          test_case_count: 0,
          generated_types: [],
          failed_types: error.failedTypes,
        },
      }),
    });
  }
}
