import path from 'path';
import { Job } from '../models/job';
import { collectionDir, readJSONIfExists, serializeUpdate, writeJSON } from './json-storage';
import { isValidJobId } from '../utils/uuid-generator';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

const COLLECTION = 'jobs';

function jobPath(jobId: string): string {
  return path.join(collectionDir(COLLECTION), `${jobId}.json`);
}

export async function saveJob(job: Job): Promise<void> {
  await writeJSON(jobPath(job.job_id), job);
  logger.debug('Job saved', { job_id: job.job_id, status: job.status });
}

export async function getJob(jobId: string): Promise<Job | null> {
  if (!isValidJobId(jobId)) {
    return null;
  }

  try {
    return await readJSONIfExists<Job>(jobPath(jobId));
  } catch (error) {
    logger.error('Failed to read job', { job_id: jobId, error: errorMessage(error) });
    return null;
  }
}

export async function updateJob(jobId: string, updates: Partial<Omit<Job, 'job_id'>>): Promise<Job> {
  return serializeUpdate(jobPath(jobId), async () => {
    const job = await getJob(jobId);

    if (!job) {
      throw new Error(`Job not found: ${jobId}`);
    }

    const updatedJob: Job = { ...job, ...updates };
    await saveJob(updatedJob);
    return updatedJob;
  });
}
