import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { getJob, saveJob, updateJob } from '../../src/storage/job-store';
import { generateJobId } from '../../src/utils/uuid-generator';
import { Job } from '../../src/models/job';

let dataDir: string;

beforeEach(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'job-store-'));
  process.env.DATA_DIR = dataDir;
});

afterEach(async () => {
  delete process.env.DATA_DIR;
  await fs.rm(dataDir, { recursive: true, force: true });
});

describe('job store', () => {
  it('saves, reads and updates a job', async () => {
    const job: Job = {
      job_id: generateJobId(),
      status: 'processing',
      request: { source_type: 'text', test_case_types: ['dashboard_ui'], text: 'Login page' },
      created_at: new Date().toISOString(),
    };

    await saveJob(job);
    expect(await getJob(job.job_id)).toEqual(job);

    const updated = await updateJob(job.job_id, { status: 'failed', error: 'No provider' });

    expect(updated).toEqual({ ...job, status: 'failed', error: 'No provider' });
    expect(await getJob(job.job_id)).toEqual(updated);
  });

  it('returns null for ids that are not job ids', async () => {
    expect(await getJob('not-a-job')).toBeNull();
  });

  it('refuses to update a missing job', async () => {
    await expect(updateJob(generateJobId(), { status: 'completed' })).rejects.toThrow('Job not found');
  });
});
