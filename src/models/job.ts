import { GenerationRequest } from './generation-request';

export type JobStatus = 'processing' | 'completed' | 'failed';

export interface Job {
  job_id: string;
  status: JobStatus;
  request: GenerationRequest;
  created_at: string;
  completed_at?: string;
  result?: JobResult;
  error?: string;
}

export interface JobResult {
  url_key: string;
  test_case_count: number;
  generated_types: string[];
  failed_types: string[];
}
