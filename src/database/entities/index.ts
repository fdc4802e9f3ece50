/**
 * Database entities: pipelines, pipeline_runs, job_runs, job_logs, cache_entries.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { JobRun } from './job-run.entity';
export { JobLog } from './job-log.entity';
export { CacheEntry } from './cache-entry.entity';
