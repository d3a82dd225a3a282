/**
 * Job store module
 *
 * @module job-store
 */

export { JobStore, IN_MEMORY } from './service.js';
export { exportJobArtifacts, writeFileAtomic, EXPORT_FILES, type ExportResult } from './export.js';
export {
  JobStoreError,
  JobStoreErrorCode,
  type CreateJobInput,
  type JobSummary,
  type ListJobsOptions,
} from './types.js';
