import { assertNever } from "./assert-never";
import { JobServices } from "./job-services";
import { Job, JobOutcome } from "./jobs/job";
import { executeDnaAlignJob } from "./jobs/dna-align-job";
import { executeRnaAlignJob } from "./jobs/rna-align-job";
import { executeDedupJob, executeFlagstatJob, executeUmiDedupJob } from "./jobs/bam-jobs";

export type JobReport =
  | { job: Job; outcome: JobOutcome }
  | { job: Job; outcome: "FAILED"; error: unknown };

export function executeJob(job: Job, services: JobServices): Promise<JobOutcome> {
  switch (job.kind) {
    case "dna-align":
      return executeDnaAlignJob(job, services);
    case "rna-align":
      return executeRnaAlignJob(job, services);
    case "umi-dedup":
      return executeUmiDedupJob(job, services);
    case "dedup":
      return executeDedupJob(job, services);
    case "flagstat":
      return executeFlagstatJob(job, services);
    default:
      return assertNever(job);
  }
}

/**
 * Run the jobs one after the other in the order given. A failing job is
 * reported and then we move on to the next one - nothing is retried.
 *
 * @param jobs
 * @param services
 */
export async function runJobs(jobs: Job[], services: JobServices): Promise<JobReport[]> {
  const reports: JobReport[] = [];

  for (const [i, job] of jobs.entries()) {
    console.log(`Job ${i + 1} of ${jobs.length} (${job.kind})`);

    try {
      reports.push({ job, outcome: await executeJob(job, services) });
    } catch (e) {
      console.error(`Job ${i + 1} of ${jobs.length} (${job.kind}) failed`);
      console.error(e);

      reports.push({ job, outcome: "FAILED", error: e });
    }
  }

  return reports;
}
