#!/usr/bin/env node

import { argv } from "process";
import { extractJobs } from "../lib/argument-parser";
import { getFromEnv } from "../lib/env";
import { InvalidArgumentsError } from "../lib/errors";
import { createJobServices } from "../lib/job-services";
import { runJobs } from "../lib/job-runner";
import { describeJob } from "../lib/jobs/job";

const DRY_RUN_FLAG = "--dry-run";

// argv[0] = nodejs
// argv[1] = run-analysis.js
// argv[2...] = [--dry-run] <job> <job options> [<job> <job options> ...]

async function main(args: string[]) {
  const dryRun = args[0] === DRY_RUN_FLAG;
  const jobArgs = dryRun ? args.slice(1) : args;

  const settings = getFromEnv();
  const jobs = extractJobs(jobArgs, settings);

  if (jobs.length === 0) {
    console.warn("No jobs given - nothing to do");
    return;
  }

  console.log(`Parsed ${jobs.length} job(s)`);
  for (const [i, job] of jobs.entries()) {
    console.log(`Job ${i + 1}: ${job.kind}`);
    for (const line of describeJob(job)) console.log(line);
  }

  if (dryRun) {
    console.log("Dry run - no jobs will be executed");
    return;
  }

  const reports = await runJobs(jobs, createJobServices(settings));

  for (const [i, report] of reports.entries())
    console.log(`Job ${i + 1} (${report.job.kind}): ${report.outcome}`);

  if (reports.some((r) => r.outcome === "FAILED")) process.exitCode = 1;
}

main(argv.slice(2)).catch((e) => {
  if (e instanceof InvalidArgumentsError) {
    console.error(e.message);
  } else {
    console.error("run-analysis caught exception before any job could run");
    console.error(e);
  }
  process.exitCode = 1;
});
