import { BucketPath } from "../bucket-path";
import { JobServices } from "../job-services";
import { ToolRunner } from "../tool-runner";
import { DedupJob, FlagstatJob, JobOutcome, UmiDedupJob } from "./job";
import { bamWithIndex, logJobStart, outputAlreadyExists } from "./job-steps";

type SingleBamJob = UmiDedupJob | DedupJob | FlagstatJob;

/**
 * The shared shape of the jobs that turn one indexed BAM into one output:
 * skip if done, pull the BAM (and its index), run the tool, push the outputs.
 *
 * @param job
 * @param services
 * @param outputs every object the tool step produces (the first being job.output)
 * @param runTool the tool step given the local input and output paths
 */
async function executeSingleBamJob(
  job: SingleBamJob,
  { store, cache, tools }: JobServices,
  outputs: BucketPath[],
  runTool: (tools: ToolRunner, localInput: string, localOutput: string) => Promise<void>
): Promise<JobOutcome> {
  logJobStart(job);

  if (await outputAlreadyExists(store, job.output)) return "SKIPPED";

  console.log("Starting download of input files");
  await cache.downloadMany(bamWithIndex(job.input));
  console.log("Finished download of input files");

  await runTool(tools, cache.localPathFor(job.input), cache.localPathFor(job.output));

  console.log("Starting upload of output files");
  await cache.uploadMany(outputs);
  console.log("Finished upload of output files");

  console.log(`Finished ${job.kind} job`);

  return "COMPLETED";
}

export function executeUmiDedupJob(job: UmiDedupJob, services: JobServices) {
  return executeSingleBamJob(job, services, bamWithIndex(job.output), async (tools, input, output) => {
    console.log("Starting deduplication");
    await tools.deduplicateWithUmi(input, output);

    console.log("Starting creation of bam index");
    await tools.indexBam(output);
  });
}

export function executeDedupJob(job: DedupJob, services: JobServices) {
  return executeSingleBamJob(job, services, bamWithIndex(job.output), async (tools, input, output) => {
    console.log("Starting duplicate marking");
    await tools.markDuplicates(input, output);

    console.log("Starting creation of bam index");
    await tools.indexBam(output);
  });
}

export function executeFlagstatJob(job: FlagstatJob, services: JobServices) {
  // a flagstat is a plain text report - there is no index to go with it
  return executeSingleBamJob(job, services, [job.output], async (tools, input, output) => {
    console.log("Starting flagstat");
    await tools.flagstat(input, output);
  });
}
