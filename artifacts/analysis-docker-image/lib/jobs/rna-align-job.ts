import { toLocalFastqPair } from "../fastq-pair-matcher";
import { JobServices } from "../job-services";
import { JobOutcome, RnaAlignJob } from "./job";
import {
  bamWithIndex,
  createOrCleanupDir,
  discoverFastqs,
  discoverReferenceFiles,
  logJobStart,
  outputAlreadyExists,
  pairFastqs,
  removeDir,
} from "./job-steps";

export async function executeRnaAlignJob(
  job: RnaAlignJob,
  services: JobServices
): Promise<JobOutcome> {
  const { store, cache, tools, localWorkingDirectory } = services;

  logJobStart(job);

  if (await outputAlreadyExists(store, job.output)) return "SKIPPED";

  const fastqPaths = await discoverFastqs(store, job.input);
  const fastqPairs = pairFastqs(fastqPaths);
  const referenceFiles = await discoverReferenceFiles(store, job.referenceGenomeDir);

  console.log("Starting download of input files");
  await cache.downloadMany([...fastqPaths, ...referenceFiles]);
  console.log("Finished download of input files");

  await createOrCleanupDir(localWorkingDirectory);

  const localFastqPairs = fastqPairs.map((p) => toLocalFastqPair(p, (b) => cache.localPathFor(b)));
  const localReferenceResourceDir = cache.localPathFor(job.referenceGenomeDir);
  const localFinalBam = cache.localPathFor(job.output);

  console.log("Start creating unsorted bam");
  const localUnsortedBam = await tools.alignRna(
    localFastqPairs,
    localReferenceResourceDir,
    localWorkingDirectory
  );
  console.log(`Finished creating unsorted bam ${localUnsortedBam}`);

  console.log(`Start sorting bam ${localUnsortedBam} to create ${localFinalBam}`);
  await tools.sortBam(localUnsortedBam, localFinalBam);

  console.log(`Start indexing bam ${localFinalBam}`);
  await tools.indexBam(localFinalBam);

  console.log("Starting upload of output files");
  await cache.uploadMany(bamWithIndex(job.output));
  console.log("Finished upload of output files");

  await removeDir(localWorkingDirectory);

  console.log(`Finished ${job.kind} job`);

  return "COMPLETED";
}
