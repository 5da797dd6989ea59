import { join } from "path";
import { FastqPair, toLocalFastqPair } from "../fastq-pair-matcher";
import { JobServices } from "../job-services";
import { readGroupString } from "../read-group";
import { DnaAlignJob, JobOutcome } from "./job";
import {
  bamWithIndex,
  createOrCleanupDir,
  discoverFastqs,
  discoverReferenceFiles,
  logJobStart,
  moveFile,
  outputAlreadyExists,
  pairFastqs,
  removeDir,
} from "./job-steps";

/**
 * Align each FASTQ pair (lane) into its own BAM and then merge the lanes
 * into the final indexed BAM.
 *
 * The reference genome FASTA is expected to sit in a folder with all its
 * bwa index files - and that whole folder is brought down.
 */
export async function executeDnaAlignJob(
  job: DnaAlignJob,
  services: JobServices
): Promise<JobOutcome> {
  const { store, cache } = services;

  logJobStart(job);

  if (await outputAlreadyExists(store, job.output)) return "SKIPPED";

  const fastqPaths = await discoverFastqs(store, job.input);
  const fastqPairs = pairFastqs(fastqPaths);
  const referenceFiles = await discoverReferenceFiles(store, job.referenceGenome.parent());

  console.log("Starting download of input files");
  await cache.downloadMany([...fastqPaths, ...referenceFiles]);
  console.log("Finished download of input files");

  await alignLocally(job, fastqPairs, services);

  console.log("Starting upload of output files");
  await cache.uploadMany(bamWithIndex(job.output));
  console.log("Finished upload of output files");

  await removeDir(services.localWorkingDirectory);

  console.log(`Finished ${job.kind} job`);

  return "COMPLETED";
}

async function alignLocally(
  job: DnaAlignJob,
  fastqPairs: FastqPair[],
  { cache, tools, localWorkingDirectory }: JobServices
) {
  await createOrCleanupDir(localWorkingDirectory);

  const localReferenceGenome = cache.localPathFor(job.referenceGenome);
  const localFinalBam = cache.localPathFor(job.output);

  const localLaneBams: string[] = [];

  for (const fastqPair of fastqPairs) {
    const localLaneBam = join(localWorkingDirectory, `${fastqPair.pairName}.bam`);
    const localFastqPair = toLocalFastqPair(fastqPair, (p) => cache.localPathFor(p));
    const readGroup = readGroupString(localFastqPair.read1, localFinalBam);

    console.log(`Start creating lane bam ${localLaneBam}`);
    await tools.alignDnaLane(localFastqPair, localReferenceGenome, localLaneBam, readGroup);
    console.log(`Finished creating lane bam ${localLaneBam}`);

    localLaneBams.push(localLaneBam);
  }

  if (localLaneBams.length === 1) {
    console.log("Only one lane bam, so lane bam is merged bam");
    await moveFile(localLaneBams[0], localFinalBam);
  } else {
    console.log("Start merging lane bams");
    await tools.mergeBams(localLaneBams, localFinalBam);
    console.log("Finished merging lane bams");
  }

  console.log("Start creating index for merged bam");
  await tools.indexBam(localFinalBam);
  console.log("Finished creating index for merged bam");
}
