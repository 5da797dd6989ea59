import { copyFile, mkdir, rename, rm } from "fs/promises";
import { dirname } from "path";
import { BucketPath } from "../bucket-path";
import { NoInputsFoundError } from "../errors";
import { FastqPair, pairUpFastqPaths } from "../fastq-pair-matcher";
import { ObjectStoreClient } from "../object-store";
import { describeJob, Job } from "./job";

export function logJobStart(job: Job) {
  console.log(`Starting ${job.kind} job`);
  console.log("Settings:");
  describeJob(job).forEach((l) => console.log(l));
}

/**
 * The idempotency check every job starts with - if the output is already in
 * the bucket then a previous run got there first and there is nothing to do.
 *
 * @param store
 * @param output
 */
export async function outputAlreadyExists(
  store: ObjectStoreClient,
  output: BucketPath
): Promise<boolean> {
  if (await store.exists(output)) {
    console.log(`Skipping job. Output file '${output}' already exists in bucket`);
    return true;
  }

  return false;
}

function listing(paths: BucketPath[]): string {
  return paths.map((p) => p.toString()).join("\n");
}

export async function discoverFastqs(
  store: ObjectStoreClient,
  pattern: BucketPath
): Promise<BucketPath[]> {
  const fastqPaths = await store.matchGlob(pattern);

  if (fastqPaths.length === 0)
    throw new NoInputsFoundError(pattern.toString(), "FASTQ paths");

  console.log(`Found FASTQ paths matching input path ${pattern}:\n${listing(fastqPaths)}`);

  return fastqPaths;
}

export async function discoverReferenceFiles(
  store: ObjectStoreClient,
  directory: BucketPath
): Promise<BucketPath[]> {
  console.log(`Searching for reference genome files to download: ${directory}`);

  const referenceFiles = await store.listChildren(directory);

  if (referenceFiles.length === 0)
    throw new NoInputsFoundError(directory.toString(), "reference genome files in bucket directory");

  console.log(`Identified reference genome files to download:\n${listing(referenceFiles)}`);

  return referenceFiles;
}

export function pairFastqs(fastqPaths: BucketPath[]): FastqPair[] {
  const pairs = pairUpFastqPaths(fastqPaths);

  console.log(
    `The FASTQ paths have been paired up:\n${pairs
      .map((p) => `Read1: ${p.read1}\nRead2: ${p.read2}`)
      .join("\n\n")}`
  );

  return pairs;
}

/**
 * A BAM and the index that travels with it.
 *
 * @param bam
 */
export function bamWithIndex(bam: BucketPath): BucketPath[] {
  return [bam, bam.withSuffix(".bai")];
}

/**
 * Make sure the directory exists and is empty - wiping anything left
 * behind by an earlier run.
 *
 * @param directory
 */
export async function createOrCleanupDir(directory: string) {
  await rm(directory, { recursive: true, force: true });
  await mkdir(directory, { recursive: true });
}

export async function removeDir(directory: string) {
  await rm(directory, { recursive: true, force: true });
}

/**
 * Move a file, falling back to copy and delete when source and destination
 * are on different filesystems.
 *
 * @param source
 * @param destination
 */
export async function moveFile(source: string, destination: string) {
  await mkdir(dirname(destination), { recursive: true });

  try {
    await rename(source, destination);
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "EXDEV")) throw e;

    await copyFile(source, destination);
    await rm(source);
  }
}
