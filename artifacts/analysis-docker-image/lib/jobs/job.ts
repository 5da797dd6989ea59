import { BucketPath } from "../bucket-path";

/**
 * Align paired FASTQs lane by lane with bwa, then merge the lanes.
 */
export type DnaAlignJob = {
  readonly kind: "dna-align";
  // glob of the FASTQs to align
  readonly input: BucketPath;
  // the FASTA - with all its index files in the same folder
  readonly referenceGenome: BucketPath;
  readonly output: BucketPath;
};

/**
 * Align paired FASTQs with STAR in one go.
 */
export type RnaAlignJob = {
  readonly kind: "rna-align";
  readonly input: BucketPath;
  // a folder holding a STAR genome index
  readonly referenceGenomeDir: BucketPath;
  readonly output: BucketPath;
};

export type UmiDedupJob = {
  readonly kind: "umi-dedup";
  readonly input: BucketPath;
  readonly output: BucketPath;
};

export type DedupJob = {
  readonly kind: "dedup";
  readonly input: BucketPath;
  readonly output: BucketPath;
};

export type FlagstatJob = {
  readonly kind: "flagstat";
  readonly input: BucketPath;
  readonly output: BucketPath;
};

export type Job = DnaAlignJob | RnaAlignJob | UmiDedupJob | DedupJob | FlagstatJob;

export type JobKind = Job["kind"];

export const JOB_KINDS: readonly JobKind[] = [
  "dna-align",
  "rna-align",
  "umi-dedup",
  "dedup",
  "flagstat",
];

export function isJobKind(value: string): value is JobKind {
  const kinds: readonly string[] = JOB_KINDS;

  return kinds.includes(value);
}

/**
 * SKIPPED is the job finding its output already in place.
 */
export type JobOutcome = "SKIPPED" | "COMPLETED";

/**
 * The settings of a job as printable lines (for logs).
 *
 * @param job
 */
export function describeJob(job: Job): string[] {
  const fields: [string, BucketPath][] = [["input", job.input]];

  if (job.kind === "dna-align") fields.push(["ref_genome", job.referenceGenome]);
  if (job.kind === "rna-align") fields.push(["ref_genome", job.referenceGenomeDir]);

  fields.push(["output", job.output]);

  const width = Math.max(...fields.map(([name]) => name.length));

  return fields.map(([name, value]) => `    ${name.padEnd(width)} = ${value}`);
}
