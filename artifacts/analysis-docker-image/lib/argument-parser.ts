import { Command, CommanderError, InvalidArgumentError, OptionValues } from "commander";
import { BucketPath } from "./bucket-path";
import { InvalidArgumentsError, InvalidPathError } from "./errors";
import { isJobKind, Job, JOB_KINDS, JobKind } from "./jobs/job";

const REF_GENOME_37_ARGUMENT = "37";
const REF_GENOME_38_ARGUMENT = "38";

export const BUCKET_PATH_REGEX = /^s3:\/\/[a-zA-Z0-9/._-]+$/;
export const BAM_BUCKET_PATH_REGEX = /^s3:\/\/[a-zA-Z0-9/._-]+\.bam$/;
export const WILDCARD_FASTQ_BUCKET_PATH_REGEX = /^s3:\/\/[a-zA-Z0-9*/._-]+\.fastq\.gz$/;

export type ReferenceGenomeSettings = {
  referenceGenome37: string;
  referenceGenome38: string;
};

const INPUT_FASTQ_HELP =
  "Wildcard path to the fastqs files that will be aligned, e.g. 's3://some-kind/of/path*.fastq.gz'. " +
  "Make sure that for each read pair the file path for read 1 contains '_R1_' exactly once and " +
  "'_R2_' zero times, and that the file path for read 2 contains '_R2_' exactly once and '_R1_' zero times.";

const OUTPUT_BAM_HELP =
  "Path in bucket to which the bam will be written, e.g. 's3://some-other-kind/of/path.bam'. " +
  "Will also output an index file, e.g. 's3://some-other-kind/of/path.bam.bai'.";

const INPUT_BAM_HELP =
  "Path in bucket to an indexed bam, e.g. 's3://some-kind/of/path.bam' (the index must be next to it).";

/**
 * Parse into a bucket path, reporting a bad path the way commander reports any
 * other invalid option value.
 *
 * @param value
 */
function toBucketPath(value: string): BucketPath {
  try {
    return BucketPath.parse(value);
  } catch (e) {
    if (e instanceof InvalidPathError) throw new InvalidArgumentError(e.message);

    throw e;
  }
}

function matching(pattern: RegExp) {
  return (value: string): BucketPath => {
    if (!pattern.test(value))
      throw new InvalidArgumentError(`Value '${value}' does not match the regex pattern '${pattern.source}'.`);

    return toBucketPath(value);
  };
}

function referenceGenome(settings: ReferenceGenomeSettings) {
  return (value: string): BucketPath => {
    if (value === REF_GENOME_37_ARGUMENT) return toBucketPath(settings.referenceGenome37);
    if (value === REF_GENOME_38_ARGUMENT) return toBucketPath(settings.referenceGenome38);

    if (!BUCKET_PATH_REGEX.test(value))
      throw new InvalidArgumentError(
        `Value '${value}' does not match '${REF_GENOME_37_ARGUMENT}', '${REF_GENOME_38_ARGUMENT}' ` +
          `or regex '${BUCKET_PATH_REGEX.source}'.`
      );

    return toBucketPath(value);
  };
}

function jobCommand(kind: JobKind, description: string): Command {
  return new Command(kind)
    .description(description)
    .exitOverride()
    .allowExcessArguments(false)
    .configureOutput({ writeErr: (s) => console.error(s.trimEnd()) });
}

/**
 * Parse the arguments of one job with a freshly made command (commander
 * keeps option values between parses so they cannot be shared).
 */
function parseWith<T extends OptionValues>(command: Command, args: string[]): T {
  try {
    command.parse(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError)
      throw new InvalidArgumentsError(`Invalid arguments for ${command.name()} job: ${e.message}`);

    throw e;
  }

  return command.opts<T>();
}

type InOut = { input: BucketPath; output: BucketPath };

const JOB_PARSERS: {
  [K in JobKind]: (args: string[], settings: ReferenceGenomeSettings) => Extract<Job, { kind: K }>;
} = {
  "dna-align": (args, settings) => {
    const opts = parseWith<InOut & { refGenome: BucketPath }>(
      jobCommand("dna-align", "Run bwa mem alignment of paired reads.")
        .requiredOption("-i, --input <path>", INPUT_FASTQ_HELP, matching(WILDCARD_FASTQ_BUCKET_PATH_REGEX))
        .requiredOption(
          "-r, --ref-genome <value>",
          "Reference genome version to align to. Either '37', '38', or some bucket path to a FASTA file, e.g. 's3://some/kind/of/path'.",
          referenceGenome(settings)
        )
        .requiredOption("-o, --output <path>", OUTPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX)),
      args
    );

    return { kind: "dna-align", input: opts.input, referenceGenome: opts.refGenome, output: opts.output };
  },
  "rna-align": (args) => {
    const opts = parseWith<InOut & { refGenomeDir: BucketPath }>(
      jobCommand("rna-align", "Run STAR alignment of paired RNA reads.")
        .requiredOption("-i, --input <path>", INPUT_FASTQ_HELP, matching(WILDCARD_FASTQ_BUCKET_PATH_REGEX))
        .requiredOption(
          "-r, --ref-genome-dir <path>",
          "Bucket directory holding the STAR reference genome resources, e.g. 's3://some/kind/of/dir/'.",
          matching(BUCKET_PATH_REGEX)
        )
        .requiredOption("-o, --output <path>", OUTPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX)),
      args
    );

    return { kind: "rna-align", input: opts.input, referenceGenomeDir: opts.refGenomeDir, output: opts.output };
  },
  "umi-dedup": (args) => {
    const opts = parseWith<InOut>(
      jobCommand("umi-dedup", "Deduplicate a bam using UMIs with UMICollapse.")
        .requiredOption("-i, --input <path>", INPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX))
        .requiredOption("-o, --output <path>", OUTPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX)),
      args
    );

    return { kind: "umi-dedup", input: opts.input, output: opts.output };
  },
  dedup: (args) => {
    const opts = parseWith<InOut>(
      jobCommand("dedup", "Mark duplicates in a bam with sambamba markdup.")
        .requiredOption("-i, --input <path>", INPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX))
        .requiredOption("-o, --output <path>", OUTPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX)),
      args
    );

    return { kind: "dedup", input: opts.input, output: opts.output };
  },
  flagstat: (args) => {
    const opts = parseWith<InOut>(
      jobCommand("flagstat", "Produce sambamba flagstat statistics for a bam.")
        .requiredOption("-i, --input <path>", INPUT_BAM_HELP, matching(BAM_BUCKET_PATH_REGEX))
        .requiredOption(
          "-o, --output <path>",
          "Path in bucket to which the flagstat text will be written, e.g. 's3://some-other-kind/of/path.flagstat'.",
          matching(BUCKET_PATH_REGEX)
        ),
      args
    );

    return { kind: "flagstat", input: opts.input, output: opts.output };
  },
};

function parseJob(kind: JobKind, args: string[], settings: ReferenceGenomeSettings): Job {
  return JOB_PARSERS[kind](args, settings);
}

/**
 * Split the command line into jobs. Each job starts with its name and runs
 * until the next job name, e.g.
 *
 *   dna-align -i s3://b/x*.fastq.gz -r 38 -o s3://b/x.bam flagstat -i s3://b/x.bam -o s3://b/x.flagstat
 *
 * @param args the command line arguments (after the program name)
 * @param settings where the reference genome shortcuts point
 */
export function extractJobs(args: string[], settings: ReferenceGenomeSettings): Job[] {
  const remaining = [...args];
  const jobs: Job[] = [];

  while (remaining.length > 0) {
    const jobName = remaining.shift() ?? "";

    if (!isJobKind(jobName))
      throw new InvalidArgumentsError(
        `Unrecognized job name '${jobName}'. Recognized job names: ${JOB_KINDS.join(", ")}`
      );

    console.log(`Detected job of type: ${jobName}`);

    const jobArgs: string[] = [];
    while (remaining.length > 0 && !isJobKind(remaining[0])) {
      jobArgs.push(remaining[0]);
      remaining.shift();
    }

    jobs.push(parseJob(jobName, jobArgs, settings));
  }

  return jobs;
}
