import { mkdir } from "fs/promises";
import { dirname, join } from "path";
import { CommandRunner, pipeCommands, runBashCommand, shellQuote } from "./bash-command";
import { LocalFastqPair } from "./fastq-pair-matcher";

/**
 * The external bioinformatics tools as seen by the jobs. Every operation takes
 * explicit local paths, resolves once the output has been written and rejects
 * with an ExternalToolFailure otherwise.
 */
export interface ToolRunner {
  alignDnaLane(
    pair: LocalFastqPair,
    referenceFasta: string,
    outputBam: string,
    readGroup: string
  ): Promise<void>;

  /**
   * Align all the pairs in a single STAR run.
   *
   * @returns the path of the unsorted BAM produced inside the working directory
   */
  alignRna(
    pairs: LocalFastqPair[],
    referenceResourceDir: string,
    workingDir: string
  ): Promise<string>;

  mergeBams(inputBams: string[], outputBam: string): Promise<void>;

  sortBam(inputBam: string, outputBam: string): Promise<void>;

  indexBam(bam: string): Promise<void>;

  markDuplicates(inputBam: string, outputBam: string): Promise<void>;

  deduplicateWithUmi(inputBam: string, outputBam: string): Promise<void>;

  flagstat(inputBam: string, outputPath: string): Promise<void>;
}

export type ToolSettings = {
  bwa: string;
  sambamba: string;
  star: string;
  java: string;
  umiCollapseJar: string;
  threads: number;
};

const SAMBAMBA_MARKDUP_OVERFLOW_LIST_SIZE = 4500000;

// the file STAR writes into its output prefix when asked for unsorted BAM output
const STAR_UNSORTED_BAM = "Aligned.out.bam";

/**
 * Runs the tools as bash command lines.
 */
export class BashToolRunner implements ToolRunner {
  private readonly threads: string;

  constructor(
    private readonly settings: ToolSettings,
    private readonly run: CommandRunner = runBashCommand
  ) {
    this.threads = settings.threads.toString();
  }

  async alignDnaLane(
    pair: LocalFastqPair,
    referenceFasta: string,
    outputBam: string,
    readGroup: string
  ): Promise<void> {
    const { bwa, sambamba } = this.settings;

    await this.runWithOutput(
      outputBam,
      pipeCommands(
        [bwa, "mem", "-Y", "-t", this.threads, "-R", readGroup, referenceFasta, pair.read1, pair.read2],
        [sambamba, "view", "-f", "bam", "-S", "-l", "0", "/dev/stdin"],
        [sambamba, "sort", "-o", outputBam, "/dev/stdin"]
      )
    );
  }

  async alignRna(
    pairs: LocalFastqPair[],
    referenceResourceDir: string,
    workingDir: string
  ): Promise<string> {
    await this.run(
      pipeCommands([
        this.settings.star,
        "--runThreadN",
        this.threads,
        "--genomeDir",
        referenceResourceDir,
        "--readFilesIn",
        pairs.map((p) => p.read1).join(","),
        pairs.map((p) => p.read2).join(","),
        "--readFilesCommand",
        "zcat",
        "--outSAMtype",
        "BAM",
        "Unsorted",
        "--outFileNamePrefix",
        `${workingDir}/`,
      ])
    );

    return join(workingDir, STAR_UNSORTED_BAM);
  }

  async mergeBams(inputBams: string[], outputBam: string): Promise<void> {
    await this.runWithOutput(
      outputBam,
      pipeCommands([this.settings.sambamba, "merge", "-t", this.threads, outputBam, ...inputBams])
    );
  }

  async sortBam(inputBam: string, outputBam: string): Promise<void> {
    await this.runWithOutput(
      outputBam,
      pipeCommands([this.settings.sambamba, "sort", "-t", this.threads, "-o", outputBam, inputBam])
    );
  }

  async indexBam(bam: string): Promise<void> {
    await this.run(pipeCommands([this.settings.sambamba, "index", "-t", this.threads, bam]));
  }

  async markDuplicates(inputBam: string, outputBam: string): Promise<void> {
    await this.runWithOutput(
      outputBam,
      pipeCommands([
        this.settings.sambamba,
        "markdup",
        "-t",
        this.threads,
        `--overflow-list-size=${SAMBAMBA_MARKDUP_OVERFLOW_LIST_SIZE}`,
        inputBam,
        outputBam,
      ])
    );
  }

  async deduplicateWithUmi(inputBam: string, outputBam: string): Promise<void> {
    const { java, umiCollapseJar } = this.settings;

    await this.runWithOutput(
      outputBam,
      pipeCommands([
        java, "-server", "-Xms8G", "-Xmx16G", "-Xss20M", "-jar", umiCollapseJar,
        "bam", "-i", inputBam, "-o", outputBam, "--umi-sep", ":", "--paired", "--two-pass",
      ])
    );
  }

  async flagstat(inputBam: string, outputPath: string): Promise<void> {
    await this.runWithOutput(
      outputPath,
      `${pipeCommands([this.settings.sambamba, "flagstat", "-t", this.threads, inputBam])} > ${shellQuote(outputPath)}`
    );
  }

  private async runWithOutput(outputPath: string, command: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });

    await this.run(command);
  }
}
