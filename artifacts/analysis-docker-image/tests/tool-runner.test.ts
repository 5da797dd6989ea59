import { existsSync } from "fs";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pipeCommands, runBashCommand, shellQuote } from "../lib/bash-command";
import { ExternalToolFailure } from "../lib/errors";
import { BashToolRunner, ToolSettings } from "../lib/tool-runner";

const settings: ToolSettings = {
  bwa: "/opt/bwa",
  sambamba: "/opt/sambamba",
  star: "/opt/STAR",
  java: "java",
  umiCollapseJar: "/opt/umicollapse.jar",
  threads: 4,
};

describe("Bash commands", () => {
  test("plain words are not quoted", () => {
    expect(shellQuote("/cache/b/x.bam")).toBe("/cache/b/x.bam");
    expect(shellQuote("--overflow-list-size=4500000")).toBe("--overflow-list-size=4500000");
  });

  test("anything else is single quoted", () => {
    expect(shellQuote("x_R?_1.bam")).toBe("'x_R?_1.bam'");
    expect(shellQuote("a b")).toBe("'a b'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  test("pipes", () => {
    expect(pipeCommands(["cat", "a b"], ["wc", "-l"])).toBe("cat 'a b' | wc -l");
  });

  test("a failing command becomes an ExternalToolFailure", async () => {
    const error = await runBashCommand("echo oops 1>&2; exit 3").then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ExternalToolFailure);
    if (!(error instanceof ExternalToolFailure)) return;

    expect(error.exitCode).toBe(3);
    expect(error.stderr).toBe("oops\n");
    expect(error.message).toBe("Bash command failed: status=3, command=echo oops 1>&2; exit 3, errors=oops");
  });

  test("a failure anywhere in a pipe fails the whole", async () => {
    await expect(runBashCommand("false | cat")).rejects.toThrow(ExternalToolFailure);
  });

  test("a successful command", async () => {
    await expect(runBashCommand("echo fine")).resolves.toBeUndefined();
  });
});

describe("Tool command lines", () => {
  let root: string;
  let commands: string[];
  let tools: BashToolRunner;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "tool-runner-"));
    commands = [];
    tools = new BashToolRunner(settings, async (c) => {
      commands.push(c);
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("dna lane alignment pipes bwa into sambamba", async () => {
    const out = join(root, "work", "lane.bam");

    await tools.alignDnaLane(
      { pairName: "x", read1: "/c/x_R1_1.fastq.gz", read2: "/c/x_R2_1.fastq.gz" },
      "/c/ref/genome.fasta",
      out,
      "@RG\\tID:x"
    );

    expect(commands).toEqual([
      "/opt/bwa mem -Y -t 4 -R '@RG\\tID:x' /c/ref/genome.fasta /c/x_R1_1.fastq.gz /c/x_R2_1.fastq.gz" +
        " | /opt/sambamba view -f bam -S -l 0 /dev/stdin" +
        ` | /opt/sambamba sort -o ${out} /dev/stdin`,
    ]);
    // the output folder is made ready for the tool
    expect(existsSync(join(root, "work"))).toBe(true);
  });

  test("rna alignment runs STAR over all pairs at once", async () => {
    const unsorted = await tools.alignRna(
      [
        { pairName: "a", read1: "/c/a_R1.fq.gz", read2: "/c/a_R2.fq.gz" },
        { pairName: "b", read1: "/c/b_R1.fq.gz", read2: "/c/b_R2.fq.gz" },
      ],
      "/c/star-ref",
      "/work"
    );

    expect(unsorted).toBe("/work/Aligned.out.bam");
    expect(commands).toEqual([
      "/opt/STAR --runThreadN 4 --genomeDir /c/star-ref --readFilesIn /c/a_R1.fq.gz,/c/b_R1.fq.gz /c/a_R2.fq.gz,/c/b_R2.fq.gz" +
        " --readFilesCommand zcat --outSAMtype BAM Unsorted --outFileNamePrefix /work/",
    ]);
  });

  test("sambamba operations", async () => {
    const out = join(root, "out.bam");

    await tools.mergeBams(["/w/1.bam", "/w/2.bam"], out);
    await tools.sortBam("/w/in.bam", out);
    await tools.indexBam(out);
    await tools.markDuplicates("/w/in.bam", out);

    expect(commands).toEqual([
      `/opt/sambamba merge -t 4 ${out} /w/1.bam /w/2.bam`,
      `/opt/sambamba sort -t 4 -o ${out} /w/in.bam`,
      `/opt/sambamba index -t 4 ${out}`,
      `/opt/sambamba markdup -t 4 --overflow-list-size=4500000 /w/in.bam ${out}`,
    ]);
  });

  test("umi deduplication", async () => {
    const out = join(root, "dedup.bam");

    await tools.deduplicateWithUmi("/w/in.bam", out);

    expect(commands).toEqual([
      `java -server -Xms8G -Xmx16G -Xss20M -jar /opt/umicollapse.jar bam -i /w/in.bam -o ${out} --umi-sep : --paired --two-pass`,
    ]);
  });

  test("flagstat redirects to the output file", async () => {
    const out = join(root, "stats", "x.flagstat");

    await tools.flagstat("/w/in.bam", out);

    expect(commands).toEqual([`/opt/sambamba flagstat -t 4 /w/in.bam > ${out}`]);
    expect(existsSync(join(root, "stats"))).toBe(true);
  });
});
