import { cpus, homedir } from "os";
import { join } from "path";
import { ToolSettings } from "./tool-runner";

// by default, we obviously want this setup to work correctly in the standard docker image
// HOWEVER, it is useful to be able to override these on an execution basis for local testing
const cacheDirEnvName = "LOCAL_FILE_CACHE_DIR";
const workingDirEnvName = "LOCAL_WORKING_DIR";
const transferConcurrencyEnvName = "TRANSFER_CONCURRENCY";
const threadCountEnvName = "THREAD_COUNT";
const refGenome37EnvName = "REF_GENOME_37";
const refGenome38EnvName = "REF_GENOME_38";

export const DEFAULT_REF_GENOME_37 =
  "s3://common-resources/reference_genome/37/Homo_sapiens.GRCh37.GATK.illumina.fasta";
export const DEFAULT_REF_GENOME_38 =
  "s3://common-resources/reference_genome/38/GCA_000001405.15_GRCh38_no_alt_analysis_set.fna";

export type Settings = {
  localFileCacheDirectory: string;
  localWorkingDirectory: string;
  // undefined means every transfer of a batch is started at once
  maxConcurrentTransfers?: number;
  referenceGenome37: string;
  referenceGenome38: string;
  tools: ToolSettings;
};

function positiveInteger(
  envDict: NodeJS.ProcessEnv,
  name: string
): number | undefined {
  const value = envDict[name];

  if (!value) return undefined;

  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1)
    throw new Error(`Environment variable ${name} must be a positive integer (was '${value}')`);

  return parsed;
}

export function getFromEnv(envDict: NodeJS.ProcessEnv = process.env): Settings {
  const home = homedir();

  return {
    localFileCacheDirectory:
      envDict[cacheDirEnvName] || join(home, "bucket_local_file_cache"),
    localWorkingDirectory:
      envDict[workingDirEnvName] || join(home, "job_working_directory"),
    maxConcurrentTransfers: positiveInteger(envDict, transferConcurrencyEnvName),
    referenceGenome37: envDict[refGenome37EnvName] || DEFAULT_REF_GENOME_37,
    referenceGenome38: envDict[refGenome38EnvName] || DEFAULT_REF_GENOME_38,
    tools: {
      bwa: envDict["BWA"] || join(home, "bwa"),
      sambamba: envDict["SAMBAMBA"] || join(home, "sambamba"),
      star: envDict["STAR"] || join(home, "STAR"),
      java: envDict["JAVA"] || "java",
      umiCollapseJar:
        envDict["UMI_COLLAPSE_JAR"] || join(home, "UMICollapse", "umicollapse.jar"),
      threads: positiveInteger(envDict, threadCountEnvName) ?? cpus().length,
    },
  };
}
