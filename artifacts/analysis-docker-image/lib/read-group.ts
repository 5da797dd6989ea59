import { basename } from "path";
import { InvalidRecordGroupError } from "./errors";

// Illumina style names such as SAMPLE_FLOWCELL_S1_L001_R1_001
export const RECORD_GROUP_ID_REGEX = /^(.*_){2}S[0-9]+_L[0-9]{3}_R[1-2].*/;

function stem(localPath: string): string {
  return basename(localPath).split(".")[0];
}

/**
 * The bwa read group header line for one lane. The "\t" are left as literal
 * backslash-t for bwa to expand.
 *
 * @param localRead1Path the (local) read 1 FASTQ of the lane - whose name is the record group id
 * @param localOutputBamPath the final BAM - whose name is the sample
 */
export function readGroupString(
  localRead1Path: string,
  localOutputBamPath: string
): string {
  const recordGroupId = stem(localRead1Path);

  if (!RECORD_GROUP_ID_REGEX.test(recordGroupId))
    throw new InvalidRecordGroupError(recordGroupId, RECORD_GROUP_ID_REGEX);

  const sampleName = stem(localOutputBamPath);
  const flowcellId = recordGroupId.split("_")[1];

  return `@RG\\tID:${recordGroupId}\\tLB:${sampleName}\\tPL:ILLUMINA\\tPU:${flowcellId}\\tSM:${sampleName}`;
}
