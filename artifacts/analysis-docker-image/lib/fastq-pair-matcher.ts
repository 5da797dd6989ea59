import { BucketPath } from "./bucket-path";
import { AmbiguousReadMarkerError, UnbalancedPairError } from "./errors";

export const READ1_FASTQ_SUBSTRING = "_R1_";
export const READ2_FASTQ_SUBSTRING = "_R2_";
export const READ_PAIR_FASTQ_SUBSTRING = "_R?_";

export type FastqPair = {
  // the shared file name with the read marker replaced by a wildcard and no extension
  pairName: string;
  read1: BucketPath;
  read2: BucketPath;
};

export type LocalFastqPair = {
  pairName: string;
  read1: string;
  read2: string;
};

function countOccurrences(value: string, substring: string): number {
  return value.split(substring).length - 1;
}

function toPairName(fileName: string, marker: string): string {
  return fileName.replace(marker, READ_PAIR_FASTQ_SUBSTRING).split(".")[0];
}

function addToSide(
  side: Map<string, BucketPath>,
  pairName: string,
  path: BucketPath
) {
  const existing = side.get(pairName);

  if (existing)
    throw new AmbiguousReadMarkerError(
      path.toString(),
      `resolves to the same pair name '${pairName}' as '${existing}'`
    );

  side.set(pairName, path);
}

/**
 * Group a flat list of FASTQ files into read 1/read 2 pairs. For each read pair
 * the file name for read 1 must contain "_R1_" exactly once and "_R2_" zero
 * times, and the file name for read 2 the reverse.
 *
 * @param fastqPaths the FASTQ files as found in the bucket (any order)
 * @returns the pairs sorted by pair name
 */
export function pairUpFastqPaths(fastqPaths: BucketPath[]): FastqPair[] {
  const pairNameToRead1 = new Map<string, BucketPath>();
  const pairNameToRead2 = new Map<string, BucketPath>();

  for (const fastqPath of fastqPaths) {
    const fileName = fastqPath.fileName();
    const read1Count = countOccurrences(fileName, READ1_FASTQ_SUBSTRING);
    const read2Count = countOccurrences(fileName, READ2_FASTQ_SUBSTRING);

    if (read1Count === 1 && read2Count === 0) {
      addToSide(pairNameToRead1, toPairName(fileName, READ1_FASTQ_SUBSTRING), fastqPath);
    } else if (read1Count === 0 && read2Count === 1) {
      addToSide(pairNameToRead2, toPairName(fileName, READ2_FASTQ_SUBSTRING), fastqPath);
    } else {
      throw new AmbiguousReadMarkerError(
        fastqPath.toString(),
        `found ${read1Count} x '${READ1_FASTQ_SUBSTRING}' and ${read2Count} x '${READ2_FASTQ_SUBSTRING}'`
      );
    }
  }

  const missingRead2 = [...pairNameToRead1.keys()].filter((n) => !pairNameToRead2.has(n)).sort();
  const missingRead1 = [...pairNameToRead2.keys()].filter((n) => !pairNameToRead1.has(n)).sort();

  if (missingRead1.length > 0 || missingRead2.length > 0)
    throw new UnbalancedPairError(missingRead2, missingRead1);

  const pairs: FastqPair[] = [];

  for (const [pairName, read1] of pairNameToRead1) {
    const read2 = pairNameToRead2.get(pairName);
    if (read2) pairs.push({ pairName, read1, read2 });
  }

  return pairs.sort((a, b) => (a.pairName < b.pairName ? -1 : a.pairName > b.pairName ? 1 : 0));
}

/**
 * Where the files of a pair will live once pulled into a local cache.
 *
 * @param pair
 * @param localPathFor the cache path mapping
 */
export function toLocalFastqPair(
  pair: FastqPair,
  localPathFor: (path: BucketPath) => string
): LocalFastqPair {
  return {
    pairName: pair.pairName,
    read1: localPathFor(pair.read1),
    read2: localPathFor(pair.read2),
  };
}
