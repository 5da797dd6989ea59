import { BucketPath } from "../lib/bucket-path";
import { AmbiguousReadMarkerError, UnbalancedPairError } from "../lib/errors";
import { pairUpFastqPaths, toLocalFastqPair } from "../lib/fastq-pair-matcher";

const paths = (...urls: string[]) => urls.map((u) => BucketPath.parse(u));

describe("FASTQ pairing", () => {
  test("pairs across lanes sorted by pair name", () => {
    const pairs = pairUpFastqPaths(
      paths(
        "s3://b/run/SAMPLE_FC1_S1_L002_R2_001.fastq.gz",
        "s3://b/run/SAMPLE_FC1_S1_L001_R1_001.fastq.gz",
        "s3://b/run/SAMPLE_FC1_S1_L002_R1_001.fastq.gz",
        "s3://b/run/SAMPLE_FC1_S1_L001_R2_001.fastq.gz"
      )
    );

    expect(pairs.map((p) => p.pairName)).toEqual(["SAMPLE_FC1_S1_L001_R?_001", "SAMPLE_FC1_S1_L002_R?_001"]);
    expect(pairs[0].read1.toString()).toBe("s3://b/run/SAMPLE_FC1_S1_L001_R1_001.fastq.gz");
    expect(pairs[0].read2.toString()).toBe("s3://b/run/SAMPLE_FC1_S1_L001_R2_001.fastq.gz");
    expect(pairs[1].read1.toString()).toBe("s3://b/run/SAMPLE_FC1_S1_L002_R1_001.fastq.gz");
  });

  test("only the file name decides the read", () => {
    const pairs = pairUpFastqPaths(paths("s3://b/_R2_/x_R1_y.fastq.gz", "s3://b/_R2_/x_R2_y.fastq.gz"));

    expect(pairs).toHaveLength(1);
    expect(pairs[0].pairName).toBe("x_R?_y");
  });

  test("no paths gives no pairs", () => {
    expect(pairUpFastqPaths([])).toEqual([]);
  });

  test("a file with both markers is ambiguous", () => {
    expect(() => pairUpFastqPaths(paths("s3://b/x_R1_R2_y.fastq.gz"))).toThrow(AmbiguousReadMarkerError);
  });

  test("a file with no marker is ambiguous", () => {
    expect(() => pairUpFastqPaths(paths("s3://b/x_y.fastq.gz"))).toThrow(AmbiguousReadMarkerError);
  });

  test("a file with the marker twice is ambiguous", () => {
    expect(() => pairUpFastqPaths(paths("s3://b/x_R1_y_R1_z.fastq.gz"))).toThrow(AmbiguousReadMarkerError);
  });

  test("two read 1 files giving the same pair name are ambiguous", () => {
    expect(() =>
      pairUpFastqPaths(paths("s3://b/a/x_R1_y.fastq.gz", "s3://b/b/x_R1_y.fastq.gz", "s3://b/a/x_R2_y.fastq.gz"))
    ).toThrow(AmbiguousReadMarkerError);
  });

  test("unmatched reads are all reported", () => {
    let caught: unknown;

    try {
      pairUpFastqPaths(
        paths("s3://b/c_R1_1.fastq.gz", "s3://b/a_R1_1.fastq.gz", "s3://b/b_R2_1.fastq.gz", "s3://b/d_R1_1.fastq.gz", "s3://b/d_R2_1.fastq.gz")
      );
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(UnbalancedPairError);
    if (!(caught instanceof UnbalancedPairError)) return;

    expect(caught.missingRead2).toEqual(["a_R?_1", "c_R?_1"]);
    expect(caught.missingRead1).toEqual(["b_R?_1"]);
  });

  test("local pair", () => {
    const [pair] = pairUpFastqPaths(paths("s3://b/x_R1_y.fastq.gz", "s3://b/x_R2_y.fastq.gz"));

    expect(toLocalFastqPair(pair, (p) => `/cache/${p.bucket}/${p.relativePath}`)).toEqual({
      pairName: "x_R?_y",
      read1: "/cache/b/x_R1_y.fastq.gz",
      read2: "/cache/b/x_R2_y.fastq.gz",
    });
  });
});
