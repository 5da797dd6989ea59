import { existsSync } from "fs";
import { join } from "path";
import pMap from "p-map";
import { BucketPath } from "./bucket-path";
import { ObjectStoreClient } from "./object-store";
import {
  BatchTransferError,
  describeError,
  FailedTransfer,
  RemoteAlreadyExistsError,
} from "./errors";

export type TransferStatus = "SKIP" | "SUCCESS";

export type LocalFileCacheOptions = {
  // the maximum number of transfers in flight in any one batch (default is no limit)
  maxConcurrentTransfers?: number;
};

/**
 * Local cache of bucket files that mirrors the file structure in the buckets.
 *
 * The same object always gets the same local path (<root>/<bucket>/<key>)
 * which avoids name clashes and means that a file already on disk can be
 * trusted as a cached copy. Nothing is ever evicted. Uploads are write-once -
 * the cache refuses to replace an object that already exists in the bucket.
 */
export class LocalFileCache {
  private readonly concurrency: number;

  constructor(
    readonly localDirectory: string,
    private readonly store: ObjectStoreClient,
    options: LocalFileCacheOptions = {}
  ) {
    this.concurrency = options.maxConcurrentTransfers ?? Infinity;
  }

  localPathFor(path: BucketPath): string {
    return join(this.localDirectory, path.bucket, path.relativePath);
  }

  async downloadOne(path: BucketPath): Promise<TransferStatus> {
    const localPath = this.localPathFor(path);

    if (existsSync(localPath)) {
      console.log(
        `Skipping download of '${path}' since it is already in the local file cache`
      );
      return "SKIP";
    }

    await this.store.download(path, localPath);

    return "SUCCESS";
  }

  async uploadOne(path: BucketPath): Promise<TransferStatus> {
    const localPath = this.localPathFor(path);

    if (await this.store.exists(path))
      throw new RemoteAlreadyExistsError(path.toString(), localPath);

    await this.store.upload(localPath, path);

    return "SUCCESS";
  }

  async downloadMany(paths: BucketPath[]): Promise<void> {
    await this.transferMany("download", paths, (p) => this.downloadOne(p));
  }

  async uploadMany(paths: BucketPath[]): Promise<void> {
    await this.transferMany("upload", paths, (p) => this.uploadOne(p));
  }

  /**
   * Run one transfer per distinct path concurrently and wait for all of them
   * to settle. A failure does not stop the others - they all get their go
   * and only then is the batch reported as failed.
   */
  private async transferMany(
    direction: "download" | "upload",
    paths: BucketPath[],
    transfer: (path: BucketPath) => Promise<TransferStatus>
  ): Promise<void> {
    const distinct = uniqueSorted(paths);
    const failures: FailedTransfer[] = [];

    await pMap(
      distinct,
      async (path) => {
        console.log(`Submitting ${direction} of '${path}'`);

        try {
          const result = await transfer(path);

          console.log(`Finished ${direction} of '${path}' with result '${result}'`);
        } catch (e) {
          console.error(`Failed ${direction} of '${path}': ${describeError(e)}`);

          failures.push({ path: path.toString(), error: e });
        }
      },
      { concurrency: this.concurrency }
    );

    if (failures.length > 0) {
      // completion order is arbitrary so report in path order
      failures.sort((a, b) => a.path.localeCompare(b.path));

      throw new BatchTransferError(direction, failures, distinct.length);
    }
  }
}

function uniqueSorted(paths: BucketPath[]): BucketPath[] {
  const sorted = [...paths].sort(BucketPath.compare);

  return sorted.filter((p, i) => i === 0 || !p.equals(sorted[i - 1]));
}
