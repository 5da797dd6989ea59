import { S3Client } from "@aws-sdk/client-s3";
import { AwsObjectStore } from "./aws-object-store";
import { Settings } from "./env";
import { LocalFileCache } from "./local-file-cache";
import { ObjectStoreClient } from "./object-store";
import { BashToolRunner, ToolRunner } from "./tool-runner";

/**
 * Everything a job needs from the outside world - built once at process start
 * and handed to each job in turn.
 */
export type JobServices = {
  store: ObjectStoreClient;
  cache: LocalFileCache;
  tools: ToolRunner;
  // scratch space for intermediate files (only one job may use it at a time)
  localWorkingDirectory: string;
};

export function createJobServices(
  settings: Settings,
  s3Client: S3Client = new S3Client({})
): JobServices {
  const store = new AwsObjectStore(s3Client);

  return {
    store,
    cache: new LocalFileCache(settings.localFileCacheDirectory, store, {
      maxConcurrentTransfers: settings.maxConcurrentTransfers,
    }),
    tools: new BashToolRunner(settings.tools),
    localWorkingDirectory: settings.localWorkingDirectory,
  };
}
