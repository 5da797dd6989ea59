import { createReadStream, createWriteStream, existsSync } from "fs";
import { mkdir, rename, rm } from "fs/promises";
import { dirname } from "path";
import { pipeline } from "stream/promises";
import { Readable } from "stream";
import {
  _Object,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  ListObjectsV2CommandOutput,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import { minimatch } from "minimatch";
import { BucketPath } from "./bucket-path";
import { ObjectStoreClient } from "./object-store";
import {
  LocalFileMissingError,
  NotFoundError,
  TransferError,
} from "./errors";

const GLOB_METACHARACTERS = /[*?[]/;

export const PARTIAL_DOWNLOAD_SUFFIX = ".partial";

/**
 * The portion of a glob that is literal - which we can hand to S3 as a
 * listing prefix.
 *
 * @param pattern a key possibly containing glob characters
 */
export function globListingPrefix(pattern: string): string {
  const firstGlob = pattern.search(GLOB_METACHARACTERS);

  return firstGlob === -1 ? pattern : pattern.substring(0, firstGlob);
}

// object keys are flat strings - the "/" is swapped for a character minimatch
// does not treat as a path separator so that wildcards can span "folders"
const KEY_SEPARATOR_STANDIN = "\u001f";

/**
 * Glob matching of an object key where "*" and "?" match any character,
 * including "/". So "run/*.fastq.gz" matches "run/lane1/x.fastq.gz" as well as
 * "run/x.fastq.gz". Dot files are matched and there is no brace expansion.
 *
 * @param key the object key
 * @param pattern the glob pattern
 */
export function keyMatchesGlob(key: string, pattern: string): boolean {
  return minimatch(
    key.replaceAll("/", KEY_SEPARATOR_STANDIN),
    pattern.replaceAll("/", KEY_SEPARATOR_STANDIN),
    { dot: true, nobrace: true, noext: true, nonegate: true, nocomment: true }
  );
}

/**
 * The listing prefix for the contents of a "directory" - which is always
 * slash terminated (unless we are listing the top of the bucket).
 *
 * @param directory
 */
export function directoryPrefix(directory: BucketPath): string {
  const path = directory.relativePath;

  if (!path || path.endsWith("/")) return path;

  return `${path}/`;
}

function isNotFound(e: unknown): boolean {
  return (
    e instanceof S3ServiceException &&
    (e.name === "NotFound" ||
      e.name === "NoSuchKey" ||
      e.$metadata.httpStatusCode === 404)
  );
}

export class AwsObjectStore implements ObjectStoreClient {
  constructor(private readonly s3Client: S3Client = new S3Client({})) {}

  async exists(path: BucketPath): Promise<boolean> {
    try {
      await this.s3Client.send(
        new HeadObjectCommand({
          Bucket: path.bucket,
          Key: path.relativePath,
        })
      );

      return true;
    } catch (e) {
      // permission errors etc are real problems and not "doesn't exist"
      if (isNotFound(e)) return false;

      throw e;
    }
  }

  /**
   * The object is streamed to a ".partial" file beside the destination and only
   * renamed into place once complete - the local file cache treats any file at
   * the destination as a finished download.
   */
  async download(path: BucketPath, localPath: string): Promise<void> {
    console.log(`Starting download of '${path}' to '${localPath}'`);

    if (!(await this.exists(path))) throw new NotFoundError(path.toString());

    await mkdir(dirname(localPath), { recursive: true });

    const partialPath = `${localPath}${PARTIAL_DOWNLOAD_SUFFIX}`;

    console.time(`S3 Download ${path}`);

    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: path.bucket,
          Key: path.relativePath,
        })
      );

      if (!(response.Body instanceof Readable))
        throw new Error("response body is not a stream");

      await pipeline(response.Body, createWriteStream(partialPath));
      await rename(partialPath, localPath);
    } catch (e) {
      await rm(partialPath, { force: true });

      throw new TransferError(path.toString(), localPath, e);
    } finally {
      console.timeEnd(`S3 Download ${path}`);
    }

    if (!existsSync(localPath))
      throw new TransferError(path.toString(), localPath);

    console.log(`Finished download of '${path}' to '${localPath}'`);
  }

  /**
   * Uploads in parts (through lib-storage) so that objects over the 5GB single
   * PUT limit - merged BAMs - can be stored.
   */
  async upload(localPath: string, path: BucketPath): Promise<void> {
    console.log(`Starting upload of '${localPath}' to '${path}'`);

    if (!existsSync(localPath)) throw new LocalFileMissingError(localPath);

    console.time(`S3 Upload ${path}`);

    try {
      await new Upload({
        client: this.s3Client,
        params: {
          Bucket: path.bucket,
          Key: path.relativePath,
          Body: createReadStream(localPath),
        },
      }).done();
    } finally {
      console.timeEnd(`S3 Upload ${path}`);
    }

    if (!(await this.exists(path)))
      throw new TransferError(localPath, path.toString());

    console.log(`Finished upload of '${localPath}' to '${path}'`);
  }

  async listChildren(directory: BucketPath): Promise<BucketPath[]> {
    const children: BucketPath[] = [];

    for await (const s3Object of this.listObjects(
      directory.bucket,
      directoryPrefix(directory),
      "/"
    )) {
      if (s3Object.Key) children.push(BucketPath.of(directory.bucket, s3Object.Key));
    }

    return children;
  }

  async matchGlob(pattern: BucketPath): Promise<BucketPath[]> {
    const matching: BucketPath[] = [];

    for await (const s3Object of this.listObjects(
      pattern.bucket,
      globListingPrefix(pattern.relativePath)
    )) {
      if (s3Object.Key && keyMatchesGlob(s3Object.Key, pattern.relativePath))
        matching.push(BucketPath.of(pattern.bucket, s3Object.Key));
    }

    return matching;
  }

  /**
   * Converts the paged output of ListObjectsV2 into an async stream of
   * objects, leaving out any "directory entries".
   *
   * @param bucketName the bucket to list files from
   * @param prefix the prefix key to restrict the list to
   * @param delimiter when "/" only the objects directly under the prefix are returned
   */
  private async *listObjects(
    bucketName: string,
    prefix: string,
    delimiter?: string
  ): AsyncGenerator<_Object> {
    let contToken: string | undefined = undefined;

    do {
      const data: ListObjectsV2CommandOutput = await this.s3Client.send(
        new ListObjectsV2Command({
          Bucket: bucketName,
          Prefix: prefix,
          Delimiter: delimiter,
          ContinuationToken: contToken,
        })
      );

      contToken = data.NextContinuationToken;

      for (const file of data.Contents ?? []) {
        if (file.Key && file.Key.endsWith("/")) continue;

        yield file;
      }
    } while (contToken);
  }
}
