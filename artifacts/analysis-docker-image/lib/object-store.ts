import { BucketPath } from "./bucket-path";

/**
 * The object storage operations the jobs rely on. Implementations are
 * expected to be thin wrappers over a storage SDK - no retries, no caching.
 */
export interface ObjectStoreClient {
  exists(path: BucketPath): Promise<boolean>;

  /**
   * Fetch an object to a local file, creating parent directories as needed.
   * Throws NotFoundError if the object is missing and TransferError if no
   * local file resulted.
   */
  download(path: BucketPath, localPath: string): Promise<void>;

  /**
   * Store a local file as an object (overwriting). Throws LocalFileMissingError
   * if there is no local file and TransferError if the object cannot be seen
   * afterwards.
   */
  upload(localPath: string, path: BucketPath): Promise<void>;

  /**
   * The objects directly inside a "directory" - not recursive.
   */
  listChildren(directory: BucketPath): Promise<BucketPath[]>;

  /**
   * The objects whose keys match a shell glob held in the relative path
   * of the pattern. Empty when nothing matches.
   */
  matchGlob(pattern: BucketPath): Promise<BucketPath[]>;
}
