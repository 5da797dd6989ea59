import { InvalidPathError } from "./errors";

export const BUCKET_SCHEME = "s3://";

/**
 * An object location in a bucket. The relative path is the object key
 * and never starts with a slash.
 */
export class BucketPath {
  private constructor(
    readonly bucket: string,
    readonly relativePath: string
  ) {}

  static of(bucket: string, relativePath: string): BucketPath {
    if (relativePath.startsWith("/"))
      throw new InvalidPathError(`${BUCKET_SCHEME}${bucket}/${relativePath}`, BUCKET_SCHEME);

    return new BucketPath(bucket, relativePath);
  }

  /**
   * Parse a string like s3://bucket/some/key.bam
   *
   * @param value
   */
  static parse(value: string): BucketPath {
    if (!value.startsWith(BUCKET_SCHEME))
      throw new InvalidPathError(value, BUCKET_SCHEME);

    const parts = value.split("/");
    const bucket = parts[2] ?? "";

    if (!bucket) throw new InvalidPathError(value, BUCKET_SCHEME);

    return BucketPath.of(bucket, parts.slice(3).join("/"));
  }

  static compare(a: BucketPath, b: BucketPath): number {
    if (a.bucket !== b.bucket) return a.bucket < b.bucket ? -1 : 1;
    if (a.relativePath !== b.relativePath)
      return a.relativePath < b.relativePath ? -1 : 1;
    return 0;
  }

  equals(other: BucketPath): boolean {
    return BucketPath.compare(this, other) === 0;
  }

  /**
   * The enclosing "directory". A trailing slash is ignored, and a path
   * at the top of the bucket has the bucket root (an empty path) as parent.
   */
  parent(): BucketPath {
    const trimmed = this.relativePath.endsWith("/")
      ? this.relativePath.slice(0, -1)
      : this.relativePath;

    return new BucketPath(this.bucket, trimmed.split("/").slice(0, -1).join("/"));
  }

  withSuffix(suffix: string): BucketPath {
    return new BucketPath(this.bucket, this.relativePath + suffix);
  }

  /**
   * The last segment of the path.
   */
  fileName(): string {
    const parts = this.relativePath.split("/");
    return parts[parts.length - 1];
  }

  /**
   * The inverse of parse - with one exception: the bucket root prints without
   * a trailing slash, so "s3://b/" comes back as "s3://b" (and is then the
   * parent of "s3://b/x/").
   */
  toString(): string {
    if (!this.relativePath) return `${BUCKET_SCHEME}${this.bucket}`;

    return `${BUCKET_SCHEME}${this.bucket}/${this.relativePath}`;
  }
}
