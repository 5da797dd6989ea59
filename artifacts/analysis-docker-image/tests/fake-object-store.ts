import { existsSync } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { BucketPath } from "../lib/bucket-path";
import { ObjectStoreClient } from "../lib/object-store";
import { directoryPrefix, keyMatchesGlob } from "../lib/aws-object-store";
import { LocalFileMissingError, NotFoundError } from "../lib/errors";

/**
 * An object store held in memory - objects are keyed by their full s3:// url
 * and the calls made are recorded for the tests to inspect.
 */
export class FakeObjectStore implements ObjectStoreClient {
  readonly objects = new Map<string, string>();

  readonly downloads: string[] = [];
  readonly uploads: string[] = [];
  existsCalls = 0;
  listCalls = 0;

  // urls whose transfers (in either direction) will reject
  readonly failing = new Set<string>();

  constructor(objects: Record<string, string> = {}) {
    for (const [url, content] of Object.entries(objects)) this.objects.set(url, content);
  }

  async exists(path: BucketPath): Promise<boolean> {
    this.existsCalls++;

    return this.objects.has(path.toString());
  }

  async download(path: BucketPath, localPath: string): Promise<void> {
    const url = path.toString();

    this.downloads.push(url);

    if (this.failing.has(url)) throw new Error(`injected failure for ${url}`);

    const content = this.objects.get(url);

    if (content === undefined) throw new NotFoundError(url);

    await mkdir(dirname(localPath), { recursive: true });
    await writeFile(localPath, content);
  }

  async upload(localPath: string, path: BucketPath): Promise<void> {
    const url = path.toString();

    this.uploads.push(url);

    if (this.failing.has(url)) throw new Error(`injected failure for ${url}`);

    if (!existsSync(localPath)) throw new LocalFileMissingError(localPath);

    this.objects.set(url, await readFile(localPath, "utf8"));
  }

  async listChildren(directory: BucketPath): Promise<BucketPath[]> {
    this.listCalls++;

    const prefix = directoryPrefix(directory);

    return this.paths(directory.bucket).filter(
      (p) => p.relativePath.startsWith(prefix) && !p.relativePath.substring(prefix.length).includes("/")
    );
  }

  async matchGlob(pattern: BucketPath): Promise<BucketPath[]> {
    this.listCalls++;

    return this.paths(pattern.bucket).filter((p) =>
      keyMatchesGlob(p.relativePath, pattern.relativePath)
    );
  }

  private paths(bucket: string): BucketPath[] {
    return [...this.objects.keys()]
      .map((url) => BucketPath.parse(url))
      .filter((p) => p.bucket === bucket)
      .sort(BucketPath.compare);
  }
}
