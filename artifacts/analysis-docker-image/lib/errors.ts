/**
 * Base for every error raised by the analysis jobs. Anything of this type
 * is fatal to the job it happens in - but not to the jobs queued after it.
 */
export class AnalysisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidPathError extends AnalysisError {
  constructor(readonly value: string, expected: string) {
    super(`Path '${value}' is not a bucket path (expected it to start with '${expected}')`);
  }
}

export class NotFoundError extends AnalysisError {
  constructor(readonly path: string) {
    super(`Cannot download file that doesn't exist: '${path}'`);
  }
}

export class TransferError extends AnalysisError {
  constructor(readonly source: string, readonly destination: string, cause?: unknown) {
    super(
      `Transfer of '${source}' to '${destination}' has failed` +
        (cause === undefined ? "" : ` (${describeError(cause)})`),
      { cause }
    );
  }
}

export class LocalFileMissingError extends AnalysisError {
  constructor(readonly localPath: string) {
    super(`Cannot upload file that doesn't exist: '${localPath}'`);
  }
}

export class RemoteAlreadyExistsError extends AnalysisError {
  constructor(readonly path: string, readonly localPath: string) {
    super(
      `Cannot upload file '${localPath}' from local file cache since '${path}' already exists in the bucket`
    );
  }
}

export class NoInputsFoundError extends AnalysisError {
  constructor(readonly searched: string, what: string) {
    super(`Could not find ${what} matching '${searched}'`);
  }
}

export class AmbiguousReadMarkerError extends AnalysisError {
  constructor(readonly path: string, reason: string) {
    super(`The FASTQ file is not marked clearly as read 1 or read 2: '${path}' (${reason})`);
  }
}

export class UnbalancedPairError extends AnalysisError {
  constructor(
    readonly missingRead2: string[],
    readonly missingRead1: string[]
  ) {
    super(
      `Not all FASTQ files can be matched up in proper pairs of read 1 and read 2. ` +
        `Pairs without read 2: [${missingRead2.join(", ")}]. ` +
        `Pairs without read 1: [${missingRead1.join(", ")}]`
    );
  }
}

export class InvalidRecordGroupError extends AnalysisError {
  constructor(readonly recordGroupId: string, pattern: RegExp) {
    super(`Record group ID '${recordGroupId}' does not match the required regex '${pattern.source}'`);
  }
}

export class ExternalToolFailure extends AnalysisError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`Bash command failed: status=${exitCode ?? "unknown"}, command=${command}, errors=${stderr.trim()}`);
  }
}

export class InvalidArgumentsError extends AnalysisError {}

export type FailedTransfer = {
  path: string;
  error: unknown;
};

/**
 * Raised by a batch transfer once every task has finished and at least
 * one of them failed. Files that did transfer are left where they are.
 */
export class BatchTransferError extends AggregateError {
  constructor(
    readonly direction: "download" | "upload",
    readonly failures: FailedTransfer[],
    readonly attempted: number
  ) {
    super(
      failures.map((f) => f.error),
      `${failures.length} of ${attempted} ${direction}(s) failed: ${failures
        .map((f) => `'${f.path}' (${describeError(f.error)})`)
        .join(", ")}`
    );
    this.name = "BatchTransferError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
