export type RecordingUploadErrorKind =
  | 'LocalFileMissing'
  | 'UploadFailed'
  | 'UrlResolutionFailed'
  | 'PersistenceFailed'
  | 'BackendUnavailable';

export abstract class RecordingUploadError extends Error {
  abstract readonly kind: RecordingUploadErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

const reasonOf = (cause: unknown) => (cause instanceof Error ? cause.message : String(cause));

export class LocalFileMissingError extends RecordingUploadError {
  readonly kind = 'LocalFileMissing';

  constructor(readonly localPath: string) {
    super(`Local file does not exist at path: ${localPath}`);
  }
}

export class UploadFailedError extends RecordingUploadError {
  readonly kind = 'UploadFailed';

  constructor(readonly storagePath: string, cause: unknown) {
    super(`Upload to ${storagePath} failed: ${reasonOf(cause)}`, cause);
  }
}

/** The bytes are stored at `storagePath`; only the download URL is missing. */
export class UrlResolutionFailedError extends RecordingUploadError {
  readonly kind = 'UrlResolutionFailed';

  constructor(readonly storagePath: string, cause: unknown) {
    super(
      `Upload succeeded but could not get download URL. The file is stored at: ${storagePath}. Error: ${reasonOf(cause)}`,
      cause,
    );
  }
}

export class PersistenceFailedError extends RecordingUploadError {
  readonly kind = 'PersistenceFailed';

  constructor(readonly documentPath: string, cause: unknown) {
    super(`Could not write recording metadata to ${documentPath}: ${reasonOf(cause)}`, cause);
  }
}

export class BackendUnavailableError extends RecordingUploadError {
  readonly kind = 'BackendUnavailable';

  constructor(reason: string) {
    super(`Recording backend unavailable: ${reason}`);
  }
}
