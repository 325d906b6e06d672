import { RecordingMeta } from './recording-meta';
import { BackendUnavailableError } from './recording-upload.errors';

export const UPLOAD_COORDINATOR = Symbol('UPLOAD_COORDINATOR');

export interface UploadOptions {
  /** Object name under the user's prefix; a UUID with the default extension when omitted. */
  name?: string;
  contentType?: string;
}

export interface StoredRecording {
  downloadURL: string;
  storagePath: string;
}

export interface UploadCoordinator {
  uploadToStorage(localPath: string, userId: string, options?: UploadOptions): Promise<StoredRecording>;
  saveMetadata(meta: RecordingMeta): Promise<string>;
  uploadAndSave(localPath: string, title: string, duration: number, userId: string): Promise<string>;
}

/** Stands in when storage is not configured; every call fails with BackendUnavailable. */
export class UnavailableUploadCoordinator implements UploadCoordinator {
  constructor(private readonly reason: string) { }

  async uploadToStorage(): Promise<StoredRecording> {
    throw new BackendUnavailableError(this.reason);
  }

  async saveMetadata(): Promise<string> {
    throw new BackendUnavailableError(this.reason);
  }

  async uploadAndSave(): Promise<string> {
    throw new BackendUnavailableError(this.reason);
  }
}
