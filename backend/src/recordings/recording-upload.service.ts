import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import { DOCUMENT_STORE_CLIENT, DocumentStoreClient } from '../document-store/document-store.client';
import { OBJECT_STORE_CLIENT, ObjectStoreClient } from '../object-store/object-store.client';
import {
  buildStoragePath,
  createRecordingMeta,
  RecordingMeta,
  recordingDocumentPath,
  toDocumentFields,
} from './recording-meta';
import {
  LocalFileMissingError,
  PersistenceFailedError,
  UploadFailedError,
  UrlResolutionFailedError,
} from './recording-upload.errors';
import { StoredRecording, UploadCoordinator, UploadOptions } from './upload-coordinator';

@Injectable()
export class RecordingUploadService implements UploadCoordinator {
  private readonly logger = new Logger(RecordingUploadService.name);
  private readonly defaultContentType: string;
  private readonly fileExtension: string;

  constructor(
    @Inject(OBJECT_STORE_CLIENT) private readonly objectStore: ObjectStoreClient,
    @Inject(DOCUMENT_STORE_CLIENT) private readonly documentStore: DocumentStoreClient,
    config: ConfigService,
  ) {
    this.defaultContentType = config.get<string>('RECORDING_CONTENT_TYPE', 'audio/m4a');
    this.fileExtension = config.get<string>('RECORDING_FILE_EXTENSION', '.m4a');
  }

  /**
   * Uploads a local audio file under `recordings/{userId}/` and returns its
   * download URL together with the storage path.
   */
  async uploadToStorage(localPath: string, userId: string, options: UploadOptions = {}): Promise<StoredRecording> {
    if (!fs.existsSync(localPath)) {
      throw new LocalFileMissingError(localPath);
    }

    const name = options.name ?? `${randomUUID()}${this.fileExtension}`;
    const storagePath = buildStoragePath(userId, name);
    const contentType = options.contentType ?? this.defaultContentType;

    this.logger.log(`Starting upload to: ${storagePath}`);
    let reportedPath: string | undefined;
    try {
      const upload = await this.objectStore.put(localPath, storagePath, contentType);
      reportedPath = upload.reportedPath;
      this.logger.log(
        upload.size === undefined
          ? 'Upload completed successfully'
          : `Upload completed successfully. Size: ${upload.size} bytes`,
      );
    } catch (err) {
      this.logger.error(`Upload to ${storagePath} failed: ${err instanceof Error ? err.message : err}`);
      throw new UploadFailedError(storagePath, err);
    }

    const downloadURL = await this.resolveDownloadURL(storagePath, reportedPath);
    this.logger.log(`Download URL obtained: ${downloadURL}`);
    return { downloadURL, storagePath };
  }

  /** Writes `meta` to users/{userId}/recordings/{id}, replacing any earlier version. */
  async saveMetadata(meta: RecordingMeta): Promise<string> {
    const documentPath = recordingDocumentPath(meta.userId, meta.id);
    try {
      await this.documentStore.write(documentPath, toDocumentFields(meta));
    } catch (err) {
      this.logger.error(`Metadata write to ${documentPath} failed: ${err instanceof Error ? err.message : err}`);
      throw new PersistenceFailedError(documentPath, err);
    }
    return meta.id;
  }

  /**
   * Uploads the file and writes its metadata. Not atomic: a failed write
   * leaves the uploaded object without a document.
   */
  async uploadAndSave(localPath: string, title: string, duration: number, userId: string): Promise<string> {
    const id = randomUUID();
    const createdAt = new Date();
    const { downloadURL, storagePath } = await this.uploadToStorage(localPath, userId);
    const meta = createRecordingMeta({ id, title, duration, createdAt, storagePath, downloadURL, userId });
    return this.saveMetadata(meta);
  }

  // Reported path first, then the path we asked for.
  private async resolveDownloadURL(storagePath: string, reportedPath?: string): Promise<string> {
    if (reportedPath) {
      try {
        return await this.resolveNonEmpty(reportedPath);
      } catch (err) {
        this.logger.warn(
          `Failed to get download URL from reported path ${reportedPath}: ${err instanceof Error ? err.message : err}`,
        );
      }
    }

    try {
      return await this.resolveNonEmpty(storagePath);
    } catch (err) {
      this.logger.error(`Failed to get download URL for ${storagePath}: ${err instanceof Error ? err.message : err}`);
      throw new UrlResolutionFailedError(storagePath, err);
    }
  }

  private async resolveNonEmpty(path: string): Promise<string> {
    const url = await this.objectStore.resolveURL(path);
    if (!url) throw new Error('Missing download URL');
    return url;
  }
}
