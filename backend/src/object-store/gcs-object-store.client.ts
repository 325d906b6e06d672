import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { storage_v1 } from 'googleapis';
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import { ObjectStoreClient, ObjectUploadResult } from './object-store.client';

export const GCS_OBJECTS_API = Symbol('GCS_OBJECTS_API');

export type GcsObjectsApi = Pick<storage_v1.Resource$Objects, 'insert' | 'get'>;

// Firebase clients read this metadata key to build public download links.
const DOWNLOAD_TOKENS_KEY = 'firebaseStorageDownloadTokens';

@Injectable()
export class GcsObjectStoreClient implements ObjectStoreClient {
  private readonly logger = new Logger(GcsObjectStoreClient.name);
  private readonly bucket: string;
  private readonly downloadBaseUrl: string;

  constructor(
    @Inject(GCS_OBJECTS_API) private readonly objects: GcsObjectsApi,
    config: ConfigService,
  ) {
    this.bucket = config.getOrThrow<string>('GCS_BUCKET');
    this.downloadBaseUrl = config
      .get<string>('STORAGE_DOWNLOAD_BASE_URL', 'https://firebasestorage.googleapis.com')
      .replace(/\/+$/, '');
  }

  async put(localPath: string, destinationPath: string, contentType: string): Promise<ObjectUploadResult> {
    const totalBytes = fs.statSync(localPath).size;
    const body = fs.createReadStream(localPath);
    let streamError: Error | undefined;
    body.on('error', (err) => {
      streamError = err;
      this.logger.warn(`Read of ${localPath} failed: ${err.message}`);
    });

    try {
      const res = await this.objects.insert(
        {
          bucket: this.bucket,
          name: destinationPath,
          requestBody: {
            name: destinationPath,
            contentType,
            metadata: { [DOWNLOAD_TOKENS_KEY]: randomUUID() },
          },
          media: { mimeType: contentType, body },
          fields: 'name,size',
        },
        {
          onUploadProgress: (evt: { bytesRead?: number }) => {
            if (!totalBytes || evt.bytesRead === undefined) return;
            const percent = Math.min(100, (100 * evt.bytesRead) / totalBytes);
            this.logger.debug(`Upload progress: ${percent.toFixed(1)}%`);
          },
        },
      );

      this.logger.debug(`Stored gs://${this.bucket}/${res.data.name ?? destinationPath}`);
      return {
        size: res.data.size == null ? undefined : Number(res.data.size),
        reportedPath: res.data.name ?? undefined,
      };
    } catch (err) {
      // A failed read surfaces as a rejected insert; report the read error.
      throw streamError ?? err;
    } finally {
      body.destroy();
    }
  }

  /** Token link when the object carries a download token, else its media link. */
  async resolveURL(storagePath: string): Promise<string> {
    const res = await this.objects.get({
      bucket: this.bucket,
      object: storagePath,
      fields: 'name,mediaLink,metadata',
    });

    const token = res.data.metadata?.[DOWNLOAD_TOKENS_KEY]?.split(',')[0]?.trim();
    if (token) {
      const object = encodeURIComponent(storagePath);
      return `${this.downloadBaseUrl}/v0/b/${this.bucket}/o/${object}?alt=media&token=${token}`;
    }
    if (res.data.mediaLink) return res.data.mediaLink;

    throw new Error(`No download URL available for gs://${this.bucket}/${storagePath}`);
  }
}
