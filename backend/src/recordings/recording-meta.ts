import { DocumentFields } from '../document-store/document-store.client';

/** Metadata stored for one uploaded recording. */
export interface RecordingMeta {
  readonly id: string;
  readonly title: string;
  /** Seconds. */
  readonly duration: number;
  readonly createdAt: Date;
  readonly storagePath: string;
  readonly downloadURL: string;
  readonly userId: string;
}

export function createRecordingMeta(fields: RecordingMeta): RecordingMeta {
  return Object.freeze({ ...fields });
}

export function buildStoragePath(userId: string, name: string): string {
  return `recordings/${userId}/${name}`;
}

export function recordingDocumentPath(userId: string, recordingId: string): string {
  return `users/${userId}/recordings/${recordingId}`;
}

export function toDocumentFields(meta: RecordingMeta): DocumentFields {
  return {
    id: meta.id,
    title: meta.title,
    duration: meta.duration,
    createdAt: meta.createdAt,
    storagePath: meta.storagePath,
    downloadURL: meta.downloadURL,
    userId: meta.userId,
  };
}
