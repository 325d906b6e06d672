import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firestore_v1 } from 'googleapis';
import { DocumentFields, DocumentStoreClient, DocumentValue } from './document-store.client';

export const FIRESTORE_DOCUMENTS_API = Symbol('FIRESTORE_DOCUMENTS_API');

export type FirestoreDocumentsApi = Pick<firestore_v1.Resource$Projects$Databases$Documents, 'patch'>;

export function toFirestoreValue(value: DocumentValue): firestore_v1.Schema$Value {
  if (value === null) return { nullValue: 'NULL_VALUE' };
  if (value instanceof Date) return { timestampValue: value.toISOString() };
  if (typeof value === 'string') return { stringValue: value };
  if (typeof value === 'number') return { doubleValue: value };
  return { booleanValue: value };
}

export function toFirestoreFields(fields: DocumentFields): Record<string, firestore_v1.Schema$Value> {
  return Object.fromEntries(Object.entries(fields).map(([key, value]) => [key, toFirestoreValue(value)]));
}

@Injectable()
export class FirestoreDocumentStoreClient implements DocumentStoreClient {
  private readonly logger = new Logger(FirestoreDocumentStoreClient.name);
  private readonly databaseName: string;

  constructor(
    @Inject(FIRESTORE_DOCUMENTS_API) private readonly documents: FirestoreDocumentsApi,
    config: ConfigService,
  ) {
    const projectId = config.getOrThrow<string>('FIRESTORE_PROJECT_ID');
    const databaseId = config.get<string>('FIRESTORE_DATABASE_ID', '(default)');
    this.databaseName = `projects/${projectId}/databases/${databaseId}`;
  }

  // No updateMask: Firestore replaces the whole document.
  async write(documentPath: string, fields: DocumentFields): Promise<void> {
    const name = `${this.databaseName}/documents/${documentPath}`;
    await this.documents.patch({ name, requestBody: { fields: toFirestoreFields(fields) } });
    this.logger.debug(`Document written: ${name}`);
  }
}
