import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DocumentFields, DocumentStoreClient } from './document-store.client';
import { StoredDocument, StoredFieldValue } from './entities/stored-document.entity';

/** Dates become ISO strings so they survive the jsonb round trip. */
export function toStoredFields(fields: DocumentFields): Record<string, StoredFieldValue> {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]) => [key, value instanceof Date ? value.toISOString() : value]),
  );
}

@Injectable()
export class PostgresDocumentStoreClient implements DocumentStoreClient {
  private readonly logger = new Logger(PostgresDocumentStoreClient.name);

  constructor(
    @InjectRepository(StoredDocument)
    private readonly docRepo: Repository<StoredDocument>,
  ) { }

  async write(documentPath: string, fields: DocumentFields): Promise<void> {
    await this.docRepo.upsert({ path: documentPath, fields: toStoredFields(fields) }, ['path']);
    this.logger.debug(`Document written: ${documentPath}`);
  }
}
