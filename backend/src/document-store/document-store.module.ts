import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { google } from 'googleapis';
import { DocumentStoreDriver } from '../config/backend.config';
import { createGoogleAuth } from '../google/google-auth.factory';
import { DOCUMENT_STORE_CLIENT } from './document-store.client';
import { StoredDocument } from './entities/stored-document.entity';
import {
  FIRESTORE_DOCUMENTS_API,
  FirestoreDocumentsApi,
  FirestoreDocumentStoreClient,
} from './firestore-document-store.client';
import { PostgresDocumentStoreClient } from './postgres-document-store.client';

@Module({})
export class DocumentStoreModule {
  static forRoot(driver: DocumentStoreDriver): DynamicModule {
    if (driver === 'postgres') {
      return {
        module: DocumentStoreModule,
        imports: [
          TypeOrmModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (config: ConfigService) => {
              const useSsl = config.get('DB_SSL') === 'true';
              return {
                type: 'postgres',
                host: config.get('DB_HOST'),
                port: parseInt(config.get('DB_PORT', '5432'), 10),
                username: config.get('DB_USER'),
                password: config.get('DB_PASS'),
                database: config.get('DB_NAME'),
                entities: [StoredDocument],
                synchronize: config.get('DB_SYNCHRONIZE', 'true') === 'true',
                ssl: useSsl ? { rejectUnauthorized: false } : false,
              };
            },
          }),
          TypeOrmModule.forFeature([StoredDocument]),
        ],
        providers: [
          PostgresDocumentStoreClient,
          { provide: DOCUMENT_STORE_CLIENT, useExisting: PostgresDocumentStoreClient },
        ],
        exports: [DOCUMENT_STORE_CLIENT],
      };
    }

    const documentsApi: Provider = {
      provide: FIRESTORE_DOCUMENTS_API,
      inject: [ConfigService],
      useFactory: (config: ConfigService): FirestoreDocumentsApi => {
        const auth = createGoogleAuth(config, ['https://www.googleapis.com/auth/datastore']);
        return google.firestore({ version: 'v1', auth }).projects.databases.documents;
      },
    };
    return {
      module: DocumentStoreModule,
      imports: [ConfigModule],
      providers: [
        documentsApi,
        FirestoreDocumentStoreClient,
        { provide: DOCUMENT_STORE_CLIENT, useExisting: FirestoreDocumentStoreClient },
      ],
      exports: [DOCUMENT_STORE_CLIENT],
    };
  }
}
