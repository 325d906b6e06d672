import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { google } from 'googleapis';
import { createGoogleAuth } from '../google/google-auth.factory';
import { GCS_OBJECTS_API, GcsObjectsApi, GcsObjectStoreClient } from './gcs-object-store.client';
import { OBJECT_STORE_CLIENT } from './object-store.client';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: GCS_OBJECTS_API,
      inject: [ConfigService],
      useFactory: (config: ConfigService): GcsObjectsApi => {
        const auth = createGoogleAuth(config, ['https://www.googleapis.com/auth/devstorage.read_write']);
        return google.storage({ version: 'v1', auth }).objects;
      },
    },
    GcsObjectStoreClient,
    { provide: OBJECT_STORE_CLIENT, useExisting: GcsObjectStoreClient },
  ],
  exports: [OBJECT_STORE_CLIENT],
})
export class ObjectStoreModule {}
