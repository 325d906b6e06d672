import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { inspectBackendConfig } from '../config/backend.config';
import { DocumentStoreModule } from '../document-store/document-store.module';
import { ObjectStoreModule } from '../object-store/object-store.module';
import { RecordingUploadService } from './recording-upload.service';
import { RecordingsController } from './recordings.controller';
import { UnavailableUploadCoordinator, UPLOAD_COORDINATOR } from './upload-coordinator';

@Module({})
export class RecordingsModule {
  /**
   * Wires the storage-backed coordinator, or the unavailable one when the
   * backend settings in `env` are incomplete.
   */
  static forRoot(env: Record<string, string | undefined> = process.env): DynamicModule {
    const backend = inspectBackendConfig(env);
    if (!backend.ready) {
      const reason = backend.problems.join('; ');
      new Logger(RecordingsModule.name).warn(`Recording backend disabled: ${reason}`);
      return {
        module: RecordingsModule,
        imports: [ConfigModule],
        controllers: [RecordingsController],
        providers: [{ provide: UPLOAD_COORDINATOR, useValue: new UnavailableUploadCoordinator(reason) }],
        exports: [UPLOAD_COORDINATOR],
      };
    }

    return {
      module: RecordingsModule,
      imports: [ConfigModule, ObjectStoreModule, DocumentStoreModule.forRoot(backend.documentStore)],
      controllers: [RecordingsController],
      providers: [RecordingUploadService, { provide: UPLOAD_COORDINATOR, useExisting: RecordingUploadService }],
      exports: [UPLOAD_COORDINATOR],
    };
  }
}
