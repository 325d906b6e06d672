import {
  BadRequestException,
  Body,
  Controller,
  HttpException,
  HttpStatus,
  Inject,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { UploadRecordingDto } from './dto/upload-recording.dto';
import {
  RecordingUploadError,
  RecordingUploadErrorKind,
  UrlResolutionFailedError,
} from './recording-upload.errors';
import { UPLOAD_COORDINATOR, UploadCoordinator } from './upload-coordinator';

const STATUS_BY_KIND: Record<RecordingUploadErrorKind, HttpStatus> = {
  LocalFileMissing: HttpStatus.NOT_FOUND,
  UploadFailed: HttpStatus.BAD_GATEWAY,
  UrlResolutionFailed: HttpStatus.BAD_GATEWAY,
  PersistenceFailed: HttpStatus.BAD_GATEWAY,
  BackendUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export function toHttpException(err: RecordingUploadError): HttpException {
  const body: Record<string, string> = { kind: err.kind, message: err.message };
  if (err instanceof UrlResolutionFailedError) body.storagePath = err.storagePath;
  return new HttpException(body, STATUS_BY_KIND[err.kind], { cause: err });
}

/** Resolves `requested` against `baseDir`; null when it points outside. */
export function resolveWithin(baseDir: string, requested: string): string | null {
  const target = path.resolve(baseDir, requested);
  const relative = path.relative(baseDir, target);
  if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

@Controller('recordings')
export class RecordingsController {
  private readonly recordingsDir: string;

  constructor(
    @Inject(UPLOAD_COORDINATOR) private readonly uploader: UploadCoordinator,
    config: ConfigService,
  ) {
    this.recordingsDir = path.resolve(process.cwd(), config.get<string>('RECORDINGS_DIR', 'recordings'));
  }

  @Post()
  async upload(@Body(ValidationPipe) dto: UploadRecordingDto): Promise<{ id: string }> {
    const localPath = resolveWithin(this.recordingsDir, dto.path);
    if (!localPath) {
      throw new BadRequestException(`path must point to a file inside ${this.recordingsDir}`);
    }

    try {
      const id = await this.uploader.uploadAndSave(localPath, dto.title, dto.duration, dto.userId);
      return { id };
    } catch (err) {
      if (err instanceof RecordingUploadError) throw toHttpException(err);
      throw err;
    }
  }
}
