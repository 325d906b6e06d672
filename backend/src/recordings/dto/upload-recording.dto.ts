import { IsNotEmpty, IsNumber, IsString } from 'class-validator';

export class UploadRecordingDto {
  @IsString()
  @IsNotEmpty()
  path!: string; // relative to RECORDINGS_DIR

  @IsString()
  title!: string;

  // seconds; range is not checked
  @IsNumber()
  duration!: number;

  @IsString()
  @IsNotEmpty()
  userId!: string;
}
