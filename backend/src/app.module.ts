import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RecordingsModule } from './recordings/recordings.module';

@Module({
  imports: [
    // Loads .env into process.env before RecordingsModule.forRoot() inspects it.
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    RecordingsModule.forRoot(),
  ],
})
export class AppModule { }
