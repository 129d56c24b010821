import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { resolveStorageBackend } from './config/configuration';
import { RedisModule } from './redis';
import { StorageModule } from './storage/storage.module';
import { IngestModule } from './ingest/ingest.module';

// ConfigModule.forRoot has loaded .env into process.env by the time the
// next entry is evaluated.
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    RedisModule,
    StorageModule.register(resolveStorageBackend(process.env.STORAGE_BACKEND)),
    IngestModule,
  ],
})
export class AppModule {}
