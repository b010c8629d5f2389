import { Global, Module, ValidationPipe } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import fastifyMultipart from '@fastify/multipart';
import type { Database } from '@crewdesk/db';
import { ApiModule } from '../../api/api.module';
import { HealthModule } from '../../health/health.module';
import { AuthorizationModule } from '../../authorization/authorization.module';
import { JwtAuthGuard } from '../../api/guards/jwt-auth.guard';
import { DRIZZLE } from '../../providers/drizzle.provider';
import { AUTH_CONFIG, type AuthConfig } from '../../providers/auth-config.provider';
import { BLOB_STORAGE } from '../../providers/blob-storage.provider';
import type { BlobStorage } from '../../documents/blob-storage.interface';
import { UPLOAD_MAX_FILE_SIZE_BYTES } from '../../constants';

export const TEST_AUTH_CONFIG: AuthConfig = {
  jwtSecret: 'test-secret',
  accessTokenTtlSeconds: 30 * 60,
};

/** Records every blob instead of writing it anywhere. */
export class InMemoryBlobStorage implements BlobStorage {
  readonly blobs = new Map<string, { body: Buffer; contentType: string }>();

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    this.blobs.set(key, { body, contentType });
    return `https://files.test/${key}`;
  }
}

/** Stands in for DatabaseModule; tests swap the real database in through `overrideProvider`. */
@Global()
@Module({
  providers: [{ provide: DRIZZLE, useValue: null }],
  exports: [DRIZZLE],
})
class TestDatabaseModule {}

/**
 * Boots the HTTP stack on Fastify against the given database, without
 * listening on a port. Requests go through `app.inject()`.
 */
export async function createTestApp(
  db: Database,
  storage: BlobStorage = new InMemoryBlobStorage(),
): Promise<NestFastifyApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [TestDatabaseModule, AuthorizationModule, ApiModule, HealthModule],
    providers: [{ provide: APP_GUARD, useClass: JwtAuthGuard }],
  })
    .overrideProvider(DRIZZLE)
    .useValue(db)
    .overrideProvider(AUTH_CONFIG)
    .useValue(TEST_AUTH_CONFIG)
    .overrideProvider(BLOB_STORAGE)
    .useValue(storage)
    .compile();

  const app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), { logger: false });
  await app.register(fastifyMultipart, { limits: { fileSize: UPLOAD_MAX_FILE_SIZE_BYTES, files: 1 } });
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    transform: true,
    transformOptions: { enableImplicitConversion: true },
  }));
  await app.init();
  await app.getHttpAdapter().getInstance().ready();
  return app;
}
