import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const log = new Logger('Bootstrap');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // drops fields not declared in DTOs
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Runs onModuleDestroy, which closes the active store.
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  const port = Number(cfg.get<string>('PORT') ?? 8080);
  await app.listen(port, '0.0.0.0');
  log.log(`Chat store bridge listening on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    `Startup failed: ${err instanceof Error ? err.message : String(err)}`,
  );
  process.exit(1);
});
