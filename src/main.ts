import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { readNumber, readString } from './config/config.utils';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);
  const port = readNumber(configService, 'PORT', 3000);

  app.enableShutdownHooks();
  app.enableCors({
    origin: readString(configService, 'CORS_ORIGIN', '*'),
    credentials: true,
  });

  await app.listen(port);
  logger.log(`Session engine is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
