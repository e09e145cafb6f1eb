import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';

import { API_CONFIG, type ApiConfig } from './config';
import { AppModule } from './modules/app.module';
import { getLogger } from './utils/logging';

const logger = getLogger();

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.setGlobalPrefix('v1');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true
    })
  );

  const { port } = app.get<ApiConfig>(API_CONFIG);
  await app.listen(port);
  logger.info({ port }, 'label sheet API listening');
}

bootstrap().catch((error) => {
  logger.error({ error }, 'failed to start label sheet API');
  process.exit(1);
});
