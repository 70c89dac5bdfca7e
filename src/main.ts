import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);

  const port = configService.get<number>('PORT', 50060);
  await app.listen(port);
  logger.log(`Document chat service is running on http://localhost:${port}`);
}

void bootstrap();
