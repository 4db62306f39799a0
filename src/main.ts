import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';

async function bootstrap() {
  // Webhook bodies arrive as text so malformed JSON reaches the parser
  // instead of being rejected with 400 by the JSON body parser.
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    bodyParser: false,
  });
  const configService = app.get(ConfigService);
  app.useBodyParser('text', {
    type: '*/*',
    limit: configService.getOrThrow<string>('webhook.bodyLimit'),
  });

  // Use pino logger for all NestJS logs
  app.useLogger(app.get(PinoLogger));

  const logger = new Logger('Bootstrap');

  // Enable graceful shutdown
  app.enableShutdownHooks();

  const port = configService.get<number>('port', 8080);
  await app.listen(port);

  logger.log(`Webhook server listening on port ${port}`);
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error('Failed to start application', error);
  process.exit(1);
});
