import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
    { bufferLogs: true },
  );

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));

  // CORS for the journal dashboard
  app.enableCors({
    origin: process.env.DASHBOARD_ORIGIN || 'http://localhost:3000',
  });

  app.setGlobalPrefix('api');

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Trading Journal')
    .setDescription('Pre-trade risk checks and trade journaling')
    .setVersion('1.0')
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  // Bind to 0.0.0.0 outside production (required for Docker container networking)
  const host = process.env.NODE_ENV === 'production' ? '127.0.0.1' : '0.0.0.0';
  const port = process.env.PORT || 8080;

  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`Application is running on: http://${host}:${port}`);
}

void bootstrap();
