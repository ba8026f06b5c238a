import 'reflect-metadata';
import 'dotenv/config';

// Nest Modules
import { Logger, RequestMethod, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import {
  DocumentBuilder,
  SwaggerCustomOptions,
  SwaggerModule,
} from '@nestjs/swagger';

// Third's Modules
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import helmet from 'helmet';

// App Module
import { AppModule } from './app.module';

const DEFAULT_PORT = 9053;

/**
 *  Start the application
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('bootstrap');

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: WinstonModule.createLogger({
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize({ all: true }),
            winston.format.timestamp({
              format: 'YYYY-MM-DD hh:mm:ss.SSS A',
            }),
            winston.format.align(),
            winston.format.printf((info) => {
              const context =
                typeof info.context === 'string' && info.context
                  ? `[${info.context}] `
                  : '';
              const timestamp =
                typeof info.timestamp === 'string' ? info.timestamp : '';
              const message =
                typeof info.message === 'string'
                  ? info.message
                  : JSON.stringify(info.message);
              return `[${timestamp}] ${info.level}: ${context}${message}`;
            }),
          ),
        }),
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
        }),
        new winston.transports.File({ filename: 'logs/combined.log' }),
      ],
    }),
    bufferLogs: true,
  });

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT') ?? DEFAULT_PORT;

  // Cors
  const allowedOrigins = (configService.get<string>('CORS_ORIGIN') ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  app.enableCors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-request-id'],
    exposedHeaders: ['x-request-id'],
    optionsSuccessStatus: 200,
    maxAge: 86400, // 24 horas de cache en preflight
  });

  // Global configuration
  app.setGlobalPrefix('api', {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });

  // Global pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: false,
      },
    }),
  );

  // Securities modules
  app.use(helmet());

  // Metadata for Swagger
  const metaData = new DocumentBuilder()
    .setTitle('BookVault API')
    .setDescription('Catálogo, compras y descargas de libros electrónicos')
    .setVersion('0.1.0')
    .addServer(`http://127.0.0.1:${port}`)
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Access token obtenido en /api/auth/login',
        in: 'header',
      },
      'access-token',
    )
    .build();

  const swaggerCustomOptions: SwaggerCustomOptions = {
    customSiteTitle: 'BookVault Endpoints',
    jsonDocumentUrl: 'swagger/json',
  };

  const document = SwaggerModule.createDocument(app, metaData);
  SwaggerModule.setup('swagger', app, document, swaggerCustomOptions);

  await app.listen(port);

  logger.log(
    `\n
       BookVault is running on: ${await app.getUrl()}.\n
        Docs 📑 running on: ${await app.getUrl()}/swagger/\n
        Health 💚 running on: ${await app.getUrl()}/health\n
        `,
  );

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${String(reason)}`);
  });
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  new Logger('bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});
