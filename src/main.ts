import 'reflect-metadata';
import { json, urlencoded } from 'express';

// Nest Modules
import { Logger, ValidationPipe, RequestMethod } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import {
  DocumentBuilder,
  SwaggerCustomOptions,
  SwaggerModule,
} from '@nestjs/swagger';

// Third's Modules
import { WinstonModule } from 'nest-winston';
import * as luxon from 'luxon';
import * as winston from 'winston';
import helmet from 'helmet';

// App Module
import { AppModule } from './app.module';

/**
 *  Start the application
 */
async function bootstrap() {
  // Configurar Luxon para usar español como idioma predeterminado
  luxon.Settings.defaultLocale = 'es';

  // Logger
  const logger = new Logger('bootstrap');

  // App
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

  // Cors
  const corsOrigin =
    configService.get<string>('CORS_ORIGIN') ?? 'http://localhost:4200';
  const allowedOrigins = corsOrigin
    .split(',')
    .map((origin) => origin.trim());

  app.enableCors({
    origin: allowedOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-api-key', 'x-request-id'],
    exposedHeaders: ['Content-Type', 'x-request-id'],
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

  // Load data in request
  app.use(json({ limit: '1mb' }));
  app.use(urlencoded({ extended: true, limit: '1mb' }));

  // Metadata for Swagger
  const metaData = new DocumentBuilder()
    .setTitle('Family Supervision')
    .setDescription(
      'Emparejamiento de dispositivos, latidos y restricciones de apps para supervisión familiar',
    )
    .setVersion('0.0.1')
    .addServer(`http://127.0.0.1:${AppModule.port}`)
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        name: 'JWT',
        description: 'Enter JWT token',
        in: 'header',
      },
      'Bearer Token',
    )
    .addApiKey(
      {
        type: 'apiKey',
        name: 'x-api-key',
        in: 'header',
      },
      'x-api-key',
    )
    .build();

  // Swagger options
  const swaggerCustomOptions: SwaggerCustomOptions = {
    customSiteTitle: 'Family Supervision Endpoints',
    jsonDocumentUrl: 'swagger/json',
  };

  // Swagger document
  const document = SwaggerModule.createDocument(app, metaData);

  // Start swagger
  SwaggerModule.setup('swagger', app, document, swaggerCustomOptions);

  // Define port
  await app.listen(AppModule.port);

  // Start logs
  logger.log(
    `\n
       Family Supervision is running on: ${await app.getUrl()}.\n
        Docs 📑 running on: ${await app.getUrl()}/swagger/\n
        Health 💚 running on: ${await app.getUrl()}/health\n
        `,
  );

  // Manejar excepciones no manejadas
  process.on('uncaughtException', (err) => {
    logger.error(`Uncaught Exception: ${err.message}`, err.stack);
  });

  // Manejar promesas rechazadas no manejadas
  process.on('unhandledRejection', (reason) => {
    logger.error(
      `Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`,
    );
  });
}

bootstrap().catch((error: unknown) => {
  new Logger('bootstrap').error(
    `No se pudo iniciar la aplicación: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
