/**
 * Dental Clinic API - NestJS Backend Entry Point
 *
 * Configures and starts the NestJS application with:
 * - Swagger API documentation
 * - Helmet security headers
 * - JSON body limit sized for base64 images
 * - Global validation pipes
 * - CORS configuration
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, VersioningType } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { configureRequestPipeline } from './common/http/http-setup';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const config = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Security
  app.use(helmet());

  // CORS
  app.enableCors({
    origin: config.get<string[]>('app.corsOrigins', ['http://localhost:3000']),
    credentials: true,
  });

  // API Versioning
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  // Global prefix
  app.setGlobalPrefix('api');

  // Body parsing and validation
  configureRequestPipeline(app);

  // Swagger Documentation
  const swaggerConfig = new DocumentBuilder()
    .setTitle('Dental Clinic API')
    .setDescription(
      `
      Multi-tenant dental clinic management API.

      ## Authentication
      Obtain a token pair from \`POST /api/v1/auth/login\` and send the access
      token as a bearer token. Endpoints are authenticated unless marked public.

      ## Tenancy
      Every record belongs to a clinic. Users only see records of their own clinic.
    `,
    )
    .setVersion('1.0')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Enter the access token',
      },
      'jwt',
    )
    .addTag('health', 'Health check endpoints')
    .addTag('auth', 'Registration, login, tokens and profile')
    .addTag('clinics', 'Clinic management')
    .addTag('users', 'User management')
    .addTag('patients', 'Patient management')
    .addTag('treatments', 'Treatment records and images')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document);

  const port = config.get<number>('app.port', 4000);
  await app.listen(port);

  logger.log(`Dental Clinic Backend running on port ${port}`);
  logger.log(`API Documentation: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
