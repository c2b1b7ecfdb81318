import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { configureApp } from './utils/configure-app';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = new Logger('Bootstrap');

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"], // Swagger UI
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
        },
      },
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
      },
    }),
  );

  app.enableShutdownHooks();
  configureApp(app);

  const enableSwagger = process.env.SWAGGER_ENABLED !== 'false';
  if (enableSwagger) {
    const options = new DocumentBuilder()
      .setTitle(configService.getOrThrow('app.name', { infer: true }))
      .setDescription('Travel request approval workflow')
      .setVersion('1.0')
      .addBearerAuth()
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
      },
    });

    logger.log(
      `Swagger documentation available at http://localhost:${configService.get('app.port', { infer: true })}/docs`,
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
