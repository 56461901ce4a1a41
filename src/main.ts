import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { NestExpressApplication } from '@nestjs/platform-express';
import { json } from 'express';
import { AppModule } from './app.module';
import { AuditExceptionFilter } from './common/filters/audit-exception.filter';

const PORT = Number(process.env.PORT) || 3000;

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: true,
    logger: ['log', 'warn', 'error'],
  });

  app.useGlobalFilters(app.get(AuditExceptionFilter));
  // Backup documents run to tens of megabytes
  app.use(json({ limit: '100mb' }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip properties that don't have decorators
      forbidNonWhitelisted: true, // Throw error if non-whitelisted properties are present
      transform: true, // Automatically transform payloads to DTO instances
      transformOptions: {
        enableImplicitConversion: true, // Enable type conversion
      },
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Logbook Bridge')
    .setDescription('Logbook backup import, CSV export and image records')
    .setVersion('1.0')
    .addTag('logbook')
    .addTag('images')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('doc', app, document, {
    swaggerOptions: {
      defaultModelsExpandDepth: -1, // Hide schemas section
    },
  });

  await app.listen(PORT, '0.0.0.0');
}

bootstrap().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
