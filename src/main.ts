import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Power Telemetry Recorder API')
    .setDescription(
      'Power telemetry, battery state and runtime estimates for edge-device power meters',
    )
    .setVersion('1.0')
    .addTag('Devices', 'Device registration, events, runtime and reports')
    .addTag('Meters', 'Meter state, wattage and reading history')
    .addTag('Ingestion', 'Power reading ingestion')
    .addTag('Analytics', 'Multi-device power budget')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`   API Documentation: http://localhost:${port}/api/docs`);
  logger.log(`   Database: ${process.env.DB_PATH ?? 'power_manager.db'}`);
}

bootstrap().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(`Failed to start: ${err.message}`, err.stack);
  process.exit(1);
});
