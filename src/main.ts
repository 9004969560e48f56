import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  // Signature verification needs the exact bytes received
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Hookwarden')
    .setDescription(
      'Receives signed webhook deliveries, verifies them, and runs each event handler at most once.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive signed deliveries and inspect processing records')
    .addTag('Health', 'Liveness and statistics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 4010;
  await app.listen(port);
  logger.log(`Hookwarden is running on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(`Failed to start: ${err.message}`, err.stack);
  process.exit(1);
});
