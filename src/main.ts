import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  // Webhook signatures need the raw body; configureApp installs the parsers.
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bodyParser: false });
  const config = app.get(ConfigService);

  configureApp(app, { bodyLimit: config.get<string>('WEBHOOK_BODY_LIMIT') ?? '25mb' });

  const swaggerPath = config.get<string>('SWAGGER_PATH') ?? 'docs';
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Git Contributions API')
      .setDescription('Push webhook ingestion and commit attribution for projects')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup(swaggerPath, app, document);

  const port = config.get<number>('PORT') ?? 3000;
  await app.listen(port);
  logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
