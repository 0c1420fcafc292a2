import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { configureApp, GLOBAL_PREFIX } from './app.setup';
import { SERVICE_NAME, SERVICE_VERSION } from './modules/exchange/controllers/exchange.controller';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // Enable graceful shutdown hooks (SIGTERM, SIGINT)
  app.enableShutdownHooks();

  configureApp(app);

  if (process.env.NODE_ENV !== 'production' || process.env.ENABLE_SWAGGER === 'true') {
    const config = new DocumentBuilder()
      .setTitle(SERVICE_NAME)
      .setDescription('Currency conversion backed by a cached external rate provider')
      .setVersion(SERVICE_VERSION)
      .addTag('Exchange', 'Conversions, supported currencies and cache administration')
      .addTag('Metrics', 'Prometheus exposition')
      .addTag('Health', 'Liveness and readiness')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document);
  }

  const port = process.env.PORT || 3000;
  await app.listen(port);

  new Logger('Bootstrap').log(`${SERVICE_NAME} listening on http://localhost:${port}/${GLOBAL_PREFIX}`);
}
void bootstrap();
