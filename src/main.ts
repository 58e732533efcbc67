import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { KitConfig } from './config/configuration';

const logger = new Logger('ClinicCdcApi');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Clinic CDC Demo Kit')
    .setDescription('Source provisioning, synthetic data, live activity and warehouse scripts')
    .setVersion('1.0')
    .addTag('source')
    .addTag('warehouse')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = app.get(ConfigService).get<KitConfig['port']>('port') ?? 3000;
  await app.listen(port);
  logger.log(`Listening on port ${port}; Swagger UI at /api`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start the API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
