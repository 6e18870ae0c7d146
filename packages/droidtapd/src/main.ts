import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { errorMessage } from '@droidtap/shared';
import { AppModule } from './app.module';
import { DROIDTAP_CONFIG, DroidtapConfig } from './config/droidtap.config';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  try {
    logger.log('Starting droidtap daemon...');

    const app = await NestFactory.create(AppModule, { bufferLogs: true });
    app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    app.enableShutdownHooks();

    const config = app.get<DroidtapConfig>(DROIDTAP_CONFIG);
    const host = '0.0.0.0';
    await app.listen(config.port, host);

    logger.log('========================================');
    logger.log('  droidtap daemon is ready');
    logger.log('========================================');
    logger.log(`  HTTP Server: http://${host}:${config.port}`);
    logger.log(`  Resolve: POST http://localhost:${config.port}/resolver/tap`);
    logger.log(`  Vision model: ${config.visionModel} @ ${config.visionUrl}`);
    logger.log(`  Process ID: ${process.pid}`);
    logger.log('========================================');
  } catch (error) {
    logger.error(
      `Failed to start droidtap daemon: ${errorMessage(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    process.exit(1);
  }
}

void bootstrap();
