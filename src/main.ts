import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { EnvironmentVariables } from './config/env.validation';

const logger = new Logger('Bootstrap');

async function bootstrap() {
    const app = await NestFactory.create(AppModule, {
        logger: ['error', 'warn', 'debug', 'log', 'verbose'],
        bufferLogs: true,
    });

    app.setGlobalPrefix('api');
    app.enableShutdownHooks();

    const configService = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
    const port = configService.get('PORT', { infer: true });
    const host = '0.0.0.0';

    await app.listen(port, host);
    logger.log(`Application is listening on: ${await app.getUrl()}`);
    logger.debug('Debug logging is enabled');
}

bootstrap().catch((error: unknown) => {
    logger.error(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
