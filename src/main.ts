// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { EnvConfig, REGISTRY_CONFIG, RegistryConfig, resolveListenAddress } from './config';

async function bootstrap(): Promise<void> {
    // ConfigError / DataLoadError surface here; there is no partial start
    const app = await NestFactory.create(AppModule, { bufferLogs: true, abortOnError: false });

    // Use Pino logger
    const logger = app.get(Logger);
    app.useLogger(logger);

    const config = app.get<RegistryConfig>(REGISTRY_CONFIG);
    const env = app.get<ConfigService<EnvConfig, true>>(ConfigService);
    const { host, port } = resolveListenAddress(config, env);

    // Swagger API documentation
    const document = SwaggerModule.createDocument(
        app,
        new DocumentBuilder()
            .setTitle(config.agent.displayName)
            .setDescription(config.agent.description)
            .setVersion(config.agent.version)
            .addTag('registry', 'Registry search')
            .build(),
    );
    SwaggerModule.setup('api-docs', app, document);

    await app.listen(port, host);

    logger.log({
        msg: `${config.agent.displayName} v${config.agent.version} listening on http://${host}:${port}`,
        mode: env.get('SERVER_MODE', { infer: true }),
        metadataEndpoint: config.server.metadataEndpoint,
        searchableFields: config.fields.searchableFields,
        exposedFields: config.fields.exposedFields,
    });
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start registry search agent:', error instanceof Error ? error.message : error);
    process.exit(1);
});
