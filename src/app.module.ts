/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, and feature modules.
 */

import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule } from './config';
import { AgentModule } from './agent';

const nodeEnv = process.env.NODE_ENV ?? 'development';

function logLevel(): string {
    if (process.env.LOG_LEVEL) {
        return process.env.LOG_LEVEL;
    }
    if (nodeEnv === 'test') {
        return 'silent';
    }
    return nodeEnv === 'production' ? 'info' : 'debug';
}

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: logLevel(),
                transport: nodeEnv === 'development'
                    ? {
                        target: 'pino-pretty',
                        options: { colorize: true },
                    }
                    : undefined, // JSON lines everywhere else
                redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: nodeEnv !== 'test' },
        }),

        // Shared modules
        ConfigModule,

        // Feature modules
        AgentModule,
    ],
})
export class AppModule { }
