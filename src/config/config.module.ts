import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { loadRegistryConfig } from './registry-config.loader';
import { DEFAULT_REGISTRY_CONFIG_PATH, REGISTRY_CONFIG } from './registry-config.constants';
import { RegistryConfig } from './interfaces/registry-config.interface';

// Zod schema for environment validation
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Registry document
    REGISTRY_CONFIG_PATH: z.string().min(1).default(DEFAULT_REGISTRY_CONFIG_PATH),

    // Listener overrides (take precedence over server.host / server.port)
    HOST: z.string().min(1).optional(),
    PORT: z.coerce.number().int().min(1).max(65535).optional(),

    // 'simple' answers with the bare envelope, 'compliant' wraps it in a message
    SERVER_MODE: z.enum(['simple', 'compliant']).default('simple'),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type ServerMode = EnvConfig['SERVER_MODE'];

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: (config) => {
                const result = envSchema.safeParse(config);
                if (!result.success) {
                    console.error('Invalid environment configuration:');
                    console.error(result.error.format());
                    throw new Error('Invalid environment configuration');
                }
                return result.data;
            },
        }),
    ],
    providers: [
        {
            provide: REGISTRY_CONFIG,
            inject: [ConfigService],
            useFactory: (config: ConfigService<EnvConfig, true>): RegistryConfig =>
                loadRegistryConfig(config.get('REGISTRY_CONFIG_PATH', { infer: true })),
        },
    ],
    exports: [NestConfigModule, REGISTRY_CONFIG],
})
export class ConfigModule { }
