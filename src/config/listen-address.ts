import { ConfigService } from '@nestjs/config';
import { EnvConfig } from './config.module';
import { RegistryConfig } from './interfaces/registry-config.interface';

export interface ListenAddress {
    host: string;
    port: number;
}

/**
 * HOST / PORT from the environment win over server.host / server.port.
 */
export function resolveListenAddress(config: RegistryConfig, env: ConfigService<EnvConfig, true>): ListenAddress {
    return {
        host: env.get('HOST', { infer: true }) ?? config.server.host,
        port: env.get('PORT', { infer: true }) ?? config.server.port,
    };
}
