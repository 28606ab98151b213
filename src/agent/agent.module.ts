import { Inject, MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvConfig, REGISTRY_CONFIG, RegistryConfig, resolveListenAddress } from '../config';
import { SearchModule } from '../search';
import { AgentController } from './agent.controller';
import { AGENT_CARD, AgentCardMiddleware } from './agent-card.middleware';
import { buildAgentCard } from './agent-card.factory';
import { AgentCard } from './interfaces';

@Module({
    imports: [SearchModule],
    controllers: [AgentController],
    providers: [
        {
            provide: AGENT_CARD,
            inject: [REGISTRY_CONFIG, ConfigService],
            useFactory: (config: RegistryConfig, env: ConfigService<EnvConfig, true>): AgentCard =>
                buildAgentCard(config, resolveListenAddress(config, env)),
        },
    ],
})
export class AgentModule implements NestModule {
    constructor(@Inject(REGISTRY_CONFIG) private readonly config: RegistryConfig) { }

    configure(consumer: MiddlewareConsumer): void {
        consumer
            .apply(AgentCardMiddleware)
            .forRoutes({ path: this.config.server.metadataEndpoint, method: RequestMethod.GET });
    }
}
