/**
 * @fileoverview Agent Controller
 *
 * HTTP endpoints for registry search and service health.
 *
 * @remarks
 * Endpoints:
 * - POST /send_message - Search (bare envelope in 'simple' mode, wrapped
 *   message in 'compliant' mode)
 * - GET /health - Public health check
 *
 * The metadata card is served by AgentCardMiddleware at the configured path.
 */

import {
    BadRequestException,
    Body,
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Inject,
    InternalServerErrorException,
    Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { EnvConfig, REGISTRY_CONFIG, RegistryConfig, ServerMode } from '../config';
import { RecordStore } from '../records';
import { QueryError } from '../shared/errors';
import {
    parseQuery,
    RegistrySearchService,
    SearchErrorEnvelope,
    SearchResponseFormatter,
    SearchSuccessEnvelope,
} from '../search';
import { decodeSendMessage, encodeAgentMessage } from './agent-message.codec';
import { AgentMessage } from './interfaces';

export interface HealthStatus {
    status: 'healthy';
    agent: string;
    version: string;
    records: number;
}

/* -------------------------------------------------------------------------- */
/*                              Controller Implementation                      */
/* -------------------------------------------------------------------------- */

@ApiTags('registry')
@Controller()
export class AgentController {
    private readonly mode: ServerMode;

    constructor(
        private readonly searchService: RegistrySearchService,
        private readonly formatter: SearchResponseFormatter,
        private readonly store: RecordStore,
        @Inject(REGISTRY_CONFIG) private readonly config: RegistryConfig,
        env: ConfigService<EnvConfig, true>,
    ) {
        this.mode = env.get('SERVER_MODE', { infer: true });
    }

    /**
     * Searches the registry.
     *
     * @param body - Query mapping (or `{parameters: {...}}`) in 'simple' mode,
     * a message whose text parts hold the query JSON in 'compliant' mode
     * @returns 200 with the envelope; 400 for malformed queries; 500 otherwise
     *
     * @example
     * ```bash
     * curl -X POST http://localhost:8000/send_message \
     *   -H "Content-Type: application/json" \
     *   -d '{"surname": "Silva", "state": "SP"}'
     * ```
     */
    @Post('send_message')
    @HttpCode(HttpStatus.OK)
    @ApiOperation({ summary: 'Search registry', description: 'Case-insensitive partial match on searchable fields' })
    @ApiBody({ schema: { type: 'object', example: { name: 'João' } } })
    sendMessage(@Body() body: unknown): SearchSuccessEnvelope | AgentMessage {
        if (this.mode === 'compliant') {
            return encodeAgentMessage(this.execute(() => decodeSendMessage(body), encodeAgentMessage));
        }
        return this.execute(() => body, (envelope) => envelope);
    }

    @Get('health')
    @ApiOperation({ summary: 'Health check' })
    health(): HealthStatus {
        return {
            status: 'healthy',
            agent: this.config.agent.displayName,
            version: this.config.agent.version,
            records: this.store.size,
        };
    }

    /**
     * Runs one search and turns failures into error envelopes.
     * QueryError maps to 400, anything else to 500.
     */
    private execute(extract: () => unknown, wrap: (envelope: SearchErrorEnvelope) => object): SearchSuccessEnvelope {
        try {
            const query = parseQuery(extract());
            return this.formatter.format(this.searchService.search(query));
        } catch (error) {
            const body = wrap(this.formatter.formatError(error));
            if (error instanceof QueryError) {
                throw new BadRequestException(body);
            }
            throw new InternalServerErrorException(body);
        }
    }
}
