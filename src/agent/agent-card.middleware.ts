import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import type { Request, Response } from 'express';
import { AgentCard } from './interfaces';

export const AGENT_CARD = Symbol('AGENT_CARD');

/**
 * Serves the metadata card. Mounted as middleware because the path comes
 * from configuration (server.metadata_endpoint).
 */
@Injectable()
export class AgentCardMiddleware implements NestMiddleware {
    constructor(@Inject(AGENT_CARD) private readonly card: AgentCard) { }

    use(_req: Request, res: Response): void {
        res.json(this.card);
    }
}
