/**
 * @fileoverview Agent Barrel Export
 */

export * from './agent.module';
export * from './agent.controller';
export * from './agent-card.factory';
export * from './agent-card.middleware';
export * from './agent-message.codec';
export * from './interfaces';
