export * from './agent-card.interface';
export * from './agent-message.interface';
