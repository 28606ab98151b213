/**
 * @fileoverview Agent Message Interfaces
 *
 * Message wrapping used by the 'compliant' server mode.
 */

/**
 * Outgoing message. The envelope travels as serialised JSON in the single part.
 */
export interface AgentMessage {
    message: {
        role: 'agent';
        parts: [{ text: string }];
    };
}
