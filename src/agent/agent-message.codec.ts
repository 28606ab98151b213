/**
 * @fileoverview Agent Message Codec
 *
 * Unwraps search parameters from an incoming message and wraps outgoing
 * envelopes. Used only in 'compliant' server mode.
 *
 * @example
 * ```json
 * {"message": {"role": "user", "parts": [{"text": "{\"name\": \"João\"}"}]}}
 * ```
 */

import { z } from 'zod';
import { QueryError } from '../shared/errors';
import { SearchEnvelope } from '../search';
import { AgentMessage } from './interfaces';

const sendMessageSchema = z.object(
    {
        message: z.object(
            {
                role: z.string().optional(),
                parts: z
                    .array(z.object({ text: z.string().optional() }), {
                        required_error: "Missing 'parts' field in message",
                        invalid_type_error: "'parts' must be a non-empty list",
                    })
                    .min(1, "'parts' must be a non-empty list"),
            },
            { required_error: "Missing 'message' field in request" },
        ),
    },
    { invalid_type_error: 'Request body must be a JSON object' },
);

const INVALID_FORMAT = 'Invalid request format';

/**
 * Extracts the search parameters carried as JSON text in the message parts.
 * Text parts are joined with single spaces before parsing.
 *
 * @throws QueryError with an "Invalid request format" message
 */
export function decodeSendMessage(body: unknown): object {
    const result = sendMessageSchema.safeParse(body);
    if (!result.success) {
        throw new QueryError(`${INVALID_FORMAT}: ${result.error.errors[0].message}`);
    }

    const text = result.data.message.parts
        .map((part) => part.text)
        .filter((partText): partText is string => Boolean(partText))
        .join(' ')
        .trim();

    if (text === '') {
        throw new QueryError(`${INVALID_FORMAT}: No text content found in message parts`);
    }

    let params: unknown;
    try {
        params = JSON.parse(text);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new QueryError(`${INVALID_FORMAT}: Invalid JSON in message text: ${detail}`, { cause: error });
    }

    if (typeof params !== 'object' || params === null || Array.isArray(params)) {
        throw new QueryError(`${INVALID_FORMAT}: Search parameters must be a JSON object`);
    }

    return params;
}

export function encodeAgentMessage(envelope: SearchEnvelope): AgentMessage {
    return {
        message: {
            role: 'agent',
            parts: [{ text: JSON.stringify(envelope) }],
        },
    };
}
