/**
 * @fileoverview Agent Card Factory
 *
 * Builds the metadata card from configuration. The input schema mirrors the
 * searchable fields and the output schema mirrors the exposed fields, so the
 * card never advertises a field the service would not return.
 */

import { ListenAddress, RegistryConfig } from '../config';
import { describeField } from './field-descriptions';
import { AgentCard, ObjectSchema, StringPropertySchema } from './interfaces';

export const SEARCH_SKILL_ID = 'search_registration';

export function buildAgentCard(config: RegistryConfig, address: ListenAddress): AgentCard {
    const inputProperties: Record<string, StringPropertySchema> = {};
    for (const field of config.fields.searchableFields) {
        inputProperties[field] = { type: 'string', description: describeField(field) };
    }

    const outputProperties: Record<string, StringPropertySchema> = {};
    for (const field of config.fields.exposedFields) {
        outputProperties[field] = { type: 'string' };
    }

    const outputSchema: ObjectSchema = {
        type: 'object',
        properties: {
            status: { type: 'string' },
            message: { type: 'string' },
            count: { type: 'integer' },
            results: {
                type: 'array',
                items: { type: 'object', properties: outputProperties },
            },
        },
    };

    return {
        name: config.agent.displayName,
        description: config.agent.description,
        version: config.agent.version,
        url: `http://${address.host}:${address.port}`,
        capabilities: {
            supports_message: true,
            supports_task_creation: true,
            supports_streaming: false,
        },
        skills: [
            {
                id: SEARCH_SKILL_ID,
                name: SEARCH_SKILL_ID,
                description:
                    'Search person registration data by any configured searchable field. ' +
                    'Supports case-insensitive partial matching and returns results with privacy-filtered fields.',
                tags: ['search', 'registration', 'data-query'],
                input_schema: {
                    type: 'object',
                    properties: inputProperties,
                    additionalProperties: false,
                },
                output_schema: outputSchema,
            },
        ],
        defaultInputModes: ['text'],
        defaultOutputModes: ['text'],
    };
}
