/**
 * @fileoverview Agent Card Interfaces
 *
 * Metadata descriptor served at `server.metadata_endpoint`.
 */

export interface StringPropertySchema {
    type: 'string';
    description?: string;
}

export interface ObjectSchema {
    type: 'object';
    properties: Record<string, StringPropertySchema | ObjectSchema | ArraySchema | { type: 'integer' }>;
    additionalProperties?: boolean;
}

export interface ArraySchema {
    type: 'array';
    items: ObjectSchema;
}

export interface AgentCapabilities {
    supports_message: boolean;
    supports_task_creation: boolean;
    supports_streaming: boolean;
}

export interface AgentSkill {
    id: string;
    name: string;
    description: string;
    tags: string[];

    /** One string property per searchable field */
    input_schema: ObjectSchema;

    /** Envelope shape, with one string property per exposed field */
    output_schema: ObjectSchema;
}

export interface AgentCard {
    name: string;
    description: string;
    version: string;
    url: string;
    capabilities: AgentCapabilities;
    skills: AgentSkill[];
    defaultInputModes: string[];
    defaultOutputModes: string[];
}
