/**
 * @fileoverview Registry Configuration Interfaces
 *
 * In-memory shape of the registry YAML document after validation.
 * Loaded once at startup and frozen; nothing mutates it afterwards.
 */

export interface AgentSettings {
    /** Identifier-like name (letters, digits, underscore) */
    name: string;

    /** Human-readable name used on the metadata card and health endpoint */
    displayName: string;

    description: string;
    version: string;
}

export interface DataSettings {
    /** Absolute path of the CSV table */
    csvPath: string;
}

/**
 * Field exposure rules.
 * The two lists are independent: a field may be searchable-only or exposed-only.
 */
export interface FieldSettings {
    /** Fields allowed as query keys */
    searchableFields: readonly string[];

    /** Fields allowed in result records, in output order */
    exposedFields: readonly string[];
}

export interface ServerSettings {
    host: string;
    port: number;

    /** Path serving the metadata card. Always starts with '/'. */
    metadataEndpoint: string;
}

export interface RegistryConfig {
    agent: AgentSettings;
    data: DataSettings;
    fields: FieldSettings;
    server: ServerSettings;
}
