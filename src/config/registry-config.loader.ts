/**
 * @fileoverview Registry Configuration Loader
 *
 * Reads the registry YAML document, validates it with zod and resolves the
 * data table path. Every failure surfaces as a ConfigError so bootstrap can
 * abort before any request is served.
 *
 * @remarks
 * Document layout:
 * - `agent.{name,display_name,description,version}` - passthrough metadata
 * - `data.csv_path` - table location, relative to the YAML file's directory
 * - `fields.{searchable_fields,exposed_fields}` - exposure rules (default empty)
 * - `server.{host,port,metadata_endpoint}` - listener settings
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../shared/errors';
import { RegistryConfig } from './interfaces/registry-config.interface';

/* -------------------------------------------------------------------------- */
/*                              Document Schema                                */
/* -------------------------------------------------------------------------- */

const fieldListSchema = z
    .array(z.string().trim().min(1, 'field names must not be empty'))
    .default([])
    .transform((fields) => [...new Set(fields)]);

const registryDocumentSchema = z.object({
    agent: z.object({
        name: z
            .string()
            .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must contain only letters, digits and underscores and not start with a digit'),
        display_name: z.string().min(1).optional(),
        description: z.string(),
        // An unquoted 1.10 arrives as the number 1.1; reject it rather than guess
        version: z.string({ invalid_type_error: 'must be a quoted string, e.g. "1.10"' }).min(1),
    }),
    data: z.object({
        csv_path: z.string().trim().min(1, 'csv_path must not be empty'),
    }),
    fields: z
        .object({
            searchable_fields: fieldListSchema,
            exposed_fields: fieldListSchema,
        })
        .default({}),
    server: z
        .object({
            host: z.string().min(1).default('0.0.0.0'),
            port: z.coerce.number().int().min(1).max(65535).default(8000),
            metadata_endpoint: z.string().startsWith('/', 'must start with "/"').default('/metadata'),
        })
        .default({}),
});

type RegistryDocument = z.infer<typeof registryDocumentSchema>;

/* -------------------------------------------------------------------------- */
/*                              Loader                                         */
/* -------------------------------------------------------------------------- */

/**
 * Loads and validates the registry configuration file.
 *
 * @param configPath - Path to the YAML document (absolute or relative to cwd)
 * @throws ConfigError if the file is missing, unparsable or invalid, or if the
 * referenced data table does not exist
 */
export function loadRegistryConfig(configPath: string): RegistryConfig {
    const absolutePath = path.resolve(configPath);

    if (!fs.existsSync(absolutePath)) {
        throw new ConfigError(`Configuration file not found: ${absolutePath}`);
    }

    let document: unknown;
    try {
        document = parseYaml(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Configuration file is not valid YAML: ${absolutePath}`, { cause: error });
    }

    return parseRegistryConfig(document, path.dirname(absolutePath));
}

/**
 * Validates an already-parsed document.
 *
 * @param document - Raw document (usually the output of the YAML parser)
 * @param baseDir - Directory relative `data.csv_path` values are resolved against
 */
export function parseRegistryConfig(document: unknown, baseDir: string): RegistryConfig {
    const result = registryDocumentSchema.safeParse(document);
    if (!result.success) {
        const issues = result.error.errors.map(
            (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
        );
        throw new ConfigError(`Invalid registry configuration: ${issues.join('; ')}`);
    }

    const csvPath = path.resolve(baseDir, result.data.data.csv_path);
    if (!fs.existsSync(csvPath)) {
        throw new ConfigError(`Data file not found: ${csvPath} (data.csv_path)`);
    }

    return toRegistryConfig(result.data, csvPath);
}

function toRegistryConfig(doc: RegistryDocument, csvPath: string): RegistryConfig {
    return Object.freeze({
        agent: Object.freeze({
            name: doc.agent.name,
            displayName: doc.agent.display_name ?? doc.agent.name,
            description: doc.agent.description,
            version: doc.agent.version,
        }),
        data: Object.freeze({ csvPath }),
        fields: Object.freeze({
            searchableFields: Object.freeze([...doc.fields.searchable_fields]),
            exposedFields: Object.freeze([...doc.fields.exposed_fields]),
        }),
        server: Object.freeze({
            host: doc.server.host,
            port: doc.server.port,
            metadataEndpoint: doc.server.metadata_endpoint,
        }),
    });
}
