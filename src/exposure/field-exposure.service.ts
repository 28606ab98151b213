import { Inject, Injectable } from '@nestjs/common';
import { REGISTRY_CONFIG, RegistryConfig } from '../config';
import { RegistryRecord } from '../records';

/**
 * Projects a record onto an allow-list of fields.
 *
 * The output holds exactly `exposedFields ∩ keys(record)`, in `exposedFields`
 * order. Fields the record lacks are omitted, never filled with placeholders.
 */
export function projectRecord(record: RegistryRecord, exposedFields: readonly string[]): RegistryRecord {
    const projected: Record<string, string> = {};
    for (const field of exposedFields) {
        if (Object.hasOwn(record, field)) {
            projected[field] = record[field];
        }
    }
    return Object.freeze(projected);
}

@Injectable()
export class FieldExposureService {
    private readonly exposedFields: readonly string[];

    constructor(@Inject(REGISTRY_CONFIG) config: RegistryConfig) {
        this.exposedFields = config.fields.exposedFields;
    }

    /**
     * Strip every non-exposed field from a record
     */
    project(record: RegistryRecord): RegistryRecord {
        return projectRecord(record, this.exposedFields);
    }

    projectAll(records: readonly RegistryRecord[]): RegistryRecord[] {
        return records.map((record) => this.project(record));
    }
}
