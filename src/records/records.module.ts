import { Logger, Module } from '@nestjs/common';
import { REGISTRY_CONFIG, RegistryConfig } from '../config';
import { RecordStore } from './record-store';

/**
 * Loads the table named by the configuration. Searchable fields the table
 * lacks are reported here, since a search on them can never match.
 */
export function createRecordStore(config: RegistryConfig): RecordStore {
    const logger = new Logger(RecordStore.name);
    const store = RecordStore.load(config.data.csvPath);

    logger.log({
        msg: 'Registry data loaded',
        source: config.data.csvPath,
        records: store.size,
        columns: store.columns(),
    });

    const missing = config.fields.searchableFields.filter((field) => !store.hasColumn(field));
    if (missing.length > 0) {
        logger.warn({ msg: 'Searchable fields missing from the data table', fields: missing });
    }

    return store;
}

@Module({
    providers: [
        {
            provide: RecordStore,
            inject: [REGISTRY_CONFIG],
            useFactory: createRecordStore,
        },
    ],
    exports: [RecordStore],
})
export class RecordsModule { }
