/**
 * @fileoverview Record Store
 *
 * Loads the registry CSV once and serves it as an ordered, immutable sequence
 * of records. There are no write operations; the snapshot taken at startup is
 * shared by every request.
 */

import * as fs from 'fs';
import { TextDecoder } from 'util';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataLoadError } from '../shared/errors';
import { RegistryRecord } from './interfaces';

// Shape of csv-parse output with `info: true`
const parsedRowsSchema = z.array(
    z.object({
        record: z.array(z.string()),
        info: z.object({ lines: z.number() }),
    }),
);

export class RecordStore {
    private constructor(
        private readonly header: readonly string[],
        private readonly records: readonly RegistryRecord[],
    ) { }

    /**
     * Reads a UTF-8 CSV file with a header row.
     *
     * @throws DataLoadError if the file is missing, unreadable, not valid UTF-8
     * or structurally inconsistent
     */
    static load(csvPath: string): RecordStore {
        let buffer: Buffer;
        try {
            buffer = fs.readFileSync(csvPath);
        } catch (error) {
            throw new DataLoadError(`Cannot read data file: ${csvPath}`, { cause: error });
        }

        let text: string;
        try {
            text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
        } catch (error) {
            throw new DataLoadError(`Data file is not valid UTF-8: ${csvPath}`, { cause: error });
        }

        return RecordStore.fromCsv(text, csvPath);
    }

    /**
     * Parses CSV text. Header names and cell values are trimmed; blank lines
     * are skipped.
     *
     * @param source - Label used in error messages
     */
    static fromCsv(text: string, source = '<inline>'): RecordStore {
        let rows: z.infer<typeof parsedRowsSchema>;
        try {
            rows = parsedRowsSchema.parse(
                parse(text, {
                    bom: true,
                    info: true,
                    trim: true,
                    skip_empty_lines: true,
                    relax_column_count: true,
                }),
            );
        } catch (error) {
            throw new DataLoadError(`Malformed CSV in ${source}`, { cause: error });
        }

        const [headerRow, ...dataRows] = rows;
        if (!headerRow) {
            throw new DataLoadError(`Data file has no header row: ${source}`);
        }

        const header = headerRow.record.map((name) => name.trim());
        header.forEach((name, index) => {
            if (name === '') {
                throw new DataLoadError(`Empty column name at position ${index + 1} in ${source}`);
            }
            if (header.indexOf(name) !== index) {
                throw new DataLoadError(`Duplicate column "${name}" in ${source}`);
            }
        });

        const records = dataRows.map(({ record, info }) => {
            if (record.length !== header.length) {
                throw new DataLoadError(
                    `Row ending on line ${info.lines} of ${source} has ${record.length} fields, header has ${header.length}`,
                );
            }
            return Object.freeze(
                Object.fromEntries(header.map((name, index) => [name, record[index].trim()])),
            );
        });

        return new RecordStore(Object.freeze(header), Object.freeze(records));
    }

    /**
     * All records in source row order. The array is a fresh copy; the records
     * themselves are frozen.
     */
    all(): RegistryRecord[] {
        return [...this.records];
    }

    /** Header column names in file order */
    columns(): string[] {
        return [...this.header];
    }

    hasColumn(field: string): boolean {
        return this.header.includes(field);
    }

    get size(): number {
        return this.records.length;
    }
}
