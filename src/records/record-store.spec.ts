import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RecordStore } from './record-store';
import { DataLoadError } from '../shared/errors';

describe('RecordStore', () => {
    const csv = [
        'name,surname,cpf,phone,city,state',
        'João,Silva,123.456.789-00,(11) 98765-4321,São Paulo,SP',
        'Maria,Santos,987.654.321-00,(21) 99876-5432,Rio de Janeiro,RJ',
    ].join('\n');

    describe('fromCsv', () => {
        it('should keep every value as its literal text', () => {
            const store = RecordStore.fromCsv(csv);

            expect(store.all()).toEqual([
                {
                    name: 'João',
                    surname: 'Silva',
                    cpf: '123.456.789-00',
                    phone: '(11) 98765-4321',
                    city: 'São Paulo',
                    state: 'SP',
                },
                {
                    name: 'Maria',
                    surname: 'Santos',
                    cpf: '987.654.321-00',
                    phone: '(21) 99876-5432',
                    city: 'Rio de Janeiro',
                    state: 'RJ',
                },
            ]);
        });

        it('should expose the header order and row count', () => {
            const store = RecordStore.fromCsv(csv);

            expect(store.columns()).toEqual(['name', 'surname', 'cpf', 'phone', 'city', 'state']);
            expect(store.size).toBe(2);
            expect(store.hasColumn('cpf')).toBe(true);
            expect(store.hasColumn('email')).toBe(false);
        });

        it('should trim header names and values', () => {
            const store = RecordStore.fromCsv(' name , city \n  Ana  ,  Niterói \n');

            expect(store.all()).toEqual([{ name: 'Ana', city: 'Niterói' }]);
        });

        it('should keep quoted delimiters inside a value', () => {
            const store = RecordStore.fromCsv('name,address\nCarla,"Avenida Norte-Sul, 600"\n');

            expect(store.all()[0].address).toBe('Avenida Norte-Sul, 600');
        });

        it('should strip a byte-order mark', () => {
            const store = RecordStore.fromCsv('\uFEFFname,city\nJoão,São Paulo\n');

            expect(store.columns()).toEqual(['name', 'city']);
        });

        it('should skip blank lines', () => {
            const store = RecordStore.fromCsv('name\n\nJoão\n\nMaria\n');

            expect(store.all()).toEqual([{ name: 'João' }, { name: 'Maria' }]);
        });

        it('should reject a row with the wrong field count', () => {
            const text = 'name,city\nJoão,São Paulo\nMaria\n';

            expect(() => RecordStore.fromCsv(text)).toThrow(DataLoadError);
            expect(() => RecordStore.fromCsv(text)).toThrow(/has 1 fields, header has 2/);
        });

        it('should reject duplicate column names', () => {
            expect(() => RecordStore.fromCsv('name,city,name\na,b,c\n')).toThrow('Duplicate column "name"');
        });

        it('should reject an empty column name', () => {
            expect(() => RecordStore.fromCsv('name,,city\na,b,c\n')).toThrow('Empty column name at position 2');
        });

        it('should reject input without a header row', () => {
            expect(() => RecordStore.fromCsv('', 'empty.csv')).toThrow('Data file has no header row: empty.csv');
        });

        it('should allow a header with no data rows', () => {
            const store = RecordStore.fromCsv('name,city\n');

            expect(store.size).toBe(0);
            expect(store.all()).toEqual([]);
        });
    });

    describe('all', () => {
        it('should return records in the same order on every call', () => {
            const store = RecordStore.fromCsv(csv);

            expect(store.all()).toEqual(store.all());
            expect(store.all().map((record) => record.name)).toEqual(['João', 'Maria']);
        });

        it('should not let callers change the store', () => {
            const store = RecordStore.fromCsv(csv);
            const records = store.all();

            records.pop();
            expect(store.size).toBe(2);
            expect(Object.isFrozen(store.all()[0])).toBe(true);
        });
    });

    describe('load', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'record-store-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should read accented text from a UTF-8 file', () => {
            const file = path.join(dir, 'registrations.csv');
            fs.writeFileSync(file, csv, 'utf-8');

            const store = RecordStore.load(file);

            expect(store.all()[0].name).toBe('João');
            expect(store.all()[0].city).toBe('São Paulo');
        });

        it('should fail when the file is missing', () => {
            const file = path.join(dir, 'missing.csv');

            expect(() => RecordStore.load(file)).toThrow(DataLoadError);
            expect(() => RecordStore.load(file)).toThrow(`Cannot read data file: ${file}`);
        });

        it('should fail on bytes that are not UTF-8', () => {
            const file = path.join(dir, 'latin1.csv');
            // "city\nSão" encoded as Latin-1
            fs.writeFileSync(file, Buffer.from([0x63, 0x69, 0x74, 0x79, 0x0a, 0x53, 0xe3, 0x6f]));

            expect(() => RecordStore.load(file)).toThrow(`Data file is not valid UTF-8: ${file}`);
        });
    });
});
