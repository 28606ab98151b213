import { FieldExposureService, projectRecord } from './field-exposure.service';
import { RegistryConfig } from '../config';

const buildConfig = (exposedFields: string[]): RegistryConfig => ({
    agent: { name: 'registry_agent', displayName: 'Registry Agent', description: 'test', version: '1.0.0' },
    data: { csvPath: '/tmp/unused.csv' },
    fields: { searchableFields: ['name', 'cpf'], exposedFields },
    server: { host: '127.0.0.1', port: 8000, metadataEndpoint: '/metadata' },
});

describe('FieldExposureService', () => {
    const record = {
        name: 'João',
        surname: 'Silva',
        cpf: '123.456.789-00',
        city: 'São Paulo',
        state: 'SP',
        phone: '(11) 98765-4321',
    };

    describe('project', () => {
        it('should drop fields that are not exposed', () => {
            const service = new FieldExposureService(buildConfig(['name', 'surname', 'city', 'state', 'phone']));

            expect(service.project(record)).toEqual({
                name: 'João',
                surname: 'Silva',
                city: 'São Paulo',
                state: 'SP',
                phone: '(11) 98765-4321',
            });
        });

        it('should follow the exposed field order, not the record order', () => {
            const service = new FieldExposureService(buildConfig(['state', 'name']));

            expect(Object.keys(service.project(record))).toEqual(['state', 'name']);
        });

        it('should omit exposed fields the record does not have', () => {
            const service = new FieldExposureService(buildConfig(['name', 'email']));

            expect(service.project(record)).toEqual({ name: 'João' });
        });

        it('should return an empty record when nothing is exposed', () => {
            const service = new FieldExposureService(buildConfig([]));

            expect(service.project(record)).toEqual({});
        });

        it('should not mutate the source record', () => {
            const source = Object.freeze({ ...record });
            const projected = projectRecord(source, ['name']);

            expect(projected).not.toBe(source);
            expect(source).toHaveProperty('cpf', '123.456.789-00');
            expect(Object.isFrozen(projected)).toBe(true);
        });
    });

    describe('projectAll', () => {
        it('should project every record and keep order', () => {
            const service = new FieldExposureService(buildConfig(['name']));
            const other = { ...record, name: 'Maria' };

            expect(service.projectAll([record, other])).toEqual([{ name: 'João' }, { name: 'Maria' }]);
        });
    });
});
