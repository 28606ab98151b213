import { ConfigError, DataLoadError, QueryError, RegistryError } from './registry.errors';

describe('RegistryError', () => {
    it('should carry a stable code and class name', () => {
        const errors = [new ConfigError('a'), new DataLoadError('b'), new QueryError('c')];

        expect(errors.map((error) => [error.name, error.code])).toEqual([
            ['ConfigError', 'CONFIG_INVALID'],
            ['DataLoadError', 'DATA_LOAD_FAILED'],
            ['QueryError', 'QUERY_INVALID'],
        ]);
        errors.forEach((error) => expect(error).toBeInstanceOf(RegistryError));
    });

    it('should keep the underlying cause', () => {
        const cause = new Error('ENOENT');

        expect(new DataLoadError('Cannot read data file: x.csv', { cause }).cause).toBe(cause);
    });
});
