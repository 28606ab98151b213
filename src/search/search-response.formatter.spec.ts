import { Logger } from '@nestjs/common';
import { INTERNAL_ERROR_MESSAGE, SearchResponseFormatter } from './search-response.formatter';
import { QueryError } from '../shared/errors';

describe('SearchResponseFormatter', () => {
    let formatter: SearchResponseFormatter;

    beforeEach(() => {
        formatter = new SearchResponseFormatter();
    });

    describe('format', () => {
        it('should report zero matches as success', () => {
            expect(formatter.format([])).toEqual({
                status: 'success',
                message: 'No matching records found',
                count: 0,
                results: [],
            });
        });

        it('should count and carry the matches', () => {
            const matches = [{ name: 'João' }, { name: 'Maria' }];

            expect(formatter.format(matches)).toEqual({
                status: 'success',
                message: 'Found 2 matching record(s)',
                count: 2,
                results: [{ name: 'João' }, { name: 'Maria' }],
            });
        });

        it('should copy the result list', () => {
            const matches = [{ name: 'João' }];

            expect(formatter.format(matches).results).not.toBe(matches);
        });
    });

    describe('formatError', () => {
        it('should pass query error messages through', () => {
            expect(formatter.formatError(new QueryError('Invalid query: (root): Expected object, received null'))).toEqual({
                status: 'error',
                message: 'Invalid query: (root): Expected object, received null',
            });
        });

        it('should hide unexpected error details and log them', () => {
            const logSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

            expect(formatter.formatError(new Error('disk on fire'))).toEqual({
                status: 'error',
                message: INTERNAL_ERROR_MESSAGE,
            });
            expect(logSpy).toHaveBeenCalledTimes(1);

            logSpy.mockRestore();
        });
    });
});
