import { describe, it, expect } from 'vitest';

import {
    addMaskedFields,
    filterData,
    isMaskedField,
    maskValue,
} from '../../../src/core/logger/redact.js';

describe('logger: redact', () => {

    describe('maskValue', () => {

        it('should mask every character at info level', () => {

            expect(maskValue('secret', 'Password', 'info')).toBe('<Password ****** (6) />');

        });

        it('should show the first four characters at verbose level', () => {

            expect(maskValue('secret12', 'Password', 'verbose')).toBe('<Password secr**** (8) />');

        });

        it('should cap the mask and mark long values', () => {

            expect(maskValue('mysecretpassword', 'Password', 'verbose')).toBe('<Password myse********... (16) />');
            expect(maskValue('a'.repeat(20), 'Secret', 'info')).toBe('<Secret ************... (20) />');

        });

        it('should keep short values fully masked at verbose level', () => {

            expect(maskValue('abc', 'Value', 'verbose')).toBe('<Value *** (3) />');

        });

        it('should title-case the field name', () => {

            expect(maskValue('test', 'api_key', 'info')).toBe('<ApiKey **** (4) />');
            expect(maskValue('test', 'stagedValue', 'info')).toBe('<StagedValue **** (4) />');

        });

    });

    describe('isMaskedField', () => {

        it('should match staged value fields in every casing', () => {

            expect(isMaskedField('value')).toBe(true);
            expect(isMaskedField('Value')).toBe(true);
            expect(isMaskedField('VALUE')).toBe(true);
            expect(isMaskedField('stagedValue')).toBe(true);
            expect(isMaskedField('remote_value')).toBe(true);
            expect(isMaskedField('secretString')).toBe(true);

        });

        it('should match credentials and environment names', () => {

            expect(isMaskedField('passphrase')).toBe(true);
            expect(isMaskedField('STAGECRAFT_PASSPHRASE')).toBe(true);
            expect(isMaskedField('secretAccessKey')).toBe(true);
            expect(isMaskedField('session-token')).toBe(true);

        });

        it('should not match identifying fields', () => {

            expect(isMaskedField('name')).toBe(false);
            expect(isMaskedField('description')).toBe(false);
            expect(isMaskedField('service')).toBe(false);

        });

        it('should accept additional fields', () => {

            expect(isMaskedField('customField')).toBe(false);

            addMaskedFields(['custom_field']);

            expect(isMaskedField('customField')).toBe(true);
            expect(isMaskedField('CUSTOM_FIELD')).toBe(true);

        });

    });

    describe('filterData', () => {

        it('should mask values and keep names', () => {

            expect(filterData({ name: '/app/db', value: 'hunter2' }, 'info')).toEqual({
                name: '/app/db',
                value: '<Value ******* (7) />',
            });

        });

        it('should recurse into nested records and arrays', () => {

            const filtered = filterData({
                entry: { stagedValue: 'abc', operation: 'update' },
                items: [{ password: 'pw' }, 'plain'],
            }, 'info');

            expect(filtered).toEqual({
                entry: { stagedValue: '<StagedValue *** (3) />', operation: 'update' },
                items: [{ password: '<Password ** (2) />' }, 'plain'],
            });

        });

        it('should leave non-string sensitive fields alone', () => {

            expect(filterData({ value: 42 }, 'info')).toEqual({ value: 42 });

        });

        it('should pass errors and dates through untouched', () => {

            const error = new Error('boom');
            const date = new Date('2024-03-01T10:00:00.000Z');

            const filtered = filterData({ error, date }, 'info');

            expect(filtered['error']).toBe(error);
            expect(filtered['date']).toBe(date);

        });

        it('should not modify the input', () => {

            const input = { value: 'hunter2' };

            filterData(input, 'info');

            expect(input.value).toBe('hunter2');

        });

    });

});
