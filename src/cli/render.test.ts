import test from 'node:test';
import assert from 'node:assert/strict';
import { describeFailure } from './render.js';
import { HttpError, PermissionError } from '../errors.js';

test('describeFailure: names the provider, kind and item', () => {
    assert.equal(
        describeFailure({
            provider: 'aws',
            endpoint: 'instance',
            itemIndex: 0,
            error: new HttpError(500, 'https://api.test/aws/instance', 'Internal Server Error'),
        }),
        'Amazon Web Services VM item 1: HTTP error 500 from https://api.test/aws/instance: Internal Server Error'
    );
    assert.equal(
        describeFailure({
            provider: 'azure',
            endpoint: 'storage',
            itemIndex: 2,
            error: new PermissionError('https://api.test/azure/storage'),
        }),
        'Microsoft Azure Storage item 3: Forbidden: check your API key permissions for cloud computing endpoints.'
    );
});
