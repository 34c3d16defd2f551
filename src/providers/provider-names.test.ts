import test from 'node:test';
import assert from 'node:assert/strict';
import { convertProviderName, isProviderId, parseProviderId } from './provider-names.js';
import { ValidationError } from '../errors.js';

test('convertProviderName: maps ids to display names', () => {
    assert.equal(convertProviderName('aws'), 'Amazon Web Services');
    assert.equal(convertProviderName('azure'), 'Microsoft Azure');
    assert.equal(convertProviderName('gcp'), 'Google Cloud Platform');
});

test('convertProviderName: converting twice returns the input', () => {
    for (const value of [
        'aws',
        'azure',
        'gcp',
        'Amazon Web Services',
        'Microsoft Azure',
        'Google Cloud Platform',
    ]) {
        assert.equal(convertProviderName(convertProviderName(value)), value);
    }
});

test('convertProviderName: rejects anything else', () => {
    assert.throws(() => convertProviderName('oci'), ValidationError);
    assert.throws(() => convertProviderName('AWS'), /Invalid provider name: AWS/);
    assert.throws(() => convertProviderName(''), ValidationError);
});

test('parseProviderId: accepts ids and display names', () => {
    assert.equal(parseProviderId('gcp'), 'gcp');
    assert.equal(parseProviderId(' azure '), 'azure');
    assert.equal(parseProviderId('Amazon Web Services'), 'aws');
    assert.throws(() => parseProviderId('ibm'), ValidationError);
});

test('isProviderId', () => {
    assert.equal(isProviderId('aws'), true);
    assert.equal(isProviderId('Microsoft Azure'), false);
});
