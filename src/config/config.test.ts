import test from 'node:test';
import assert from 'node:assert/strict';
import { getEnvPositiveInt } from './index.js';

const KEY = 'CARBON_CALC_TEST_TIMEOUT';

test('getEnvPositiveInt: keeps positive values', (t) => {
    t.after(() => delete process.env[KEY]);
    process.env[KEY] = '2500';
    assert.equal(getEnvPositiveInt(KEY, 15000), 2500);
});

test('getEnvPositiveInt: falls back for unset, zero, negative and non-numeric values', (t) => {
    t.after(() => delete process.env[KEY]);
    delete process.env[KEY];
    assert.equal(getEnvPositiveInt(KEY, 15000), 15000);
    for (const value of ['0', '-5', 'soon']) {
        process.env[KEY] = value;
        assert.equal(getEnvPositiveInt(KEY, 15000), 15000);
    }
});
