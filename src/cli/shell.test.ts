import test from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import { executeCommand, tokenize } from './shell.js';
import { CalculatorSession } from '../session/calculator-session.js';
import { ResultAggregator } from '../aggregation/result-aggregator.js';
import { EmissionsClient } from '../api/emissions-client.js';
import { DEFAULT_CATALOG, MetadataStore } from '../metadata/metadata-store.js';
import { createHttpStub } from '../testing/http-stub.js';
import { ValidationError } from '../errors.js';

const silent = pino({ level: 'silent' });

function newSession() {
    const stub = createHttpStub(() => ({ status: 200, data: {} }));
    const client = new EmissionsClient({
        apiKey: 'test-key',
        baseUrl: 'https://api.test/compute/v1',
        timeoutMs: 15000,
        adapter: stub.adapter,
        logger: silent,
    });
    return new CalculatorSession(MetadataStore.fromCatalog(DEFAULT_CATALOG), new ResultAggregator(client, silent), {
        logger: silent,
    });
}

test('tokenize: splits on whitespace and keeps quoted words together', () => {
    assert.deepEqual(tokenize('  vm aws  us-east-1 t2.micro 10 '), ['vm', 'aws', 'us-east-1', 't2.micro', '10']);
    assert.deepEqual(tokenize('storage gcp us-central1 "Solid-state Drive" 2 10 GB'), [
        'storage',
        'gcp',
        'us-central1',
        'Solid-state Drive',
        '2',
        '10',
        'GB',
    ]);
    assert.deepEqual(tokenize(''), []);
});

test('executeCommand: adds entries and resets them', async () => {
    const session = newSession();

    await executeCommand(session, 'vm aws us-east-1 t2.micro 10 h 0.5');
    await executeCommand(session, 'storage gcp us-central1 "Hard Disk Drive" 2 10 GB day');
    assert.equal(session.itemCount, 2);
    assert.equal(session.items()[1]?.items[0]?.region, 'us-central1');

    await executeCommand(session, 'reset');
    assert.equal(session.itemCount, 0);
});

test('executeCommand: exit and blank lines', async () => {
    const session = newSession();
    assert.deepEqual(await executeCommand(session, ''), { output: '', exit: false });
    assert.deepEqual(await executeCommand(session, 'exit'), { output: '', exit: true });
    assert.deepEqual(await executeCommand(session, 'QUIT'), { output: '', exit: true });
});

test('executeCommand: invalid entries surface as validation errors', async () => {
    const session = newSession();
    await assert.rejects(executeCommand(session, 'vm aws us-east-1'), ValidationError);
    await assert.rejects(executeCommand(session, 'vm aws us-east-1 t2.micro 1 h 3'), ValidationError);
    assert.equal(session.itemCount, 0);
});
