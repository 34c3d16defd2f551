import test from 'node:test';
import assert from 'node:assert/strict';
import { pino } from 'pino';
import { ResultAggregator, breakdownKey, extractCo2e, sumBatch } from './result-aggregator.js';
import { EmissionsClient } from '../api/emissions-client.js';
import { BatchStore } from '../batches/batch-store.js';
import { buildStorageRequest, buildVmRequest } from '../requests/request-builder.js';
import { createHttpStub, type RecordedRequest, type StubReply } from '../testing/http-stub.js';
import { MissingCredentialError, PermissionError } from '../errors.js';

const silent = pino({ level: 'silent' });

function aggregatorWith(respond: (request: RecordedRequest) => StubReply, apiKey: string | null = 'test-key') {
    const stub = createHttpStub(respond);
    const client = new EmissionsClient({
        apiKey: apiKey ?? undefined,
        baseUrl: 'https://api.test/compute/v1',
        timeoutMs: 15000,
        adapter: stub.adapter,
        logger: silent,
    });
    return { aggregator: new ResultAggregator(client, silent), stub };
}

test('extractCo2e: reads the field for each kind', () => {
    assert.equal(extractCo2e({ total_co2e: 1.5, co2e: 9 }, 'vm'), 1.5);
    assert.equal(extractCo2e({ total_co2e: 9, co2e: 0.25 }, 'storage'), 0.25);
});

test('extractCo2e: missing or non-numeric values count as zero', () => {
    assert.equal(extractCo2e({}, 'vm'), 0);
    assert.equal(extractCo2e({ co2e: 2 }, 'vm'), 0);
    assert.equal(extractCo2e({ co2e: '2' }, 'storage'), 0);
    assert.equal(extractCo2e({ total_co2e: null }, 'vm'), 0);
    assert.equal(extractCo2e(null, 'vm'), 0);
    assert.equal(extractCo2e('total_co2e', 'vm'), 0);
    assert.equal(extractCo2e([1, 2], 'storage'), 0);
});

test('sumBatch: sums item values and treats an empty batch as zero', () => {
    assert.equal(sumBatch([], 'vm'), 0);
    assert.equal(sumBatch([], 'storage'), 0);
    assert.equal(sumBatch([{ total_co2e: 1.5 }, { total_co2e: 2.25 }, { other: 3 }], 'vm'), 3.75);
    assert.equal(sumBatch([{ co2e: 0.5 }, { co2e: 0.25 }], 'storage'), 0.75);
});

test('breakdownKey: storage buckets use the store suffix', () => {
    assert.equal(breakdownKey('aws', 'vm'), 'aws_vm');
    assert.equal(breakdownKey('gcp', 'storage'), 'gcp_store');
});

test('calculateAll: empty batches contribute zero without network calls', async () => {
    const { aggregator, stub } = aggregatorWith(() => ({ status: 200, data: { total_co2e: 1 } }));
    const batches = new BatchStore();

    const vm = await aggregator.calculateAll('vm', batches);
    const storage = await aggregator.calculateAll('storage', batches);
    const combined = await aggregator.calculateBreakdown(batches);

    assert.deepEqual(vm.totals, { aws: 0, azure: 0, gcp: 0 });
    assert.deepEqual(storage.totals, { aws: 0, azure: 0, gcp: 0 });
    assert.deepEqual(combined.breakdown, {
        aws_vm: 0,
        azure_vm: 0,
        gcp_vm: 0,
        aws_store: 0,
        azure_store: 0,
        gcp_store: 0,
    });
    assert.equal(stub.requests.length, 0);
});

test('calculateBreakdown: a single AWS VM request', async () => {
    const { aggregator, stub } = aggregatorWith(() => ({ status: 200, data: { total_co2e: 1.23456 } }));
    const batches = new BatchStore();
    batches.append('aws', 'vm', buildVmRequest('us-east-1', 't2.micro', 10, 'h', 0.5));

    const { breakdown, failures } = await aggregator.calculateBreakdown(batches);

    assert.deepEqual(breakdown, {
        aws_vm: 1.23456,
        azure_vm: 0,
        gcp_vm: 0,
        aws_store: 0,
        azure_store: 0,
        gcp_store: 0,
    });
    assert.deepEqual(failures, []);
    assert.deepEqual(
        stub.requests.map((request) => request.url),
        ['/aws/instance']
    );
});

test('calculateBreakdown: sums storage batches per provider', async () => {
    const { aggregator, stub } = aggregatorWith((request) =>
        request.url === '/gcp/storage' ? { status: 200, data: { co2e: 0.5 } } : { status: 200, data: { co2e: 2 } }
    );
    const batches = new BatchStore();
    batches.append('gcp', 'storage', buildStorageRequest('us-central1', 'ssd', 1, 10, 'GB'));
    batches.append('gcp', 'storage', buildStorageRequest('us-central1', 'hdd', 1, 10, 'GB'));
    batches.append('azure', 'storage', buildStorageRequest('eastus', 'ssd', 1, 1, 'TB'));

    const { breakdown } = await aggregator.calculateBreakdown(batches);

    assert.equal(breakdown.gcp_store, 1);
    assert.equal(breakdown.azure_store, 2);
    assert.equal(breakdown.aws_store, 0);
    assert.equal(stub.requests.length, 3);
});

test('calculateBreakdown: a 403 for AWS does not block Azure', async () => {
    const { aggregator } = aggregatorWith((request) =>
        request.url.startsWith('/aws/') ? { status: 403 } : { status: 200, data: { total_co2e: 0.75 } }
    );
    const batches = new BatchStore();
    batches.append('aws', 'vm', buildVmRequest('us-east-1', 't2.micro', 10, 'h', 0.5));
    batches.append('azure', 'vm', buildVmRequest('eastus', 'Standard_B1s', 10, 'h', 0.5));

    const { breakdown, failures } = await aggregator.calculateBreakdown(batches);

    assert.equal(breakdown.aws_vm, 0);
    assert.equal(breakdown.azure_vm, 0.75);
    assert.equal(failures.length, 1);
    assert.equal(failures[0]?.provider, 'aws');
    assert.ok(failures[0]?.error instanceof PermissionError);
});

test('calculateBreakdown: a missing credential stops the calculation', async () => {
    const { aggregator, stub } = aggregatorWith(() => ({ status: 200, data: {} }), null);
    const batches = new BatchStore();
    batches.append('gcp', 'vm', buildVmRequest('us-central1', 'e2-micro', 1));

    await assert.rejects(aggregator.calculateBreakdown(batches), MissingCredentialError);
    assert.equal(stub.requests.length, 0);
});
