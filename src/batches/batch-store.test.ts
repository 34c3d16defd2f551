import test from 'node:test';
import assert from 'node:assert/strict';
import { BatchStore } from './batch-store.js';
import { buildStorageRequest, buildVmRequest } from '../requests/request-builder.js';
import { PROVIDER_IDS, RESOURCE_KINDS } from '../types/carbon.js';

const vm = buildVmRequest('us-east-1', 't2.micro', 10, 'h', 0.5);
const storage = buildStorageRequest('eastus', 'ssd', 5, 100, 'GB');

test('BatchStore: starts with six empty batches', () => {
    const store = new BatchStore();
    for (const provider of PROVIDER_IDS) {
        for (const kind of RESOURCE_KINDS) {
            assert.deepEqual(store.snapshot(provider, kind), []);
        }
    }
    assert.equal(store.totalCount(), 0);
    assert.deepEqual(store.entries(), []);
});

test('BatchStore: appends in insertion order to the matching batch only', () => {
    const store = new BatchStore();
    const second = buildVmRequest('us-west-2', 'm5.large', 2);
    store.append('aws', 'vm', vm);
    store.append('aws', 'vm', second);
    store.append('azure', 'storage', storage);

    assert.deepEqual(store.snapshot('aws', 'vm'), [vm, second]);
    assert.deepEqual(store.snapshot('azure', 'storage'), [storage]);
    assert.deepEqual(store.snapshot('aws', 'storage'), []);
    assert.deepEqual(store.snapshot('gcp', 'vm'), []);
    assert.equal(store.count('aws', 'vm'), 2);
    assert.equal(store.totalCount(), 3);
});

test('BatchStore: snapshots are not affected by later appends', () => {
    const store = new BatchStore();
    store.append('gcp', 'vm', vm);
    const before = store.snapshot('gcp', 'vm');
    store.append('gcp', 'vm', vm);
    assert.equal(before.length, 1);
    assert.equal(store.snapshot('gcp', 'vm').length, 2);
});

test('BatchStore: entries lists vm batches before storage batches', () => {
    const store = new BatchStore();
    store.append('gcp', 'storage', storage);
    store.append('azure', 'vm', vm);
    store.append('aws', 'storage', storage);

    assert.deepEqual(
        store.entries().map((entry) => `${entry.provider}_${entry.kind}:${entry.items.length}`),
        ['azure_vm:1', 'aws_storage:1', 'gcp_storage:1']
    );
});

test('BatchStore: clear empties all six batches in one update', () => {
    const store = new BatchStore();
    for (const provider of PROVIDER_IDS) {
        store.append(provider, 'vm', vm);
        store.append(provider, 'storage', storage);
    }
    assert.equal(store.totalCount(), 6);

    let notifications = 0;
    const unsubscribe = store.subscribe(() => {
        notifications += 1;
    });
    store.clear();
    unsubscribe();

    assert.equal(notifications, 1);
    for (const provider of PROVIDER_IDS) {
        for (const kind of RESOURCE_KINDS) {
            assert.deepEqual(store.snapshot(provider, kind), []);
        }
    }
});

test('BatchStore: separate instances do not share state', () => {
    const first = new BatchStore();
    const second = new BatchStore();
    first.append('aws', 'vm', vm);
    assert.equal(second.totalCount(), 0);
});
