import test from 'node:test';
import assert from 'node:assert/strict';
import { FileEvent } from '@sheetsentry/core';
import { FileIdentityStats, identityKey, RenameCorrelator } from './rename-correlator';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function stats(ino: number, size = 100, mtimeMs = 1_700_000_000_000): FileIdentityStats {
    return { dev: 7, ino, size, mtimeMs };
}

function harness(windowMs = 50): { correlator: RenameCorrelator; events: FileEvent[] } {
    const events: FileEvent[] = [];
    const correlator = new RenameCorrelator({ windowMs, emit: (event) => events.push(event) });
    return { correlator, events };
}

test('identity prefers the inode and falls back to size and mtime', () => {
    assert.equal(identityKey(stats(42)), 'ino:7:42');
    assert.equal(identityKey(stats(0, 2048, 1_700_000_000_123.6)), 'meta:2048:1700000000123');
});

test('unlink followed by an add of the same file is a move', () => {
    const { correlator, events } = harness();
    correlator.remember('/share/draft.xlsx', stats(42));

    correlator.onUnlink('/share/draft.xlsx');
    correlator.onAdd('/share/final.xlsx', stats(42));

    assert.deepEqual(events, [{ kind: 'moved_to', path: '/share/final.xlsx', oldPath: '/share/draft.xlsx' }]);
    assert.equal(correlator.pendingCount(), 0);
});

test('a scratch file saved over the original pairs with the scratch name', () => {
    const { correlator, events } = harness();
    correlator.remember('/share/budget.xlsx', stats(1));

    correlator.onAdd('/share/8F3A21C0', stats(2));
    correlator.onUnlink('/share/budget.xlsx');
    correlator.onAdd('/share/budget.xlsx~RF1.TMP', stats(1));
    correlator.onUnlink('/share/8F3A21C0');
    correlator.onAdd('/share/budget.xlsx', stats(2));

    assert.deepEqual(events, [
        { kind: 'created', path: '/share/8F3A21C0' },
        { kind: 'moved_to', path: '/share/budget.xlsx~RF1.TMP', oldPath: '/share/budget.xlsx' },
        { kind: 'moved_to', path: '/share/budget.xlsx', oldPath: '/share/8F3A21C0' },
    ]);
});

test('re-adding the same path within the window is a modification', () => {
    const { correlator, events } = harness();
    correlator.remember('/share/budget.xlsx', stats(5));
    correlator.onUnlink('/share/budget.xlsx');
    correlator.onAdd('/share/budget.xlsx', stats(5));
    assert.deepEqual(events, [{ kind: 'modified', path: '/share/budget.xlsx' }]);
});

test('an add after the window has expired is a new file', async () => {
    const { correlator, events } = harness(10);
    correlator.remember('/share/draft.xlsx', stats(42));
    correlator.onUnlink('/share/draft.xlsx');
    assert.equal(correlator.pendingCount(), 1);

    await delay(40);
    assert.equal(correlator.pendingCount(), 0);
    correlator.onAdd('/share/final.xlsx', stats(42));
    assert.deepEqual(events, [{ kind: 'created', path: '/share/final.xlsx' }]);
});

test('unlinks of unknown files and changes pass through', () => {
    const { correlator, events } = harness();
    correlator.onUnlink('/share/never-seen.xlsx');
    correlator.onChange('/share/budget.xlsx', stats(9));
    assert.equal(correlator.pendingCount(), 0);
    assert.deepEqual(events, [{ kind: 'modified', path: '/share/budget.xlsx' }]);
    correlator.dispose();
});
