import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import zlib from 'node:zlib';
import { BaselineStore, nodeStoreFileSystem, StoreFileSystem } from './store';
import { Baseline, cellRecord } from '../types';
import { fingerprint } from '../fingerprint/fingerprint';
import { isMonitorError } from '../errors';

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'sheetsentry-store-test-'));
}

function makeBaseline(value: number, author: string | null = 'alice'): Baseline {
    const cells = { Sheet1: { A1: cellRecord(value), B1: cellRecord(value * 2, '=A1*2') } };
    return {
        contentHash: fingerprint(cells),
        lastAuthor: author,
        cells,
        timestamp: '2024-03-01T09:30:00.000Z',
    };
}

const noSleep = async (): Promise<void> => { };

test('save then load round-trips the baseline', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const baseline = makeBaseline(1);

        assert.equal(await store.save('budget.xlsx', baseline), true);
        assert.deepEqual(await store.load('budget.xlsx'), baseline);
        assert.deepEqual(fs.readdirSync(dir), ['budget.xlsx.baseline.json.gz']);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('load returns null for an unknown key', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        assert.equal(await store.load('missing.xlsx'), null);
        assert.equal(await store.has('missing.xlsx'), false);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('load finds artifacts written by any codec, gzip first', async () => {
    const dir = createTempDir();
    try {
        const brotliStore = new BaselineStore({ directory: dir, defaultCodec: 'brotli' });
        await brotliStore.save('plan.xlsx', makeBaseline(7));

        const gzipStore = new BaselineStore({ directory: dir, defaultCodec: 'gzip' });
        assert.equal((await gzipStore.load('plan.xlsx'))?.cells.Sheet1.A1.value, 7);

        // A gzip artifact written beside the brotli one takes priority.
        const gzipPath = gzipStore.artifactPath('plan.xlsx', 'gzip');
        const newer = makeBaseline(8);
        fs.writeFileSync(gzipPath, zlib.gzipSync(JSON.stringify({ formatVersion: 'v2', ...newer })));
        assert.equal((await gzipStore.load('plan.xlsx'))?.cells.Sheet1.A1.value, 8);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('saving under the default codec removes artifacts of other codecs', async () => {
    const dir = createTempDir();
    try {
        await new BaselineStore({ directory: dir, defaultCodec: 'json' }).save('ops.xlsm', makeBaseline(1));
        const store = new BaselineStore({ directory: dir, defaultCodec: 'gzip' });
        assert.equal(await store.save('ops.xlsm', makeBaseline(2)), true);

        assert.deepEqual(fs.readdirSync(dir), ['ops.xlsm.baseline.json.gz']);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('migrate re-encodes into the target codec and drops the old artifact', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const baseline = makeBaseline(3);
        await store.save('archive.xlsx', baseline);

        assert.equal(await store.migrate('archive.xlsx', 'brotli'), true);
        assert.deepEqual(fs.readdirSync(dir), ['archive.xlsx.baseline.json.br']);
        assert.deepEqual(await store.load('archive.xlsx'), baseline);
        assert.equal(await store.migrate('nothing.xlsx', 'brotli'), false);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('legacy snake_case artifacts load and are rewritten as v2 on save', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const cells = { Sheet1: { A1: { formula: null, value: 'x' } } };
        fs.writeFileSync(
            store.artifactPath('legacy.xlsx'),
            zlib.gzipSync(JSON.stringify({ last_author: 'bob', content_hash: 'abc', cells, timestamp: '2023-01-05T08:00:00' }))
        );

        const loaded = await store.load('legacy.xlsx');
        assert.deepEqual(loaded, {
            contentHash: 'abc',
            lastAuthor: 'bob',
            timestamp: '2023-01-05T08:00:00',
            cells: { Sheet1: { A1: cellRecord('x') } },
        });

        assert.ok(loaded);
        await store.save('legacy.xlsx', loaded);
        const raw = JSON.parse(zlib.gunzipSync(fs.readFileSync(store.artifactPath('legacy.xlsx'))).toString('utf8'));
        assert.equal(raw.formatVersion, 'v2');
        assert.equal(raw.contentHash, 'abc');
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('malformed artifacts are reported as corrupt', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        fs.writeFileSync(store.artifactPath('broken.xlsx'), Buffer.from('not gzip at all'));
        await assert.rejects(store.load('broken.xlsx'), (error) => isMonitorError(error, 'corrupt'));

        const emptyCell = { formatVersion: 'v2', contentHash: 'h', lastAuthor: null, timestamp: '2024-01-01T00:00:00.000Z', cells: { S: { A1: { value: null, formula: null } } } };
        fs.writeFileSync(store.artifactPath('empty-cell.xlsx', 'json'), JSON.stringify(emptyCell));
        await assert.rejects(store.load('empty-cell.xlsx'), /must carry a value or a formula/);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a save that never reaches the move keeps the previous baseline intact', async () => {
    const dir = createTempDir();
    try {
        const original = makeBaseline(1);
        await new BaselineStore({ directory: dir }).save('ledger.xlsx', original);

        let moveAttempts = 0;
        const crashingFs: StoreFileSystem = {
            ...nodeStoreFileSystem,
            async rename(source, destination) {
                if (source.includes('.tmp-')) {
                    moveAttempts += 1;
                    throw Object.assign(new Error('simulated crash before move'), { code: 'EIO' });
                }
                await nodeStoreFileSystem.rename(source, destination);
            },
        };
        const store = new BaselineStore({ directory: dir, fileSystem: crashingFs, maxAttempts: 3, sleep: noSleep });

        assert.equal(await store.save('ledger.xlsx', makeBaseline(99)), false);
        assert.equal(moveAttempts, 3);
        assert.deepEqual(await store.load('ledger.xlsx'), original);
        assert.deepEqual(fs.readdirSync(dir), ['ledger.xlsx.baseline.json.gz']);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('save retries with exponential backoff and succeeds after a transient failure', async () => {
    const dir = createTempDir();
    try {
        const delays: number[] = [];
        let failuresLeft = 2;
        const flakyFs: StoreFileSystem = {
            ...nodeStoreFileSystem,
            async writeDurable(filePath, data) {
                if (failuresLeft > 0) {
                    failuresLeft -= 1;
                    throw Object.assign(new Error('share busy'), { code: 'EBUSY' });
                }
                await nodeStoreFileSystem.writeDurable(filePath, data);
            },
        };
        const store = new BaselineStore({
            directory: dir,
            fileSystem: flakyFs,
            retryBaseDelayMs: 50,
            sleep: async (ms) => { delays.push(ms); },
        });

        assert.equal(await store.save('q3.xlsx', makeBaseline(5)), true);
        assert.deepEqual(delays, [50, 100]);
        assert.equal((await store.load('q3.xlsx'))?.cells.Sheet1.A1.value, 5);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('recover restores an orphaned backup and removes leftovers', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const baseline = makeBaseline(4);
        await store.save('a.xlsx', baseline);
        await store.save('b.xlsx', makeBaseline(6));

        // Crash between deleting the original and moving the temp file in.
        const target = store.artifactPath('a.xlsx');
        fs.renameSync(target, `${target}.backup-1-2-3`);
        fs.writeFileSync(`${target}.tmp-1-2-3`, 'partial');
        // Crash after the move but before the backup was deleted.
        const other = store.artifactPath('b.xlsx');
        fs.copyFileSync(other, `${other}.backup-4-5-6`);

        const report = await store.recover();
        assert.deepEqual(report, { restoredBackups: 1, removedBackups: 1, removedTempFiles: 1 });
        assert.deepEqual(await store.load('a.xlsx'), baseline);
        assert.deepEqual(fs.readdirSync(dir).sort(), ['a.xlsx.baseline.json.gz', 'b.xlsx.baseline.json.gz']);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('keys that merely contain .tmp- or .backup- are live baselines, not crash leftovers', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const forecast = makeBaseline(7);
        const review = makeBaseline(8);
        await store.save('forecast.tmp-2024.xlsx', forecast);
        await store.save('q3.backup-final.xlsx', review);
        fs.writeFileSync(`${store.artifactPath('forecast.tmp-2024.xlsx')}.tmp-41-1717236000000-9f3a`, 'partial');

        assert.deepEqual((await store.list()).map((artifact) => artifact.key), ['forecast.tmp-2024.xlsx', 'q3.backup-final.xlsx']);

        const report = await store.recover();
        assert.deepEqual(report, { restoredBackups: 0, removedBackups: 0, removedTempFiles: 1 });
        assert.deepEqual(await store.load('forecast.tmp-2024.xlsx'), forecast);
        assert.deepEqual(await store.load('q3.backup-final.xlsx'), review);
        assert.deepEqual(fs.readdirSync(dir).sort(), [
            'forecast.tmp-2024.xlsx.baseline.json.gz',
            'q3.backup-final.xlsx.baseline.json.gz',
        ]);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('rename moves history to the new key', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        const baseline = makeBaseline(2);
        await store.save('draft.xlsx', baseline);

        assert.equal(await store.rename('draft.xlsx', 'final.xlsx'), true);
        assert.equal(await store.load('draft.xlsx'), null);
        assert.deepEqual(await store.load('final.xlsx'), baseline);
        assert.equal(await store.rename('unknown.xlsx', 'other.xlsx'), false);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('archiveInactive migrates only baselines older than the cutoff', async () => {
    const dir = createTempDir();
    try {
        const store = new BaselineStore({ directory: dir });
        await store.save('old.xlsx', makeBaseline(1));
        await store.save('fresh.xlsx', makeBaseline(2));
        const oldPath = store.artifactPath('old.xlsx');
        const tenDaysAgo = new Date(Date.now() - 10 * 24 * 60 * 60 * 1000);
        fs.utimesSync(oldPath, tenDaysAgo, tenDaysAgo);

        const archived = await store.archiveInactive(7 * 24 * 60 * 60 * 1000, 'brotli');
        assert.deepEqual(archived, ['old.xlsx']);
        assert.deepEqual(fs.readdirSync(dir).sort(), ['fresh.xlsx.baseline.json.gz', 'old.xlsx.baseline.json.br']);

        assert.equal(await store.purge(), 2);
        assert.deepEqual(await store.list(), []);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
