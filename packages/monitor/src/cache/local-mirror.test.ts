import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { LocalFileMirror } from './local-mirror';

function withDirs(fn: (shareDir: string, cacheDir: string) => Promise<void>): Promise<void> {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetsentry-mirror-test-'));
    const shareDir = path.join(root, 'share');
    fs.mkdirSync(shareDir);
    return fn(shareDir, path.join(root, 'cache')).finally(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });
}

test('copies are named by path hash and basename', async () => {
    await withDirs(async (shareDir, cacheDir) => {
        const mirror = new LocalFileMirror(cacheDir);
        const source = path.join(shareDir, 'budget.xlsx');
        fs.writeFileSync(source, 'v1');

        const local = await mirror.ensureLocalCopy(source);
        assert.equal(local, mirror.cachePathFor(source));
        assert.match(path.basename(local), /^[0-9a-f]{16}_budget\.xlsx$/);
        assert.equal(fs.readFileSync(local, 'utf8'), 'v1');
        assert.deepEqual(fs.readdirSync(cacheDir), [path.basename(local)]);
    });
});

test('a fresh copy is reused and a newer source is copied again', async () => {
    await withDirs(async (shareDir, cacheDir) => {
        const mirror = new LocalFileMirror(cacheDir);
        const source = path.join(shareDir, 'budget.xlsx');
        fs.writeFileSync(source, 'v1');
        const local = await mirror.ensureLocalCopy(source);

        // Same size and mtime as the source: treated as fresh.
        const { mtime, atime } = fs.statSync(local);
        fs.writeFileSync(local, 'xx');
        fs.utimesSync(local, atime, mtime);
        await mirror.ensureLocalCopy(source);
        assert.equal(fs.readFileSync(local, 'utf8'), 'xx');

        fs.writeFileSync(source, 'v2');
        const later = new Date(mtime.getTime() + 10_000);
        fs.utimesSync(source, later, later);
        await mirror.ensureLocalCopy(source);
        assert.equal(fs.readFileSync(local, 'utf8'), 'v2');
    });
});

test('a copy of a naturally written source is reused on the next read', async () => {
    await withDirs(async (shareDir, cacheDir) => {
        const mirror = new LocalFileMirror(cacheDir);
        const source = path.join(shareDir, 'ledger.xlsx');
        fs.writeFileSync(source, 'v1');

        const local = await mirror.ensureLocalCopy(source);
        const firstCopy = fs.statSync(local).ino;
        assert.equal(Math.round(fs.statSync(local).mtimeMs), Math.trunc(fs.statSync(source).mtimeMs));

        assert.equal(await mirror.ensureLocalCopy(source), local);
        assert.equal(fs.statSync(local).ino, firstCopy);
    });
});

test('a missing source rejects so the caller reads in place', async () => {
    await withDirs(async (shareDir, cacheDir) => {
        const mirror = new LocalFileMirror(cacheDir);
        await assert.rejects(mirror.ensureLocalCopy(path.join(shareDir, 'gone.xlsx')), { code: 'ENOENT' });
    });
});
