import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ProgressTracker } from './tracker';

function withTempDir<T>(fn: (dir: string) => T): T {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetsentry-progress-test-'));
    try {
        return fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}

test('save then load returns the stored counters', () => {
    withTempDir((dir) => {
        const tracker = new ProgressTracker(path.join(dir, 'state', 'progress.json'));
        assert.equal(tracker.save(3, 10, new Date('2024-05-01T12:00:00.000Z')), true);

        assert.deepEqual(tracker.load(), { completed: 3, total: 10, timestamp: '2024-05-01T12:00:00.000Z' });
        assert.deepEqual(fs.readdirSync(path.join(dir, 'state')), ['progress.json']);
    });
});

test('load returns null when no record exists and after clear', () => {
    withTempDir((dir) => {
        const tracker = new ProgressTracker(path.join(dir, 'progress.json'));
        assert.equal(tracker.load(), null);

        tracker.save(1, 2);
        tracker.clear();
        assert.equal(tracker.load(), null);
        tracker.clear();
    });
});

test('malformed records are treated as absent and moved aside', () => {
    withTempDir((dir) => {
        const file = path.join(dir, 'progress.json');
        const tracker = new ProgressTracker(file);

        fs.writeFileSync(file, '{"completed": "three"');
        assert.equal(tracker.load(), null);
        assert.equal(fs.existsSync(file), false);

        fs.writeFileSync(file, JSON.stringify({ completed: 5, total: 2, timestamp: '2024-05-01T12:00:00.000Z' }));
        assert.equal(tracker.load(), null);

        const leftovers = fs.readdirSync(dir);
        assert.equal(leftovers.length, 2);
        assert.ok(leftovers.every((name) => name.startsWith('progress.json.corrupt-')));
    });
});
