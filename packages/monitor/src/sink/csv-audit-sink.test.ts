import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import zlib from 'node:zlib';
import { parse } from 'papaparse';
import { ChangeRecord, ChangeSink } from '@sheetsentry/core';
import { auditLogFileName, CsvAuditSink, MultiSink } from './csv-audit-sink';

function row(overrides: Partial<ChangeRecord>): ChangeRecord {
    return {
        timestamp: '2024-03-31T10:00:00.000Z',
        filename: 'budget.xlsx',
        worksheet: 'Sheet1',
        address: 'A1',
        oldValue: 1,
        oldFormula: null,
        newValue: 2,
        newFormula: null,
        author: 'alice',
        kind: 'direct_value_changed',
        ...overrides,
    };
}

function readLog(filePath: string): string[][] {
    const text = zlib.gunzipSync(fs.readFileSync(filePath)).toString('utf8');
    return parse<string[]>(text, { skipEmptyLines: true }).data;
}

test('log files are named by local date', () => {
    assert.equal(auditLogFileName(new Date(2024, 0, 5, 23, 59)), 'change_log_20240105.csv.gz');
});

test('rows append as gzip members under a single header', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetsentry-audit-test-'));
    try {
        const sink = new CsvAuditSink({ logDir: path.join(dir, 'logs'), now: () => new Date(2024, 2, 31, 12) });
        await sink.record([
            row({}),
            row({ address: 'B2', oldValue: null, oldFormula: null, newValue: 'Net, total', kind: 'added', author: null }),
        ]);
        await sink.record([]);
        await sink.record([row({ address: 'C3', oldValue: 4, oldFormula: '=B1*2', newValue: 6, newFormula: '=B1*3', kind: 'formula_changed' })]);

        const logPath = path.join(dir, 'logs', 'change_log_20240331.csv.gz');
        assert.equal(sink.currentLogPath(), logPath);
        assert.deepEqual(readLog(logPath), [
            ['Timestamp', 'Filename', 'Worksheet', 'Cell', 'Old_Value', 'Old_Formula', 'New_Value', 'New_Formula', 'Last_Author', 'Change_Type'],
            ['2024-03-31T10:00:00.000Z', 'budget.xlsx', 'Sheet1', 'A1', '1', '', '2', '', 'alice', 'direct_value_changed'],
            ['2024-03-31T10:00:00.000Z', 'budget.xlsx', 'Sheet1', 'B2', '', '', 'Net, total', '', '', 'added'],
            ['2024-03-31T10:00:00.000Z', 'budget.xlsx', 'Sheet1', 'C3', '4', '=B1*2', '6', '=B1*3', 'alice', 'formula_changed'],
        ]);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a failing append rejects and the next append still runs', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetsentry-audit-test-'));
    try {
        const logDir = path.join(dir, 'logs');
        const sink = new CsvAuditSink({ logDir, now: () => new Date(2024, 2, 31, 12) });
        // A directory where the log file should be makes the append fail.
        fs.mkdirSync(path.join(logDir, 'change_log_20240331.csv.gz'), { recursive: true });
        await assert.rejects(sink.record([row({})]));

        fs.rmSync(path.join(logDir, 'change_log_20240331.csv.gz'), { recursive: true });
        await sink.record([row({})]);
        assert.equal(readLog(sink.currentLogPath()).length, 2);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('MultiSink tries every sink and rethrows the first failure', async () => {
    const received: string[] = [];
    const failing: ChangeSink = {
        async record() {
            throw new Error('disk full');
        },
    };
    const recording: ChangeSink = {
        async record(rows) {
            received.push(...rows.map((r) => r.address));
        },
    };

    await assert.rejects(new MultiSink([failing, recording]).record([row({}), row({ address: 'B1' })]), /disk full/);
    assert.deepEqual(received, ['A1', 'B1']);
});
