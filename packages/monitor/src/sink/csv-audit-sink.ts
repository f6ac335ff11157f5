import * as fsp from 'fs/promises';
import * as path from 'path';
import * as zlib from 'zlib';
import { promisify } from 'util';
import { unparse } from 'papaparse';
import { CellValue, ChangeRecord, ChangeSink, describeError } from '@sheetsentry/core';

const gzip = promisify(zlib.gzip);

export const AUDIT_LOG_COLUMNS = [
    'Timestamp',
    'Filename',
    'Worksheet',
    'Cell',
    'Old_Value',
    'Old_Formula',
    'New_Value',
    'New_Formula',
    'Last_Author',
    'Change_Type',
] as const;

type AuditField = CellValue | null;

export interface CsvAuditSinkOptions {
    logDir: string;
    now?: () => Date;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

export function auditLogFileName(date: Date): string {
    return `change_log_${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}.csv.gz`;
}

function toRow(record: ChangeRecord): AuditField[] {
    return [
        record.timestamp,
        record.filename,
        record.worksheet,
        record.address,
        record.oldValue,
        record.oldFormula,
        record.newValue,
        record.newFormula,
        record.author,
        record.kind,
    ];
}

/**
 * Daily gzip CSV audit trail. Each `record` call appends one gzip member, so
 * earlier members stay intact if the process dies mid-append; the header is
 * written with the first member of the day.
 */
export class CsvAuditSink implements ChangeSink {
    private readonly logDir: string;
    private readonly now: () => Date;
    private tail: Promise<void> = Promise.resolve();

    constructor(options: CsvAuditSinkOptions) {
        this.logDir = path.resolve(options.logDir);
        this.now = options.now ?? (() => new Date());
    }

    public currentLogPath(): string {
        return path.join(this.logDir, auditLogFileName(this.now()));
    }

    public record(rows: ChangeRecord[]): Promise<void> {
        if (rows.length === 0) {
            return Promise.resolve();
        }
        const run = this.tail.then(() => this.append(rows));
        // Appends are serialized; a failed append does not block the next one.
        this.tail = run.catch(() => undefined);
        return run;
    }

    private async append(rows: ChangeRecord[]): Promise<void> {
        const logPath = this.currentLogPath();
        await fsp.mkdir(this.logDir, { recursive: true });

        let isNew = false;
        try {
            const stats = await fsp.stat(logPath);
            isNew = stats.size === 0;
        } catch {
            isNew = true;
        }

        const csv = unparse(
            { fields: [...AUDIT_LOG_COLUMNS], data: rows.map(toRow) },
            { header: isNew },
        );
        const member = await gzip(Buffer.from(`${csv}\r\n`, 'utf8'));
        try {
            await fsp.appendFile(logPath, member);
        } catch (error) {
            console.error(`[AUDIT] Failed to append ${rows.length} row(s) to ${logPath}: ${describeError(error)}`);
            throw error;
        }
        console.log(`[AUDIT] Logged ${rows.length} change(s) to ${path.basename(logPath)}`);
    }
}

function display(value: CellValue | null, formula: string | null): string {
    if (formula !== null) {
        return value === null ? formula : `${formula} [${String(value)}]`;
    }
    return value === null ? '(empty)' : JSON.stringify(value);
}

/** One console line per change. */
export class ConsoleChangeSink implements ChangeSink {
    public async record(rows: ChangeRecord[]): Promise<void> {
        for (const row of rows) {
            const before = display(row.oldValue, row.oldFormula);
            const after = display(row.newValue, row.newFormula);
            console.log(`[CHANGE] ${row.filename} ${row.worksheet}!${row.address} ${row.kind}: ${before} -> ${after} (by ${row.author ?? 'unknown'})`);
        }
    }
}

/**
 * Fans rows out to several sinks in order. Every sink is tried; the first
 * failure is rethrown afterwards.
 */
export class MultiSink implements ChangeSink {
    private readonly sinks: ChangeSink[];

    constructor(sinks: ChangeSink[]) {
        this.sinks = sinks;
    }

    public async record(rows: ChangeRecord[]): Promise<void> {
        let firstError: unknown;
        let failed = false;
        for (const sink of this.sinks) {
            try {
                await sink.record(rows);
            } catch (error) {
                if (!failed) {
                    firstError = error;
                    failed = true;
                }
            }
        }
        if (failed) {
            throw firstError;
        }
    }
}
