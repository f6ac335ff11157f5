import * as fs from 'fs';
import * as path from 'path';
import { ProgressRecord, progressRecordSchema } from '../types';
import { describeError } from '../errors';

/**
 * Singleton progress record for the batch baseline builder. Written by
 * temp file + rename so a reader never sees a half-written record.
 */
export class ProgressTracker {
    private readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = path.resolve(filePath);
    }

    public getFilePath(): string {
        return this.filePath;
    }

    public save(completed: number, total: number, now: Date = new Date()): boolean {
        const record: ProgressRecord = { completed, total, timestamp: now.toISOString() };
        let tempPath: string | null = null;
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
            tempPath = `${this.filePath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
            fs.writeFileSync(tempPath, JSON.stringify(record, null, 2));
            fs.renameSync(tempPath, this.filePath);
            tempPath = null;
            return true;
        } catch (error) {
            console.error(`[PROGRESS] Failed to save progress ${completed}/${total}: ${describeError(error)}`);
            return false;
        } finally {
            if (tempPath && fs.existsSync(tempPath)) {
                fs.rmSync(tempPath, { force: true });
            }
        }
    }

    /**
     * Returns null when there is no record. A malformed record is moved aside
     * and treated as absent.
     */
    public load(): ProgressRecord | null {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
            const parsed = progressRecordSchema.safeParse(raw);
            if (!parsed.success) {
                throw new Error(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; '));
            }
            if (parsed.data.completed > parsed.data.total) {
                throw new Error(`completed (${parsed.data.completed}) exceeds total (${parsed.data.total})`);
            }
            return parsed.data;
        } catch (error) {
            this.quarantine(error);
            return null;
        }
    }

    public clear(): void {
        fs.rmSync(this.filePath, { force: true });
    }

    private quarantine(error: unknown): void {
        const quarantinePath = `${this.filePath}.corrupt-${Date.now()}-${Math.random().toString(16).slice(2)}`;
        console.warn(`[PROGRESS] Ignoring malformed progress record: ${describeError(error)}`);
        try {
            fs.renameSync(this.filePath, quarantinePath);
            console.warn(`[PROGRESS] Moved malformed record to ${quarantinePath}`);
        } catch (renameError) {
            console.error(`[PROGRESS] Failed to move malformed record aside: ${describeError(renameError)}`);
        }
    }
}
