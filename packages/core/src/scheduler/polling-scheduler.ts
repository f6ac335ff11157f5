import * as fsp from 'fs/promises';
import * as path from 'path';
import { describeError } from '../errors';
import { MonitoringSession } from '../session';
import type { DetectionOutcomeKind } from '../detector/change-detector';

export const DEFAULT_SIZE_THRESHOLD_BYTES = 10 * 1024 * 1024;
export const DEFAULT_DENSE_INTERVAL_MS = 5_000;
export const DEFAULT_DENSE_BUDGET_MS = 15_000;
export const DEFAULT_SPARSE_INTERVAL_MS = 15_000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;

export type PollingMode = 'dense' | 'sparse';

export type RetireReason = 'budget_exhausted' | 'no_changes' | 'stopped' | 'read_failures';

export interface PollingTask {
    readonly filePath: string;
    readonly mode: PollingMode;
    readonly intervalMs: number;
    remainingMs: number;
    ticks: number;
    /** Consecutive checks that could not read the workbook. */
    failures: number;
    timer: ReturnType<typeof setTimeout> | null;
    readonly eventNumber?: number;
}

/** The slice of the change detector the scheduler needs. */
export interface PollingDetector {
    detect(filePath: string, eventNumber?: number): Promise<{ kind: DetectionOutcomeKind; changesFound: boolean }>;
}

export interface AdaptivePollingOptions {
    detector: PollingDetector;
    session?: MonitoringSession;
    sizeThresholdBytes?: number;
    denseIntervalMs?: number;
    denseBudgetMs?: number;
    sparseIntervalMs?: number;
    /** Failed reads in a row before a task gives up. */
    maxConsecutiveFailures?: number;
    statSize?: (filePath: string) => Promise<number>;
    onTaskRetired?: (task: PollingTask, reason: RetireReason) => void;
}

async function statFileSize(filePath: string): Promise<number> {
    return (await fsp.stat(filePath)).size;
}

/**
 * Keeps re-checking a file for a while after it changed. Small files are
 * polled often against a time budget that resets whenever a change turns up;
 * large files get one slow re-check at a time.
 *
 * The task table is only touched synchronously, so a tick that finishes its
 * detection after the task was replaced or stopped sees that and bows out.
 */
export class AdaptivePollingScheduler {
    private readonly detector: PollingDetector;
    private readonly session?: MonitoringSession;
    private readonly sizeThresholdBytes: number;
    private readonly denseIntervalMs: number;
    private readonly denseBudgetMs: number;
    private readonly sparseIntervalMs: number;
    private readonly maxConsecutiveFailures: number;
    private readonly statSize: (filePath: string) => Promise<number>;
    private readonly onTaskRetired?: (task: PollingTask, reason: RetireReason) => void;
    private readonly tasks = new Map<string, PollingTask>();
    private readonly runningTicks = new Set<Promise<void>>();

    constructor(options: AdaptivePollingOptions) {
        this.detector = options.detector;
        this.session = options.session;
        this.sizeThresholdBytes = options.sizeThresholdBytes ?? DEFAULT_SIZE_THRESHOLD_BYTES;
        this.denseIntervalMs = Math.max(1, options.denseIntervalMs ?? DEFAULT_DENSE_INTERVAL_MS);
        this.denseBudgetMs = Math.max(1, options.denseBudgetMs ?? DEFAULT_DENSE_BUDGET_MS);
        this.sparseIntervalMs = Math.max(1, options.sparseIntervalMs ?? DEFAULT_SPARSE_INTERVAL_MS);
        this.maxConsecutiveFailures = Math.max(1, options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES);
        this.statSize = options.statSize ?? statFileSize;
        this.onTaskRetired = options.onTaskRetired;
    }

    private async sizeOf(filePath: string): Promise<number> {
        try {
            return await this.statSize(filePath);
        } catch (error) {
            console.warn(`[POLL] Cannot stat ${filePath}, assuming a small file: ${describeError(error)}`);
            return 0;
        }
    }

    /**
     * Begin (or restart) polling for a file. Any live task for the path is
     * cancelled first, so exactly one task remains.
     */
    public async start(filePath: string, eventNumber?: number): Promise<PollingTask> {
        const size = await this.sizeOf(filePath);
        const mode: PollingMode = size < this.sizeThresholdBytes ? 'dense' : 'sparse';

        // No awaits from here on: replace-and-schedule happens in one turn.
        const previous = this.tasks.get(filePath);
        if (previous?.timer) {
            clearTimeout(previous.timer);
            previous.timer = null;
        }

        const intervalMs = mode === 'dense' ? this.denseIntervalMs : this.sparseIntervalMs;
        const task: PollingTask = {
            filePath,
            mode,
            intervalMs,
            remainingMs: mode === 'dense' ? this.denseBudgetMs : intervalMs,
            ticks: 0,
            failures: 0,
            timer: null,
            eventNumber,
        };
        this.tasks.set(filePath, task);
        this.schedule(task);

        const name = path.basename(filePath);
        if (mode === 'dense') {
            console.log(`[POLL] ${name}: dense polling every ${intervalMs}ms for ${this.denseBudgetMs}ms${previous ? ' (restarted)' : ''}`);
        } else {
            console.log(`[POLL] ${name}: large file, sparse polling every ${intervalMs}ms${previous ? ' (restarted)' : ''}`);
        }
        return task;
    }

    private schedule(task: PollingTask): void {
        task.timer = setTimeout(() => {
            task.timer = null;
            const tick = this.runTick(task).finally(() => {
                this.runningTicks.delete(tick);
            });
            this.runningTicks.add(tick);
        }, task.intervalMs);
    }

    private isCurrent(task: PollingTask): boolean {
        return this.tasks.get(task.filePath) === task;
    }

    private retire(task: PollingTask, reason: RetireReason): void {
        if (this.isCurrent(task)) {
            this.tasks.delete(task.filePath);
        }
        console.log(`[POLL] ${path.basename(task.filePath)}: polling finished after ${task.ticks} check(s) (${reason})`);
        this.onTaskRetired?.(task, reason);
    }

    private async runTick(task: PollingTask): Promise<void> {
        if (!this.isCurrent(task)) {
            return;
        }
        if (this.session?.isStopRequested()) {
            this.retire(task, 'stopped');
            return;
        }

        task.ticks += 1;
        let changesFound = false;
        let readFailed = false;
        try {
            const outcome = await this.detector.detect(task.filePath, task.eventNumber);
            changesFound = outcome.changesFound;
            readFailed = outcome.kind === 'extract_failed';
        } catch (error) {
            console.error(`[POLL] Check of ${task.filePath} failed: ${describeError(error)}`);
            readFailed = true;
        }

        // Replaced or stopped while the detector ran.
        if (!this.isCurrent(task)) {
            return;
        }

        // An unreadable workbook is not a quiet one: retry without spending budget.
        if (readFailed) {
            task.failures += 1;
            if (task.failures >= this.maxConsecutiveFailures) {
                this.retire(task, 'read_failures');
            } else {
                this.schedule(task);
            }
            return;
        }
        task.failures = 0;

        if (task.mode === 'sparse') {
            if (changesFound) {
                this.schedule(task);
            } else {
                this.retire(task, 'no_changes');
            }
            return;
        }

        task.remainingMs = changesFound ? this.denseBudgetMs : task.remainingMs - task.intervalMs;
        if (task.remainingMs > 0) {
            this.schedule(task);
        } else {
            this.retire(task, 'budget_exhausted');
        }
    }

    public stop(filePath: string): boolean {
        const task = this.tasks.get(filePath);
        if (!task) {
            return false;
        }
        if (task.timer) {
            clearTimeout(task.timer);
            task.timer = null;
        }
        this.tasks.delete(filePath);
        return true;
    }

    /** Cancel every task and wait for checks that were already running. */
    public async stopAll(): Promise<void> {
        for (const task of this.tasks.values()) {
            if (task.timer) {
                clearTimeout(task.timer);
                task.timer = null;
            }
        }
        const cancelled = this.tasks.size;
        this.tasks.clear();
        if (cancelled > 0) {
            console.log(`[POLL] Cancelled ${cancelled} polling task(s).`);
        }
        await Promise.all(Array.from(this.runningTicks));
    }

    public getTask(filePath: string): PollingTask | undefined {
        return this.tasks.get(filePath);
    }

    public activePaths(): string[] {
        return Array.from(this.tasks.keys());
    }
}
