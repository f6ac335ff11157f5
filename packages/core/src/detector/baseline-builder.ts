import { Baseline, LocalCacheMirror, SpreadsheetExtractor } from '../types';
import { describeError } from '../errors';
import { BaselineStore } from '../baseline/store';
import { fingerprint } from '../fingerprint/fingerprint';
import { ProgressTracker } from '../progress/tracker';
import { ResourceGuard, DEFAULT_RELIEF_PAUSE_MS } from '../resource/guard';
import { MonitoringSession, DEFAULT_EXTRACTION_TIMEOUT_MS } from '../session';
import { baselineKeyFor } from './change-detector';
import { extractWithTimeout } from './extraction';

export type SeedResult = 'created' | 'skipped' | 'failed';

export type BuildHaltReason = 'stop_requested' | 'memory_exhausted';

export interface BuildSummary {
    total: number;
    startIndex: number;
    /** Index of the next file that was not processed. */
    nextIndex: number;
    created: number;
    skipped: number;
    failed: number;
    halted: BuildHaltReason | null;
    durationMs: number;
}

export interface BaselineBuilderOptions {
    store: BaselineStore;
    extractor: SpreadsheetExtractor;
    session?: MonitoringSession;
    mirror?: LocalCacheMirror;
    progress?: ProgressTracker;
    guard?: ResourceGuard;
    /** Continue from the progress record when it covers the same file count. */
    resume?: boolean;
    reliefPauseMs?: number;
    extractionTimeoutMs?: number;
    now?: () => Date;
}

/**
 * Seeds baselines for many files: the start-up scan, and single files that
 * appear while watching.
 */
export class BaselineBuilder {
    private readonly store: BaselineStore;
    private readonly extractor: SpreadsheetExtractor;
    private readonly session?: MonitoringSession;
    private readonly mirror?: LocalCacheMirror;
    private readonly progress?: ProgressTracker;
    private readonly guard?: ResourceGuard;
    private readonly resume: boolean;
    private readonly reliefPauseMs: number;
    private readonly extractionTimeoutMs: number;
    private readonly now: () => Date;

    constructor(options: BaselineBuilderOptions) {
        this.store = options.store;
        this.extractor = options.extractor;
        this.session = options.session;
        this.mirror = options.mirror;
        this.progress = options.progress;
        this.guard = options.guard;
        this.resume = options.resume ?? true;
        this.reliefPauseMs = options.reliefPauseMs ?? DEFAULT_RELIEF_PAUSE_MS;
        this.extractionTimeoutMs = options.extractionTimeoutMs
            ?? options.session?.getExtractionTimeoutMs()
            ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
        this.now = options.now ?? (() => new Date());
    }

    private resolveStartIndex(total: number): number {
        if (!this.resume || !this.progress) {
            return 0;
        }
        const record = this.progress.load();
        if (!record) {
            return 0;
        }
        if (record.total !== total) {
            console.log(`[BUILD] Ignoring progress record for ${record.total} file(s); ${total} file(s) to process now.`);
            return 0;
        }
        if (record.completed > 0 && record.completed < total) {
            console.log(`[BUILD] Resuming from file ${record.completed + 1}/${total} (record from ${record.timestamp}).`);
            return record.completed;
        }
        return 0;
    }

    /**
     * Extract one file and save its baseline unless the stored one already
     * carries the same fingerprint.
     */
    public async seed(filePath: string): Promise<SeedResult> {
        const key = baselineKeyFor(filePath);

        let previous: Baseline | null = null;
        try {
            previous = await this.store.load(key);
        } catch (error) {
            console.warn(`[BUILD] Existing baseline for ${key} is unreadable and will be replaced: ${describeError(error)}`);
        }

        try {
            const { snapshot, author } = await extractWithTimeout(filePath, {
                extractor: this.extractor,
                timeoutMs: this.extractionTimeoutMs,
                session: this.session,
                mirror: this.mirror,
            });
            const contentHash = fingerprint(snapshot);
            if (previous && previous.contentHash === contentHash) {
                return 'skipped';
            }

            const saved = await this.store.save(key, {
                contentHash,
                lastAuthor: author,
                cells: snapshot,
                timestamp: this.now().toISOString(),
            });
            return saved ? 'created' : 'failed';
        } catch (error) {
            console.warn(`[BUILD] Cannot read ${filePath}: ${describeError(error)}`);
            return 'failed';
        } finally {
            this.guard?.release();
        }
    }

    public async build(files: readonly string[]): Promise<BuildSummary> {
        const total = files.length;
        const startedAt = Date.now();
        const startIndex = this.resolveStartIndex(total);
        const summary: BuildSummary = {
            total,
            startIndex,
            nextIndex: startIndex,
            created: 0,
            skipped: 0,
            failed: 0,
            halted: null,
            durationMs: 0,
        };

        if (total === 0) {
            console.log('[BUILD] No files need a baseline.');
        } else {
            console.log(`[BUILD] Building baselines for ${total - startIndex} of ${total} file(s) into ${this.store.getDirectory()}`);
        }

        for (let index = startIndex; index < total; index += 1) {
            if (this.session?.isStopRequested()) {
                summary.halted = 'stop_requested';
                break;
            }
            const guard = this.guard;
            if (guard && guard.overLimit() && !(await guard.relieve(this.reliefPauseMs))) {
                console.error(`[BUILD] Memory still above ${guard.getLimitMB()}MB after relief; halting at file ${index + 1}/${total}.`);
                summary.halted = 'memory_exhausted';
                break;
            }

            const filePath = files[index];
            const fileStartedAt = Date.now();
            const result = await this.seed(filePath);
            summary[result] += 1;
            summary.nextIndex = index + 1;
            this.progress?.save(index + 1, total);
            console.log(`[BUILD] [${index + 1}/${total}] ${baselineKeyFor(filePath)}: ${result} (${Date.now() - fileStartedAt}ms)`);
        }

        if (summary.halted) {
            this.progress?.save(summary.nextIndex, total);
        } else {
            this.progress?.clear();
        }
        this.session?.markBaselineCompleted();

        summary.durationMs = Date.now() - startedAt;
        console.log(`[BUILD] Done in ${summary.durationMs}ms. Created: ${summary.created}, skipped: ${summary.skipped}, failed: ${summary.failed}${summary.halted ? `, halted: ${summary.halted}` : ''}`);
        return summary;
    }
}
