import * as path from 'path';
import {
    Baseline,
    CellChange,
    ChangeKind,
    ChangeRecord,
    ChangeSink,
    LocalCacheMirror,
    SpreadsheetExtractor,
    WorkbookSnapshot,
} from '../types';
import { asMonitorError, describeError, MonitorError } from '../errors';
import { BaselineStore } from '../baseline/store';
import { fingerprint } from '../fingerprint/fingerprint';
import { diff } from '../fingerprint/differ';
import { MonitoringSession, DEFAULT_EXTRACTION_TIMEOUT_MS } from '../session';
import { extractWithTimeout } from './extraction';

export type DetectionOutcomeKind =
    | 'no_baseline'
    | 'extract_failed'
    | 'no_change'
    | 'changes_found'
    | 'emit_failed';

export interface DetectionOutcome {
    kind: DetectionOutcomeKind;
    filePath: string;
    key: string;
    /** True whenever the workbook differs from its baseline; drives polling extension. */
    changesFound: boolean;
    changes: CellChange[];
    /** Rows handed to the sink after the reporting policy. */
    reported: ChangeRecord[];
    baselineSaved: boolean;
    /** Equal fingerprints, no worksheet diff was run. */
    fastPath: boolean;
    /** The caller joined a detection already running for this path. */
    coalesced: boolean;
    error?: MonitorError;
}

export interface ReportingPolicy {
    /** Change kinds absorbed into the baseline without an audit row. */
    excludedKinds?: readonly ChangeKind[];
    /** Authors whose edits are absorbed into the baseline without audit rows. */
    ignoredAuthors?: readonly string[];
    /** Refresh the baseline even when every change was filtered out. Default true. */
    persistUnreportedChanges?: boolean;
}

export interface ChangeDetectorOptions {
    store: BaselineStore;
    extractor: SpreadsheetExtractor;
    sink: ChangeSink;
    session?: MonitoringSession;
    mirror?: LocalCacheMirror;
    policy?: ReportingPolicy;
    refreshAuthorOnUnchanged?: boolean;
    extractionTimeoutMs?: number;
    now?: () => Date;
}

export function baselineKeyFor(filePath: string): string {
    return path.basename(filePath);
}

export function toChangeRecord(filename: string, change: CellChange, author: string | null, timestamp: string): ChangeRecord {
    return {
        timestamp,
        filename,
        worksheet: change.worksheet,
        address: change.address,
        oldValue: change.oldCell?.value ?? null,
        oldFormula: change.oldCell?.formula ?? null,
        newValue: change.newCell?.value ?? null,
        newFormula: change.newCell?.formula ?? null,
        author,
        kind: change.kind,
    };
}

/**
 * Compares a file against its baseline, reports cell-level changes to the
 * sink and then replaces the baseline. Rows are always emitted before the
 * baseline moves forward; if the sink fails the old baseline stays so the
 * next cycle sees the same changes again.
 */
export class ChangeDetector {
    private readonly store: BaselineStore;
    private readonly extractor: SpreadsheetExtractor;
    private readonly sink: ChangeSink;
    private readonly session?: MonitoringSession;
    private readonly mirror?: LocalCacheMirror;
    private readonly excludedKinds: Set<ChangeKind>;
    private readonly ignoredAuthors: Set<string>;
    private readonly persistUnreportedChanges: boolean;
    private readonly refreshAuthorOnUnchanged: boolean;
    private readonly extractionTimeoutMs: number;
    private readonly now: () => Date;
    private readonly inFlight = new Map<string, Promise<DetectionOutcome>>();

    constructor(options: ChangeDetectorOptions) {
        this.store = options.store;
        this.extractor = options.extractor;
        this.sink = options.sink;
        this.session = options.session;
        this.mirror = options.mirror;
        this.excludedKinds = new Set(options.policy?.excludedKinds ?? []);
        this.ignoredAuthors = new Set((options.policy?.ignoredAuthors ?? []).map((author) => author.toLowerCase()));
        this.persistUnreportedChanges = options.policy?.persistUnreportedChanges ?? true;
        this.refreshAuthorOnUnchanged = options.refreshAuthorOnUnchanged ?? false;
        this.extractionTimeoutMs = options.extractionTimeoutMs
            ?? options.session?.getExtractionTimeoutMs()
            ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
        this.now = options.now ?? (() => new Date());
    }

    public isDetecting(filePath: string): boolean {
        return this.inFlight.has(filePath);
    }

    /**
     * Run one detection cycle. Concurrent calls for the same path share the
     * cycle already running instead of starting a second one.
     */
    public async detect(filePath: string, eventNumber?: number): Promise<DetectionOutcome> {
        const running = this.inFlight.get(filePath);
        if (running) {
            console.log(`[DETECT] Joining in-flight detection for ${filePath}`);
            const outcome = await running;
            return { ...outcome, coalesced: true };
        }

        const cycle = (async () => {
            try {
                return await this.runCycle(filePath, eventNumber);
            } finally {
                this.inFlight.delete(filePath);
            }
        })();
        this.inFlight.set(filePath, cycle);
        return cycle;
    }

    private outcome(kind: DetectionOutcomeKind, filePath: string, extra: Partial<DetectionOutcome> = {}): DetectionOutcome {
        return {
            kind,
            filePath,
            key: baselineKeyFor(filePath),
            changesFound: false,
            changes: [],
            reported: [],
            baselineSaved: false,
            fastPath: false,
            coalesced: false,
            ...extra,
        };
    }

    private isReportable(change: CellChange, author: string | null): boolean {
        if (this.excludedKinds.has(change.kind)) {
            return false;
        }
        return author === null || !this.ignoredAuthors.has(author.toLowerCase());
    }

    private async runCycle(filePath: string, eventNumber?: number): Promise<DetectionOutcome> {
        const key = baselineKeyFor(filePath);
        const tag = eventNumber === undefined ? key : `${key} (event #${eventNumber})`;

        let baseline: Baseline | null;
        try {
            baseline = await this.store.load(key);
        } catch (error) {
            const monitorError = asMonitorError(error, filePath);
            console.warn(`[DETECT] Baseline for ${tag} is unusable (${monitorError.kind}): ${monitorError.message}`);
            return this.outcome('no_baseline', filePath, { error: monitorError });
        }
        if (!baseline) {
            console.log(`[DETECT] No baseline for ${tag}`);
            return this.outcome('no_baseline', filePath);
        }

        let snapshot: WorkbookSnapshot;
        let freshAuthor: string | null;
        try {
            const extracted = await extractWithTimeout(filePath, {
                extractor: this.extractor,
                timeoutMs: this.extractionTimeoutMs,
                session: this.session,
                mirror: this.mirror,
            });
            snapshot = extracted.snapshot;
            freshAuthor = extracted.author;
        } catch (error) {
            const monitorError = asMonitorError(error, filePath);
            console.warn(`[DETECT] Cannot read ${tag} (${monitorError.kind}): ${monitorError.message}`);
            return this.outcome('extract_failed', filePath, { error: monitorError });
        }

        const contentHash = fingerprint(snapshot);
        const timestamp = this.now().toISOString();

        if (contentHash === baseline.contentHash) {
            let baselineSaved = false;
            if (this.refreshAuthorOnUnchanged && freshAuthor !== null && freshAuthor !== baseline.lastAuthor) {
                baselineSaved = await this.store.save(key, { ...baseline, lastAuthor: freshAuthor, timestamp });
            }
            return this.outcome('no_change', filePath, { fastPath: true, baselineSaved });
        }

        const nextBaseline: Baseline = { contentHash, lastAuthor: freshAuthor ?? baseline.lastAuthor, cells: snapshot, timestamp };
        const changes = diff(baseline.cells, snapshot);

        if (changes.length === 0) {
            // Same cells under a different hash: a baseline written by an older hashing scheme.
            const baselineSaved = await this.store.save(key, nextBaseline);
            console.log(`[DETECT] ${tag}: content unchanged, baseline fingerprint refreshed.`);
            return this.outcome('no_change', filePath, { baselineSaved });
        }

        const author = freshAuthor ?? baseline.lastAuthor;
        const reported = changes
            .filter((change) => this.isReportable(change, author))
            .map((change) => toChangeRecord(key, change, author, timestamp));

        if (reported.length > 0) {
            try {
                await this.sink.record(reported);
            } catch (error) {
                console.error(`[DETECT] Audit sink rejected ${reported.length} change(s) for ${tag}; baseline kept: ${describeError(error)}`);
                return this.outcome('emit_failed', filePath, {
                    changesFound: true,
                    changes,
                    error: new MonitorError('persist_failure', describeError(error), filePath, { cause: error }),
                });
            }
        }

        let baselineSaved = false;
        if (reported.length > 0 || this.persistUnreportedChanges) {
            baselineSaved = await this.store.save(key, nextBaseline);
            if (!baselineSaved) {
                console.error(`[DETECT] Baseline for ${tag} could not be saved; changes may be reported again next cycle.`);
            }
        }

        console.log(`[DETECT] ${tag}: ${changes.length} change(s), ${reported.length} reported.`);
        return this.outcome('changes_found', filePath, { changesFound: true, changes, reported, baselineSaved });
    }
}
