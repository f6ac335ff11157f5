import {
    AdaptivePollingScheduler,
    BaselineBuilder,
    BaselineStore,
    BuildSummary,
    ChangeDetector,
    ChangeSink,
    DispatchResult,
    EventDispatcher,
    FileEvent,
    FileFilter,
    MonitoringSession,
    ProgressTracker,
    ResourceGuard,
    SpreadsheetExtractor,
} from '@sheetsentry/core';
import { MonitorConfig } from './config';
import { LocalFileMirror } from './cache/local-mirror';
import { discoverSpreadsheets } from './discovery';
import { ExcelJsExtractor } from './extractor/exceljs-extractor';
import { ConsoleChangeSink, CsvAuditSink, MultiSink } from './sink/csv-audit-sink';
import { ChokidarEventSource } from './watcher/chokidar-source';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MonitorOverrides {
    extractor?: SpreadsheetExtractor;
    sink?: ChangeSink;
}

/**
 * The monitoring process: start-up recovery and scan, then live watching
 * with immediate detection and adaptive follow-up polling.
 */
export class SpreadsheetMonitor {
    private readonly config: MonitorConfig;
    private readonly session: MonitoringSession;
    private readonly store: BaselineStore;
    private readonly filter: FileFilter;
    private readonly builder: BaselineBuilder;
    private readonly scheduler: AdaptivePollingScheduler;
    private readonly dispatcher: EventDispatcher;
    private source: ChokidarEventSource | null = null;

    constructor(config: MonitorConfig, overrides: MonitorOverrides = {}) {
        this.config = config;
        this.session = new MonitoringSession({
            extractionTimeoutMs: config.extractionTimeoutMs,
            watchdogIntervalMs: config.watchdogIntervalMs,
        });
        this.store = new BaselineStore({
            directory: config.baselineDir,
            defaultCodec: config.baselineCodec,
            maxAttempts: config.saveMaxAttempts,
            retryBaseDelayMs: config.saveRetryDelayMs,
        });
        this.filter = new FileFilter({ roots: config.watchFolders, ignorePatterns: config.ignorePatterns });

        const extractor = overrides.extractor ?? new ExcelJsExtractor();
        const mirror = config.useLocalCache ? new LocalFileMirror(config.cacheDir) : undefined;
        const sink = overrides.sink ?? this.createSink();

        const detector = new ChangeDetector({
            store: this.store,
            extractor,
            sink,
            session: this.session,
            mirror,
            policy: {
                excludedKinds: config.excludedKinds,
                ignoredAuthors: config.ignoredAuthors,
                persistUnreportedChanges: config.persistUnreportedChanges,
            },
            refreshAuthorOnUnchanged: config.refreshAuthorOnUnchanged,
            extractionTimeoutMs: config.extractionTimeoutMs,
        });
        this.builder = new BaselineBuilder({
            store: this.store,
            extractor,
            session: this.session,
            mirror,
            progress: new ProgressTracker(config.progressFile),
            guard: new ResourceGuard({ limitMB: config.memoryLimitMB }),
            resume: config.resumeScan,
            reliefPauseMs: config.reliefPauseMs,
            extractionTimeoutMs: config.extractionTimeoutMs,
        });
        this.scheduler = new AdaptivePollingScheduler({
            detector,
            session: this.session,
            sizeThresholdBytes: config.pollSizeThresholdMB * 1024 * 1024,
            denseIntervalMs: config.denseIntervalMs,
            denseBudgetMs: config.denseBudgetMs,
            sparseIntervalMs: config.sparseIntervalMs,
            maxConsecutiveFailures: config.pollMaxFailures,
        });
        this.dispatcher = new EventDispatcher({
            detector,
            seeder: this.builder,
            poller: this.scheduler,
            store: this.store,
            filter: this.filter,
            debounceMs: config.debounceMs,
            createSettleMs: config.createSettleMs,
        });
    }

    private createSink(): ChangeSink {
        const sinks: ChangeSink[] = [new CsvAuditSink({ logDir: this.config.logDir })];
        if (this.config.consoleReport) {
            sinks.push(new ConsoleChangeSink());
        }
        return new MultiSink(sinks);
    }

    public getStore(): BaselineStore {
        return this.store;
    }

    public getScheduler(): AdaptivePollingScheduler {
        return this.scheduler;
    }

    /**
     * Crash recovery, the optional start-up scan and baseline archiving.
     * Returns the scan summary, or null when the scan is disabled.
     */
    public async prepare(): Promise<BuildSummary | null> {
        if (this.config.watchFolders.length === 0) {
            throw new Error('No watch folders configured. Set SHEETSENTRY_WATCH_FOLDERS.');
        }

        const recovery = await this.store.recover();
        if (recovery.restoredBackups + recovery.removedBackups + recovery.removedTempFiles > 0) {
            console.log(`[MONITOR] Recovered baseline store: ${JSON.stringify(recovery)}`);
        }
        this.session.startWatchdog();

        let summary: BuildSummary | null = null;
        if (this.config.scanOnStartup) {
            const files = await discoverSpreadsheets(this.config.watchFolders, this.filter);
            summary = await this.builder.build(files);
            if (summary.halted === 'memory_exhausted') {
                console.warn('[MONITOR] Start-up scan stopped on memory pressure; remaining files are seeded on their first event.');
            }
        } else {
            this.session.markBaselineCompleted();
        }

        if (this.config.archiveAfterDays > 0 && !this.session.isStopRequested()) {
            const archived = await this.store.archiveInactive(this.config.archiveAfterDays * DAY_MS, this.config.archiveCodec);
            if (archived.length > 0) {
                console.log(`[MONITOR] Archived ${archived.length} idle baseline(s) as ${this.config.archiveCodec}`);
            }
        }
        return summary;
    }

    public handleEvent(event: FileEvent): Promise<DispatchResult> {
        return this.dispatcher.dispatch(event);
    }

    public async watch(): Promise<void> {
        if (this.source || this.session.isStopRequested()) {
            return;
        }
        const source = new ChokidarEventSource({
            roots: this.config.watchFolders,
            filter: this.filter,
            onEvent: (event) => this.handleEvent(event),
            renameWindowMs: this.config.renameWindowMs,
            usePolling: this.config.watchUsePolling,
            pollIntervalMs: this.config.watchPollIntervalMs,
        });
        this.source = source;
        await source.start();
        console.log('[MONITOR] Monitoring started. Press Ctrl+C to stop.');
    }

    public async start(): Promise<void> {
        await this.prepare();
        await this.watch();
    }

    public async shutdown(): Promise<void> {
        console.log('[MONITOR] Shutting down...');
        this.session.requestStop();
        const source = this.source;
        this.source = null;
        if (source) {
            await source.close();
        }
        await this.scheduler.stopAll();
        console.log('[MONITOR] Stopped.');
    }
}
