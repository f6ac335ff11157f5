export const DEFAULT_EXTRACTION_TIMEOUT_MS = 120_000;
export const DEFAULT_WATCHDOG_INTERVAL_MS = 10_000;

export interface ProcessingMarker {
    filePath: string;
    startedAt: number;
}

export interface MonitoringSessionOptions {
    extractionTimeoutMs?: number;
    watchdogIntervalMs?: number;
    now?: () => number;
}

/**
 * Run-wide state shared by the builder, detector and scheduler: the stop
 * signal, whether the start-up baseline pass finished, and which files are
 * being read right now.
 */
export class MonitoringSession {
    private readonly extractionTimeoutMs: number;
    private readonly watchdogIntervalMs: number;
    private readonly now: () => number;
    private readonly processing = new Map<string, number>();
    private stopRequested = false;
    private baselineCompleted = false;
    private watchdog: ReturnType<typeof setInterval> | null = null;

    constructor(options: MonitoringSessionOptions = {}) {
        this.extractionTimeoutMs = options.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
        this.watchdogIntervalMs = options.watchdogIntervalMs ?? DEFAULT_WATCHDOG_INTERVAL_MS;
        this.now = options.now ?? Date.now;
    }

    public getExtractionTimeoutMs(): number {
        return this.extractionTimeoutMs;
    }

    public requestStop(): void {
        if (!this.stopRequested) {
            console.log('[SESSION] Stop requested.');
        }
        this.stopRequested = true;
        this.stopWatchdog();
    }

    public isStopRequested(): boolean {
        return this.stopRequested;
    }

    public markBaselineCompleted(): void {
        this.baselineCompleted = true;
    }

    public isBaselineCompleted(): boolean {
        return this.baselineCompleted;
    }

    public beginProcessing(filePath: string): void {
        this.processing.set(filePath, this.now());
    }

    public endProcessing(filePath: string): void {
        this.processing.delete(filePath);
    }

    public isProcessing(filePath: string): boolean {
        return this.processing.has(filePath);
    }

    public processingMarkers(): ProcessingMarker[] {
        return Array.from(this.processing, ([filePath, startedAt]) => ({ filePath, startedAt }));
    }

    public findStalled(now: number = this.now()): ProcessingMarker[] {
        return this.processingMarkers().filter((marker) => now - marker.startedAt > this.extractionTimeoutMs);
    }

    /** Report and clear markers that outlived the extraction timeout. */
    public sweepStalled(now: number = this.now()): ProcessingMarker[] {
        const stalled = this.findStalled(now);
        for (const marker of stalled) {
            const elapsedSec = ((now - marker.startedAt) / 1000).toFixed(1);
            console.warn(`[SESSION] Processing timed out: ${marker.filePath} (${elapsedSec}s > ${this.extractionTimeoutMs / 1000}s)`);
            this.processing.delete(marker.filePath);
        }
        return stalled;
    }

    public startWatchdog(): void {
        if (this.watchdog || this.stopRequested) {
            return;
        }
        this.watchdog = setInterval(() => {
            this.sweepStalled();
        }, this.watchdogIntervalMs);
        this.watchdog.unref();
    }

    public stopWatchdog(): void {
        if (this.watchdog) {
            clearInterval(this.watchdog);
            this.watchdog = null;
        }
    }

    public isWatchdogRunning(): boolean {
        return this.watchdog !== null;
    }
}
