import * as fsp from 'fs/promises';
import * as path from 'path';
import { FileEvent } from '../types';
import { describeError } from '../errors';
import { BaselineStore } from '../baseline/store';
import { DetectionOutcome, baselineKeyFor } from '../detector/change-detector';
import { SeedResult } from '../detector/baseline-builder';
import { FileFilter } from './file-filter';

export const DEFAULT_DEBOUNCE_MS = 2_000;
export const DEFAULT_CREATE_SETTLE_MS = 100;

export type DispatchAction =
    | 'filtered'
    | 'debounced'
    | 'vanished'
    | 'seeded'
    | 'detected'
    | 'renamed'
    | 'failed';

export interface DispatchResult {
    event: FileEvent;
    action: DispatchAction;
    eventNumber: number | null;
    seed?: SeedResult;
    outcome?: DetectionOutcome;
    error?: string;
}

export interface EventDetector {
    detect(filePath: string, eventNumber?: number): Promise<DetectionOutcome>;
}

export interface EventSeeder {
    seed(filePath: string): Promise<SeedResult>;
}

export interface EventPoller {
    start(filePath: string, eventNumber?: number): Promise<unknown>;
    stop(filePath: string): boolean;
}

export interface EventDispatcherOptions {
    detector: EventDetector;
    seeder: EventSeeder;
    poller: EventPoller;
    store: BaselineStore;
    filter?: FileFilter;
    debounceMs?: number;
    createSettleMs?: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
    exists?: (filePath: string) => Promise<boolean>;
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fsp.access(filePath);
        return true;
    } catch {
        return false;
    }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Turns filesystem events into baseline seeding, detection and polling.
 * Never throws: every failure comes back as a `failed` result.
 */
export class EventDispatcher {
    private readonly detector: EventDetector;
    private readonly seeder: EventSeeder;
    private readonly poller: EventPoller;
    private readonly store: BaselineStore;
    private readonly filter: FileFilter;
    private readonly debounceMs: number;
    private readonly createSettleMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly exists: (filePath: string) => Promise<boolean>;
    private readonly lastAccepted = new Map<string, number>();
    private eventCounter = 0;

    constructor(options: EventDispatcherOptions) {
        this.detector = options.detector;
        this.seeder = options.seeder;
        this.poller = options.poller;
        this.store = options.store;
        this.filter = options.filter ?? new FileFilter();
        this.debounceMs = Math.max(0, options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
        this.createSettleMs = Math.max(0, options.createSettleMs ?? DEFAULT_CREATE_SETTLE_MS);
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
        this.exists = options.exists ?? fileExists;
    }

    public getEventCount(): number {
        return this.eventCounter;
    }

    /** Paths still inside their debounce window. */
    public getDebouncedPathCount(): number {
        return this.lastAccepted.size;
    }

    public async dispatch(event: FileEvent): Promise<DispatchResult> {
        if (!this.filter.accepts(event.path)) {
            return { event, action: 'filtered', eventNumber: null };
        }

        if (event.kind === 'modified' && this.isDebounced(event.path)) {
            return { event, action: 'debounced', eventNumber: null };
        }

        this.eventCounter += 1;
        const eventNumber = this.eventCounter;
        try {
            switch (event.kind) {
                case 'created':
                    return await this.handleCreated(event, eventNumber);
                case 'modified':
                    return await this.handleModified(event, eventNumber);
                case 'moved_to':
                    return await this.handleMoved(event, eventNumber);
            }
        } catch (error) {
            console.error(`[DISPATCH] Event #${eventNumber} (${event.kind} ${event.path}) failed: ${describeError(error)}`);
            return { event, action: 'failed', eventNumber, error: describeError(error) };
        }
    }

    private isDebounced(filePath: string): boolean {
        const now = this.now();
        const last = this.lastAccepted.get(filePath);
        if (last !== undefined && now - last < this.debounceMs) {
            return true;
        }
        // Entries outside the window can no longer debounce anything.
        for (const [trackedPath, acceptedAt] of this.lastAccepted) {
            if (now - acceptedAt >= this.debounceMs) {
                this.lastAccepted.delete(trackedPath);
            }
        }
        this.lastAccepted.set(filePath, now);
        return false;
    }

    private async handleCreated(event: FileEvent, eventNumber: number): Promise<DispatchResult> {
        // A file created and renamed straight away is handled by the move.
        await this.sleep(this.createSettleMs);
        if (!(await this.exists(event.path))) {
            return { event, action: 'vanished', eventNumber };
        }

        console.log(`[DISPATCH] #${eventNumber} New file ${path.basename(event.path)}, creating baseline.`);
        const seed = await this.seeder.seed(event.path);
        return { event, action: 'seeded', eventNumber, seed };
    }

    private async detectAndPoll(event: FileEvent, filePath: string, eventNumber: number): Promise<DispatchResult> {
        const outcome = await this.detector.detect(filePath, eventNumber);
        let result: DispatchResult;
        if (outcome.kind === 'no_baseline') {
            const seed = await this.seeder.seed(filePath);
            result = { event, action: 'seeded', eventNumber, seed, outcome };
        } else {
            result = { event, action: 'detected', eventNumber, outcome };
        }

        try {
            await this.poller.start(filePath, eventNumber);
        } catch (error) {
            console.error(`[DISPATCH] Could not start polling ${filePath}: ${describeError(error)}`);
        }
        return result;
    }

    private async handleModified(event: FileEvent, eventNumber: number): Promise<DispatchResult> {
        console.log(`[DISPATCH] #${eventNumber} Change in ${path.basename(event.path)}, checking now.`);
        return this.detectAndPoll(event, event.path, eventNumber);
    }

    private async handleMoved(event: Extract<FileEvent, { kind: 'moved_to' }>, eventNumber: number): Promise<DispatchResult> {
        const fromKey = baselineKeyFor(event.oldPath);
        const toKey = baselineKeyFor(event.path);
        console.log(`[DISPATCH] #${eventNumber} Moved ${fromKey} -> ${toKey}`);
        this.poller.stop(event.oldPath);

        if (await this.store.has(fromKey)) {
            await this.store.rename(fromKey, toKey);
            return { event, action: 'renamed', eventNumber };
        }

        // Saved via a scratch file renamed over the original: an edit of the destination.
        if (await this.store.has(toKey)) {
            return this.detectAndPoll(event, event.path, eventNumber);
        }

        const seed = await this.seeder.seed(event.path);
        return { event, action: 'seeded', eventNumber, seed };
    }
}
