import type { Stats } from 'fs';
import chokidar, { FSWatcher } from 'chokidar';
import { describeError, FileEvent, FileFilter } from '@sheetsentry/core';
import { DEFAULT_RENAME_WINDOW_MS, RenameCorrelator } from './rename-correlator';

export interface ChokidarEventSourceOptions {
    roots: readonly string[];
    filter: FileFilter;
    onEvent: (event: FileEvent) => Promise<unknown>;
    renameWindowMs?: number;
    usePolling?: boolean;
    pollIntervalMs?: number;
}

/**
 * Feeds chokidar events through rename correlation into `onEvent`. Events
 * for the same path are handled one after another; different paths run
 * concurrently. Every file is watched, not only spreadsheets, because editors
 * save through scratch files whose renames decide what happened.
 */
export class ChokidarEventSource {
    private readonly roots: readonly string[];
    private readonly filter: FileFilter;
    private readonly onEvent: (event: FileEvent) => Promise<unknown>;
    private readonly usePolling: boolean;
    private readonly pollIntervalMs: number;
    private readonly correlator: RenameCorrelator;
    private readonly chains = new Map<string, Promise<void>>();
    private watcher: FSWatcher | null = null;
    private ready = false;

    constructor(options: ChokidarEventSourceOptions) {
        this.roots = options.roots;
        this.filter = options.filter;
        this.onEvent = options.onEvent;
        this.usePolling = options.usePolling ?? false;
        this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
        this.correlator = new RenameCorrelator({
            windowMs: options.renameWindowMs ?? DEFAULT_RENAME_WINDOW_MS,
            emit: (event) => this.enqueue(event),
        });
    }

    public isWatching(): boolean {
        return this.watcher !== null;
    }

    /** Resolves once the initial scan has finished and events are live. */
    public async start(): Promise<void> {
        if (this.watcher) {
            return;
        }

        const watcher = chokidar.watch([...this.roots], {
            persistent: true,
            ignoreInitial: false,
            alwaysStat: true,
            usePolling: this.usePolling,
            interval: this.pollIntervalMs,
            ignored: (watchPath: string, stats?: Stats) => stats?.isDirectory() === true && this.filter.isIgnoredDirectory(watchPath),
        });
        this.watcher = watcher;

        watcher
            .on('add', (filePath: string, stats?: Stats) => this.handleAdd(filePath, stats))
            .on('change', (filePath: string, stats?: Stats) => {
                if (stats) {
                    this.correlator.onChange(filePath, stats);
                } else {
                    this.enqueue({ kind: 'modified', path: filePath });
                }
            })
            .on('unlink', (filePath: string) => this.correlator.onUnlink(filePath))
            .on('error', (error: unknown) => {
                console.error(`[WATCH] Watcher error: ${describeError(error)}`);
            });

        await new Promise<void>((resolve) => {
            watcher.once('ready', () => resolve());
        });
        this.ready = true;
        console.log(`[WATCH] Watching ${this.roots.join(', ')}${this.usePolling ? ` (polling every ${this.pollIntervalMs}ms)` : ''}`);
    }

    private handleAdd(filePath: string, stats?: Stats): void {
        if (!this.ready) {
            // Initial scan: learn identities for rename pairing, emit nothing.
            if (stats) {
                this.correlator.remember(filePath, stats);
            }
            return;
        }
        if (stats) {
            this.correlator.onAdd(filePath, stats);
        } else {
            this.enqueue({ kind: 'created', path: filePath });
        }
    }

    private enqueue(event: FileEvent): void {
        const previous = this.chains.get(event.path) ?? Promise.resolve();
        const next = previous
            .then(() => this.onEvent(event))
            .then(
                () => undefined,
                (error: unknown) => {
                    console.error(`[WATCH] Handling ${event.kind} ${event.path} failed: ${describeError(error)}`);
                },
            )
            .finally(() => {
                if (this.chains.get(event.path) === next) {
                    this.chains.delete(event.path);
                }
            });
        this.chains.set(event.path, next);
    }

    /** Stop watching and wait for handlers already running. */
    public async close(): Promise<void> {
        const watcher = this.watcher;
        this.watcher = null;
        this.ready = false;
        this.correlator.dispose();
        if (watcher) {
            try {
                await watcher.close();
            } catch (error) {
                console.error(`[WATCH] Failed to close watcher: ${describeError(error)}`);
            }
        }
        await Promise.all([...this.chains.values()]);
    }
}
