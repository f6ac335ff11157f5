import { FileEvent } from '@sheetsentry/core';

export const DEFAULT_RENAME_WINDOW_MS = 1_000;

export interface FileIdentityStats {
    dev: number;
    ino: number;
    size: number;
    mtimeMs: number;
}

/**
 * Device and inode where the filesystem has them; size and mtime otherwise
 * (some network shares report inode 0).
 */
export function identityKey(stats: FileIdentityStats): string {
    if (stats.ino > 0) {
        return `ino:${stats.dev}:${stats.ino}`;
    }
    return `meta:${stats.size}:${Math.trunc(stats.mtimeMs)}`;
}

interface PendingUnlink {
    path: string;
    timer: ReturnType<typeof setTimeout>;
}

export interface RenameCorrelatorOptions {
    emit: (event: FileEvent) => void;
    windowMs?: number;
}

/**
 * Rebuilds moves from the unlink + add pairs a watcher reports. An unlink is
 * held for `windowMs`; an add of the same file identity inside the window
 * becomes `moved_to`, otherwise the add is `created` and the unlink is dropped.
 */
export class RenameCorrelator {
    private readonly emit: (event: FileEvent) => void;
    private readonly windowMs: number;
    private readonly identities = new Map<string, string>();
    private readonly pending = new Map<string, PendingUnlink[]>();

    constructor(options: RenameCorrelatorOptions) {
        this.emit = options.emit;
        this.windowMs = Math.max(0, options.windowMs ?? DEFAULT_RENAME_WINDOW_MS);
    }

    /** Record a file's identity without emitting anything (initial scan). */
    public remember(filePath: string, stats: FileIdentityStats): void {
        this.identities.set(filePath, identityKey(stats));
    }

    public onAdd(filePath: string, stats: FileIdentityStats): void {
        const key = identityKey(stats);
        this.identities.set(filePath, key);

        const source = this.takePending(key);
        if (!source) {
            this.emit({ kind: 'created', path: filePath });
        } else if (source === filePath) {
            this.emit({ kind: 'modified', path: filePath });
        } else {
            this.emit({ kind: 'moved_to', path: filePath, oldPath: source });
        }
    }

    public onChange(filePath: string, stats: FileIdentityStats): void {
        this.identities.set(filePath, identityKey(stats));
        this.emit({ kind: 'modified', path: filePath });
    }

    public onUnlink(filePath: string): void {
        const key = this.identities.get(filePath);
        this.identities.delete(filePath);
        if (key === undefined) {
            return;
        }

        const entry: PendingUnlink = {
            path: filePath,
            timer: setTimeout(() => {
                this.dropPending(key, entry);
            }, this.windowMs),
        };
        entry.timer.unref();
        const queue = this.pending.get(key) ?? [];
        queue.push(entry);
        this.pending.set(key, queue);
    }

    public pendingCount(): number {
        let count = 0;
        for (const queue of this.pending.values()) {
            count += queue.length;
        }
        return count;
    }

    public dispose(): void {
        for (const queue of this.pending.values()) {
            for (const entry of queue) {
                clearTimeout(entry.timer);
            }
        }
        this.pending.clear();
        this.identities.clear();
    }

    private takePending(key: string): string | null {
        const queue = this.pending.get(key);
        const entry = queue?.shift();
        if (!queue || !entry) {
            return null;
        }
        clearTimeout(entry.timer);
        if (queue.length === 0) {
            this.pending.delete(key);
        }
        return entry.path;
    }

    private dropPending(key: string, entry: PendingUnlink): void {
        const queue = this.pending.get(key);
        if (!queue) {
            return;
        }
        const remaining = queue.filter((candidate) => candidate !== entry);
        if (remaining.length === 0) {
            this.pending.delete(key);
        } else {
            this.pending.set(key, remaining);
        }
    }
}
