import * as fsp from 'fs/promises';
import * as path from 'path';
import { Baseline } from '../types';
import { asMonitorError, describeError, MonitorError } from '../errors';
import { BaselineCodec, CODEC_PRIORITY, CodecName, getCodec, parseArtifactName } from './codecs';
import { parseBaseline, serializeBaseline } from './artifact';

/**
 * The subset of fs/promises the store writes through. Swappable so failure
 * paths (a move that never happens, a full disk) can be exercised.
 */
export interface StoreFileSystem {
    readFile(filePath: string): Promise<Buffer>;
    writeDurable(filePath: string, data: Buffer): Promise<void>;
    copyFile(source: string, destination: string): Promise<void>;
    rename(source: string, destination: string): Promise<void>;
    unlink(filePath: string): Promise<void>;
    readdir(directory: string): Promise<string[]>;
    stat(filePath: string): Promise<{ mtimeMs: number; size: number }>;
    mkdir(directory: string): Promise<void>;
}

export const nodeStoreFileSystem: StoreFileSystem = {
    readFile: (filePath) => fsp.readFile(filePath),
    async writeDurable(filePath, data) {
        const handle = await fsp.open(filePath, 'wx');
        try {
            await handle.writeFile(data);
            await handle.sync();
        } finally {
            await handle.close();
        }
    },
    copyFile: (source, destination) => fsp.copyFile(source, destination),
    rename: (source, destination) => fsp.rename(source, destination),
    unlink: (filePath) => fsp.unlink(filePath),
    readdir: (directory) => fsp.readdir(directory),
    async stat(filePath) {
        const stats = await fsp.stat(filePath);
        return { mtimeMs: stats.mtimeMs, size: stats.size };
    },
    async mkdir(directory) {
        await fsp.mkdir(directory, { recursive: true });
    },
};

export interface BaselineStoreOptions {
    directory: string;
    defaultCodec?: CodecName;
    maxAttempts?: number;
    retryBaseDelayMs?: number;
    fileSystem?: StoreFileSystem;
    sleep?: (ms: number) => Promise<void>;
}

export interface BaselineArtifactInfo {
    key: string;
    codec: CodecName;
    filePath: string;
    mtimeMs: number;
    size: number;
}

export interface RecoveryReport {
    restoredBackups: number;
    removedBackups: number;
    removedTempFiles: number;
}

const TEMP_MARKER = '.tmp-';
const BACKUP_MARKER = '.backup-';

function isNotFound(error: unknown): boolean {
    return asMonitorError(error).kind === 'not_found';
}

// `<artifact>.tmp-<pid>-<ms>-<hex>`, matching what uniqueSuffix writes.
const SCRATCH_PATTERN = /^(.+)\.(tmp|backup)-\d+-\d+-[0-9a-f]+$/;

interface ScratchFile {
    kind: 'temp' | 'backup';
    /** Artifact file name the scratch file was written for. */
    target: string;
}

function parseScratchName(entry: string): ScratchFile | null {
    const match = SCRATCH_PATTERN.exec(entry);
    if (!match || !parseArtifactName(match[1])) {
        return null;
    }
    return { kind: match[2] === 'tmp' ? 'temp' : 'backup', target: match[1] };
}

function uniqueSuffix(): string {
    return `${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2, 10)}`;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Durable per-file baselines, one artifact per key. Writes go through
 * temp file -> verify -> backup -> move, so a crash at any point leaves either
 * the previous artifact or the new one loadable.
 *
 * Concurrent writers to the same key are not coordinated here; callers keep a
 * single writer per file.
 */
export class BaselineStore {
    private readonly directory: string;
    private readonly defaultCodec: BaselineCodec;
    private readonly maxAttempts: number;
    private readonly retryBaseDelayMs: number;
    private readonly fs: StoreFileSystem;
    private readonly sleep: (ms: number) => Promise<void>;
    private directoryReady = false;

    constructor(options: BaselineStoreOptions) {
        this.directory = path.resolve(options.directory);
        this.defaultCodec = getCodec(options.defaultCodec ?? 'gzip');
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
        this.retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? 200);
        this.fs = options.fileSystem ?? nodeStoreFileSystem;
        this.sleep = options.sleep ?? defaultSleep;
    }

    public getDirectory(): string {
        return this.directory;
    }

    public getDefaultCodec(): CodecName {
        return this.defaultCodec.name;
    }

    public artifactPath(key: string, codec: CodecName = this.defaultCodec.name): string {
        return path.join(this.directory, `${key}${getCodec(codec).extension}`);
    }

    private async ensureDirectory(): Promise<void> {
        if (this.directoryReady) {
            return;
        }
        await this.fs.mkdir(this.directory);
        this.directoryReady = true;
    }

    private async exists(filePath: string): Promise<boolean> {
        try {
            await this.fs.stat(filePath);
            return true;
        } catch (error) {
            if (isNotFound(error)) {
                return false;
            }
            throw error;
        }
    }

    private async findArtifact(key: string): Promise<{ codec: BaselineCodec; filePath: string } | null> {
        for (const codec of CODEC_PRIORITY) {
            const filePath = this.artifactPath(key, codec.name);
            if (await this.exists(filePath)) {
                return { codec, filePath };
            }
        }
        return null;
    }

    private async readArtifact(key: string, codec: BaselineCodec, filePath: string): Promise<Baseline> {
        let data: Buffer;
        try {
            data = await this.fs.readFile(filePath);
        } catch (error) {
            throw asMonitorError(error, filePath);
        }

        try {
            const decoded = parseBaseline(codec.decode(data));
            if (decoded.legacy) {
                console.log(`[BASELINE] Loaded legacy artifact for '${key}'; it will be rewritten as v2 on next save.`);
            }
            return decoded.baseline;
        } catch (error) {
            throw new MonitorError('corrupt', `Baseline artifact for '${key}' is unreadable: ${describeError(error)}`, filePath, { cause: error });
        }
    }

    /**
     * Load the baseline for a key from whichever codec wrote it.
     * Returns null when no artifact exists.
     */
    public async load(key: string): Promise<Baseline | null> {
        const found = await this.findArtifact(key);
        if (!found) {
            return null;
        }
        return this.readArtifact(key, found.codec, found.filePath);
    }

    public async has(key: string): Promise<boolean> {
        return (await this.findArtifact(key)) !== null;
    }

    private async tryUnlink(filePath: string, label: string): Promise<boolean> {
        try {
            await this.fs.unlink(filePath);
            return true;
        } catch (error) {
            if (!isNotFound(error)) {
                console.warn(`[BASELINE] Failed to remove ${label} ${filePath}: ${describeError(error)}`);
            }
            return false;
        }
    }

    /**
     * One attempt of the replace protocol. Throws on failure after restoring
     * the previous artifact and removing the temp file.
     */
    private async replaceArtifact(key: string, baseline: Baseline, codec: BaselineCodec): Promise<void> {
        const targetPath = this.artifactPath(key, codec.name);
        const suffix = uniqueSuffix();
        const tempPath = `${targetPath}${TEMP_MARKER}${suffix}`;
        let backupPath: string | null = null;
        let originalRemoved = false;

        try {
            await this.fs.writeDurable(tempPath, codec.encode(serializeBaseline(baseline)));

            // Verify before the temp file can replace anything.
            const written = parseBaseline(codec.decode(await this.fs.readFile(tempPath)));
            if (written.baseline.contentHash !== baseline.contentHash) {
                throw new Error(`Verification mismatch for temp artifact ${tempPath}`);
            }

            if (await this.exists(targetPath)) {
                backupPath = `${targetPath}${BACKUP_MARKER}${suffix}`;
                await this.fs.copyFile(targetPath, backupPath);
                await this.fs.unlink(targetPath);
                originalRemoved = true;
            }

            await this.fs.rename(tempPath, targetPath);
        } catch (error) {
            await this.tryUnlink(tempPath, 'temp artifact');
            if (backupPath && originalRemoved) {
                try {
                    await this.fs.rename(backupPath, targetPath);
                } catch (restoreError) {
                    console.error(`[BASELINE] Failed to restore backup ${backupPath} for '${key}': ${describeError(restoreError)}`);
                }
            } else if (backupPath) {
                await this.tryUnlink(backupPath, 'backup');
            }
            throw error;
        }

        if (backupPath) {
            await this.tryUnlink(backupPath, 'backup');
        }
    }

    private async writeWithRetries(key: string, baseline: Baseline, codec: BaselineCodec): Promise<boolean> {
        await this.ensureDirectory();

        for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
            try {
                await this.replaceArtifact(key, baseline, codec);
                if (attempt > 0) {
                    console.log(`[BASELINE] Saved '${key}' after ${attempt + 1}/${this.maxAttempts} attempts.`);
                }
                return true;
            } catch (error) {
                console.warn(`[BASELINE] Save attempt ${attempt + 1}/${this.maxAttempts} failed for '${key}': ${describeError(error)}`);
                if (attempt < this.maxAttempts - 1) {
                    await this.sleep(this.retryBaseDelayMs * 2 ** attempt);
                }
            }
        }

        console.error(`[BASELINE] All ${this.maxAttempts} save attempts failed for '${key}'; previous baseline stays authoritative.`);
        return false;
    }

    private async removeOtherCodecs(key: string, keep: BaselineCodec): Promise<void> {
        for (const codec of CODEC_PRIORITY) {
            if (codec.name === keep.name) {
                continue;
            }
            if (await this.tryUnlink(this.artifactPath(key, codec.name), 'stale artifact')) {
                console.log(`[BASELINE] Removed stale ${codec.name} artifact for '${key}'.`);
            }
        }
    }

    /**
     * Atomically replace the baseline for a key under the default codec.
     * Returns false once every retry is exhausted.
     */
    public async save(key: string, baseline: Baseline): Promise<boolean> {
        const saved = await this.writeWithRetries(key, baseline, this.defaultCodec);
        if (saved) {
            await this.removeOtherCodecs(key, this.defaultCodec);
        }
        return saved;
    }

    /**
     * Re-encode an existing baseline into another codec. The old artifact is
     * removed only after the new one has been written and verified.
     */
    public async migrate(key: string, targetCodec: CodecName): Promise<boolean> {
        const found = await this.findArtifact(key);
        if (!found) {
            return false;
        }
        const target = getCodec(targetCodec);
        if (found.codec.name === target.name) {
            return true;
        }

        const baseline = await this.readArtifact(key, found.codec, found.filePath);
        const written = await this.writeWithRetries(key, baseline, target);
        if (!written) {
            return false;
        }
        await this.removeOtherCodecs(key, target);
        console.log(`[BASELINE] Migrated '${key}' from ${found.codec.name} to ${target.name}.`);
        return true;
    }

    /**
     * Move every artifact of `fromKey` to `toKey`, keeping history attached
     * to a renamed file. Returns false when `fromKey` had no baseline.
     */
    public async rename(fromKey: string, toKey: string): Promise<boolean> {
        const found = await this.findArtifact(fromKey);
        if (!found) {
            return false;
        }
        if (fromKey === toKey) {
            return true;
        }

        await this.ensureDirectory();
        const destination = this.artifactPath(toKey, found.codec.name);
        try {
            await this.fs.rename(found.filePath, destination);
        } catch (error) {
            throw asMonitorError(error, found.filePath);
        }
        await this.removeOtherCodecs(toKey, found.codec);
        await this.removeOtherCodecs(fromKey, found.codec);
        console.log(`[BASELINE] Renamed baseline '${fromKey}' -> '${toKey}'.`);
        return true;
    }

    public async remove(key: string): Promise<number> {
        let removed = 0;
        for (const codec of CODEC_PRIORITY) {
            if (await this.tryUnlink(this.artifactPath(key, codec.name), 'artifact')) {
                removed += 1;
            }
        }
        return removed;
    }

    public async list(): Promise<BaselineArtifactInfo[]> {
        let entries: string[];
        try {
            entries = await this.fs.readdir(this.directory);
        } catch (error) {
            if (isNotFound(error)) {
                return [];
            }
            throw error;
        }

        const artifacts: BaselineArtifactInfo[] = [];
        for (const entry of entries.sort()) {
            if (parseScratchName(entry)) {
                continue;
            }
            const parsed = parseArtifactName(entry);
            if (!parsed) {
                continue;
            }
            const filePath = path.join(this.directory, entry);
            try {
                const stats = await this.fs.stat(filePath);
                artifacts.push({ key: parsed.key, codec: parsed.codec.name, filePath, mtimeMs: stats.mtimeMs, size: stats.size });
            } catch (error) {
                if (!isNotFound(error)) {
                    console.warn(`[BASELINE] Cannot stat ${filePath}: ${describeError(error)}`);
                }
            }
        }
        return artifacts;
    }

    public async purge(): Promise<number> {
        let removed = 0;
        for (const artifact of await this.list()) {
            if (await this.tryUnlink(artifact.filePath, 'artifact')) {
                removed += 1;
            }
        }
        console.log(`[BASELINE] Purged ${removed} baseline artifact(s) from ${this.directory}.`);
        return removed;
    }

    /**
     * Move baselines that have not been rewritten for `inactiveMs` into a
     * higher-compression codec.
     */
    public async archiveInactive(inactiveMs: number, targetCodec: CodecName, now: number = Date.now()): Promise<string[]> {
        const archived: string[] = [];
        for (const artifact of await this.list()) {
            if (artifact.codec === targetCodec || now - artifact.mtimeMs < inactiveMs) {
                continue;
            }
            try {
                if (await this.migrate(artifact.key, targetCodec)) {
                    archived.push(artifact.key);
                }
            } catch (error) {
                console.warn(`[BASELINE] Skipping archive of '${artifact.key}': ${describeError(error)}`);
            }
        }
        return archived;
    }

    /**
     * Clean up after an interrupted save: a backup whose target is missing is
     * moved back into place, any other backup or temp file is deleted.
     */
    public async recover(): Promise<RecoveryReport> {
        const report: RecoveryReport = { restoredBackups: 0, removedBackups: 0, removedTempFiles: 0 };
        let entries: string[];
        try {
            entries = await this.fs.readdir(this.directory);
        } catch (error) {
            if (isNotFound(error)) {
                return report;
            }
            throw error;
        }

        for (const entry of entries) {
            const filePath = path.join(this.directory, entry);
            const scratch = parseScratchName(entry);
            if (!scratch) {
                continue;
            }
            if (scratch.kind === 'temp') {
                if (await this.tryUnlink(filePath, 'temp artifact')) {
                    report.removedTempFiles += 1;
                }
                continue;
            }

            const targetPath = path.join(this.directory, scratch.target);
            if (await this.exists(targetPath)) {
                if (await this.tryUnlink(filePath, 'backup')) {
                    report.removedBackups += 1;
                }
                continue;
            }
            try {
                await this.fs.rename(filePath, targetPath);
                report.restoredBackups += 1;
                console.warn(`[BASELINE] Restored interrupted save from backup: ${entry}`);
            } catch (error) {
                console.error(`[BASELINE] Failed to restore backup ${filePath}: ${describeError(error)}`);
            }
        }

        return report;
    }
}
