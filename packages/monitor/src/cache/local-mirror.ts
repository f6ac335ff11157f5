import * as crypto from 'crypto';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { LocalCacheMirror } from '@sheetsentry/core';

/**
 * Local copies of files on slow or lock-prone shares. A copy is named after a
 * hash of the source path and reused while its mtime is not older than the
 * source's.
 */
export class LocalFileMirror implements LocalCacheMirror {
    private readonly cacheDir: string;

    constructor(cacheDir: string) {
        this.cacheDir = path.resolve(cacheDir);
    }

    public getCacheDir(): string {
        return this.cacheDir;
    }

    public cachePathFor(networkPath: string): string {
        const hash = crypto.createHash('md5').update(path.resolve(networkPath)).digest('hex').slice(0, 16);
        return path.join(this.cacheDir, `${hash}_${path.basename(networkPath)}`);
    }

    private async isFresh(cachePath: string, source: { mtimeMs: number; size: number }): Promise<boolean> {
        try {
            const cached = await fsp.stat(cachePath);
            // The copy's mtime is set through a Date, so only whole milliseconds survive.
            return Math.round(cached.mtimeMs) >= Math.trunc(source.mtimeMs) && cached.size === source.size;
        } catch {
            return false;
        }
    }

    public async ensureLocalCopy(networkPath: string): Promise<string> {
        const source = await fsp.stat(networkPath);
        const cachePath = this.cachePathFor(networkPath);
        if (await this.isFresh(cachePath, source)) {
            return cachePath;
        }

        await fsp.mkdir(this.cacheDir, { recursive: true });
        const tempPath = `${cachePath}.tmp-${process.pid}-${Date.now()}`;
        const startedAt = Date.now();
        try {
            await fsp.copyFile(networkPath, tempPath);
            await fsp.utimes(tempPath, source.atime, source.mtime);
            await fsp.rename(tempPath, cachePath);
        } catch (error) {
            await fsp.rm(tempPath, { force: true });
            throw error;
        }
        console.log(`[CACHE] Copied ${path.basename(networkPath)} (${(source.size / (1024 * 1024)).toFixed(1)} MB) in ${Date.now() - startedAt}ms`);
        return cachePath;
    }
}
