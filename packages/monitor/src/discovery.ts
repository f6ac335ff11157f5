import type { Dirent } from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { describeError, FileFilter } from '@sheetsentry/core';

/**
 * Every accepted spreadsheet under the given roots, sorted. Unreadable
 * directories are skipped with a warning; symlinked directories are not
 * followed.
 */
export async function discoverSpreadsheets(roots: readonly string[], filter: FileFilter): Promise<string[]> {
    const files = new Set<string>();

    const traverseDirectory = async (currentPath: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await fsp.readdir(currentPath, { withFileTypes: true });
        } catch (error) {
            console.warn(`[DISCOVER] Skipping ${currentPath}: ${describeError(error)}`);
            return;
        }

        for (const entry of entries) {
            const fullPath = path.join(currentPath, entry.name);
            if (entry.isDirectory()) {
                if (!filter.isIgnoredDirectory(fullPath)) {
                    await traverseDirectory(fullPath);
                }
            } else if (entry.isFile() && filter.accepts(fullPath)) {
                files.add(fullPath);
            }
        }
    };

    for (const root of roots) {
        await traverseDirectory(path.resolve(root));
    }
    const sorted = [...files].sort();
    console.log(`[DISCOVER] Found ${sorted.length} spreadsheet(s) under ${roots.length} folder(s)`);
    return sorted;
}
