import * as path from 'path';
import ignore from 'ignore';

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.xlsx', '.xlsm'];

/** Lock and scratch files written by spreadsheet editors next to the real file. */
export const TRANSIENT_FILE_PATTERNS: readonly string[] = ['~$*', '.~lock.*#', '*.tmp'];

export interface FileFilterOptions {
    extensions?: readonly string[];
    ignorePatterns?: readonly string[];
    /** Watched roots; patterns with directories match against paths relative to these. */
    roots?: readonly string[];
}

function toPosix(value: string): string {
    return value.split(path.sep).join('/');
}

export class FileFilter {
    private readonly extensions: Set<string>;
    private readonly matcher: ReturnType<typeof ignore>;
    private readonly roots: string[];

    constructor(options: FileFilterOptions = {}) {
        this.extensions = new Set((options.extensions ?? SUPPORTED_EXTENSIONS).map((extension) => extension.toLowerCase()));
        this.matcher = ignore().add([...TRANSIENT_FILE_PATTERNS, ...(options.ignorePatterns ?? [])]);
        this.roots = (options.roots ?? []).map((root) => path.resolve(root));
    }

    public isSupported(filePath: string): boolean {
        return this.extensions.has(path.extname(filePath).toLowerCase());
    }

    private relativeCandidate(filePath: string): string {
        const absolute = path.resolve(filePath);
        for (const root of this.roots) {
            const relative = path.relative(root, absolute);
            if (relative && !relative.startsWith('..') && !path.isAbsolute(relative)) {
                return toPosix(relative);
            }
        }
        return path.basename(absolute);
    }

    public isIgnored(filePath: string): boolean {
        const candidate = this.relativeCandidate(filePath);
        const name = path.basename(filePath);
        return this.matcher.ignores(candidate) || (candidate !== name && this.matcher.ignores(name));
    }

    /** Directory check for walkers, so patterns ending in `/` prune whole subtrees. */
    public isIgnoredDirectory(directoryPath: string): boolean {
        if (this.roots.includes(path.resolve(directoryPath))) {
            return false;
        }
        return this.matcher.ignores(`${this.relativeCandidate(directoryPath)}/`);
    }

    /** True for spreadsheet files that are neither transient nor ignored. */
    public accepts(filePath: string): boolean {
        return this.isSupported(filePath) && !this.isIgnored(filePath);
    }
}
