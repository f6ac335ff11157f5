import { LocalCacheMirror, SpreadsheetExtractor, WorkbookSnapshot } from '../types';
import { asMonitorError, describeError, MonitorError } from '../errors';
import { MonitoringSession } from '../session';

export interface ExtractionContext {
    extractor: SpreadsheetExtractor;
    timeoutMs: number;
    session?: MonitoringSession;
    mirror?: LocalCacheMirror;
}

export interface ExtractionResult {
    snapshot: WorkbookSnapshot;
    author: string | null;
    /** Path actually read: the local mirror copy when one was made. */
    readPath: string;
}

async function resolveReadPath(filePath: string, mirror?: LocalCacheMirror): Promise<string> {
    if (!mirror) {
        return filePath;
    }
    try {
        return await mirror.ensureLocalCopy(filePath);
    } catch (error) {
        console.warn(`[EXTRACT] Local copy failed for ${filePath}, reading in place: ${describeError(error)}`);
        return filePath;
    }
}

/**
 * Race a promise against a timer. The timer is always cleared; the losing
 * promise keeps running but its result is discarded.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, filePath: string): Promise<T> {
    if (timeoutMs <= 0) {
        return work;
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            reject(new MonitorError('timeout', `Reading ${filePath} exceeded ${timeoutMs}ms`, filePath));
        }, timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Read cells and author for one file under the extraction timeout, with the
 * session's processing marker held for the duration. Failures surface as
 * MonitorError.
 */
export async function extractWithTimeout(filePath: string, context: ExtractionContext): Promise<ExtractionResult> {
    const { extractor, timeoutMs, session, mirror } = context;
    session?.beginProcessing(filePath);
    try {
        const readPath = await resolveReadPath(filePath, mirror);
        const snapshot = await withTimeout(extractor.extract(readPath), timeoutMs, filePath);

        let author: string | null = null;
        try {
            author = await withTimeout(extractor.lastAuthor(readPath), timeoutMs, filePath);
        } catch (error) {
            console.warn(`[EXTRACT] Could not read last author of ${filePath}: ${describeError(error)}`);
        }
        return { snapshot, author, readPath };
    } catch (error) {
        throw asMonitorError(error, filePath);
    } finally {
        session?.endProcessing(filePath);
    }
}
