export type MonitorErrorKind =
    | 'not_found'
    | 'access_denied'
    | 'corrupt'
    | 'timeout'
    | 'resource_exhausted'
    | 'persist_failure';

export class MonitorError extends Error {
    public readonly kind: MonitorErrorKind;
    public readonly filePath?: string;

    constructor(kind: MonitorErrorKind, message: string, filePath?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MonitorError';
        this.kind = kind;
        this.filePath = filePath;
    }
}

const ACCESS_DENIED_CODES = new Set(['EACCES', 'EPERM', 'EBUSY', 'ELOCKED']);

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) {
        return undefined;
    }
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Map any thrown value onto the monitoring taxonomy. Node fs codes decide
 * not_found / access_denied; everything else unreadable counts as corrupt.
 */
export function asMonitorError(error: unknown, filePath?: string): MonitorError {
    if (error instanceof MonitorError) {
        return error;
    }

    const code = errorCode(error);
    const message = describeError(error);
    if (code === 'ENOENT') {
        return new MonitorError('not_found', message, filePath, { cause: error });
    }
    if (code && ACCESS_DENIED_CODES.has(code)) {
        return new MonitorError('access_denied', message, filePath, { cause: error });
    }
    return new MonitorError('corrupt', message, filePath, { cause: error });
}

export function isMonitorError(error: unknown, kind?: MonitorErrorKind): error is MonitorError {
    return error instanceof MonitorError && (kind === undefined || error.kind === kind);
}
