export const DEFAULT_MEMORY_LIMIT_MB = 2048;
export const DEFAULT_RELIEF_PAUSE_MS = 10_000;

export interface ResourceGuardOptions {
    /** Resident-memory ceiling in MB; 0 disables the guard. */
    limitMB?: number;
    readRss?: () => number;
    collect?: () => void;
    sleep?: (ms: number) => Promise<void>;
}

function collectGarbage(): void {
    // Only available when node runs with --expose-gc.
    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc === 'function') {
        gc();
    }
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class ResourceGuard {
    private readonly limitMB: number;
    private readonly readRss: () => number;
    private readonly collect: () => void;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: ResourceGuardOptions = {}) {
        this.limitMB = Math.max(0, options.limitMB ?? DEFAULT_MEMORY_LIMIT_MB);
        this.readRss = options.readRss ?? (() => process.memoryUsage().rss);
        this.collect = options.collect ?? collectGarbage;
        this.sleep = options.sleep ?? defaultSleep;
    }

    public isEnabled(): boolean {
        return this.limitMB > 0;
    }

    public getLimitMB(): number {
        return this.limitMB;
    }

    public currentUsageMB(): number {
        return this.readRss() / (1024 * 1024);
    }

    public overLimit(): boolean {
        return this.isEnabled() && this.currentUsageMB() > this.limitMB;
    }

    /** Drop references the caller no longer needs and ask the runtime to collect. */
    public release(): void {
        this.collect();
    }

    /**
     * Pause, collect and re-check. Resolves true when usage is back under the
     * limit (or the guard is disabled).
     */
    public async relieve(pauseMs: number = DEFAULT_RELIEF_PAUSE_MS): Promise<boolean> {
        if (!this.overLimit()) {
            return true;
        }
        console.warn(`[MEMORY] Usage ${this.currentUsageMB().toFixed(1)}MB exceeds ${this.limitMB}MB; pausing ${pauseMs}ms.`);
        this.collect();
        await this.sleep(pauseMs);
        this.collect();

        const stillOver = this.overLimit();
        console.log(`[MEMORY] After collection: ${this.currentUsageMB().toFixed(1)}MB${stillOver ? ' (still over limit)' : ''}`);
        return !stillOver;
    }
}
