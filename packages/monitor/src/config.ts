import * as os from 'os';
import * as path from 'path';
import {
    CHANGE_KINDS,
    ChangeKind,
    CodecName,
    DEFAULT_CREATE_SETTLE_MS,
    DEFAULT_DEBOUNCE_MS,
    DEFAULT_DENSE_BUDGET_MS,
    DEFAULT_DENSE_INTERVAL_MS,
    DEFAULT_EXTRACTION_TIMEOUT_MS,
    DEFAULT_MAX_CONSECUTIVE_FAILURES,
    DEFAULT_MEMORY_LIMIT_MB,
    DEFAULT_RELIEF_PAUSE_MS,
    DEFAULT_SPARSE_INTERVAL_MS,
    DEFAULT_WATCHDOG_INTERVAL_MS,
    EnvManager,
    changeKindSchema,
    envManager,
    isCodecName,
} from '@sheetsentry/core';
import { DEFAULT_RENAME_WINDOW_MS } from './watcher/rename-correlator';

export const DEFAULT_POLL_SIZE_THRESHOLD_MB = 10;
export const DEFAULT_SAVE_MAX_ATTEMPTS = 5;
export const DEFAULT_SAVE_RETRY_DELAY_MS = 200;
export const DEFAULT_WATCH_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_ARCHIVE_AFTER_DAYS = 0;

export interface MonitorConfig {
    name: string;
    version: string;
    watchFolders: string[];
    ignorePatterns: string[];
    stateDir: string;
    baselineDir: string;
    logDir: string;
    cacheDir: string;
    progressFile: string;
    // Baseline persistence
    baselineCodec: CodecName;
    archiveCodec: CodecName;
    archiveAfterDays: number;
    saveMaxAttempts: number;
    saveRetryDelayMs: number;
    // Start-up scan
    scanOnStartup: boolean;
    resumeScan: boolean;
    memoryLimitMB: number;
    reliefPauseMs: number;
    // Extraction
    useLocalCache: boolean;
    extractionTimeoutMs: number;
    watchdogIntervalMs: number;
    // Event handling
    debounceMs: number;
    createSettleMs: number;
    renameWindowMs: number;
    watchUsePolling: boolean;
    watchPollIntervalMs: number;
    // Adaptive polling
    pollSizeThresholdMB: number;
    denseIntervalMs: number;
    denseBudgetMs: number;
    sparseIntervalMs: number;
    pollMaxFailures: number;
    // Reporting
    excludedKinds: ChangeKind[];
    ignoredAuthors: string[];
    persistUnreportedChanges: boolean;
    refreshAuthorOnUnchanged: boolean;
    consoleReport: boolean;
}

function readInteger(env: EnvManager, name: string, fallback: number, minimum: number): number {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const parsed = Number.parseInt(raw, 10);
    if (Number.isFinite(parsed) && parsed >= minimum && String(parsed) === raw.trim()) {
        return parsed;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readBoolean(env: EnvManager, name: string, fallback: boolean): boolean {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
        return true;
    }
    if (['false', '0', 'no', 'off'].includes(normalized)) {
        return false;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readList(env: EnvManager, name: string, separator: string | RegExp = ','): string[] {
    const raw = env.get(name);
    if (!raw) {
        return [];
    }
    return raw.split(separator).map((item) => item.trim()).filter((item) => item.length > 0);
}

function readCodec(env: EnvManager, name: string, fallback: CodecName): CodecName {
    const raw = env.get(name);
    if (!raw) {
        return fallback;
    }
    const normalized = raw.trim().toLowerCase();
    if (isCodecName(normalized)) {
        return normalized;
    }
    console.warn(`[WARN] Invalid ${name} value: ${raw}. Using default ${fallback}.`);
    return fallback;
}

function readChangeKinds(env: EnvManager, name: string): ChangeKind[] {
    const kinds: ChangeKind[] = [];
    for (const item of readList(env, name)) {
        const parsed = changeKindSchema.safeParse(item.toLowerCase());
        if (parsed.success) {
            kinds.push(parsed.data);
        } else {
            console.warn(`[WARN] Ignoring unknown change kind in ${name}: ${item}. Expected one of ${CHANGE_KINDS.join(', ')}.`);
        }
    }
    return kinds;
}

function resolveDir(value: string): string {
    if (value === '~' || value.startsWith(`~${path.sep}`) || value.startsWith('~/')) {
        return path.join(os.homedir(), value.slice(1));
    }
    return path.resolve(value);
}

export function createMonitorConfig(env: EnvManager = envManager): MonitorConfig {
    const stateDir = resolveDir(env.get('SHEETSENTRY_STATE_DIR') || path.join(os.homedir(), '.sheetsentry'));
    const dirOrDefault = (name: string, fallback: string): string => {
        const raw = env.get(name);
        return raw ? resolveDir(raw) : fallback;
    };

    const denseIntervalMs = readInteger(env, 'SHEETSENTRY_DENSE_INTERVAL_MS', DEFAULT_DENSE_INTERVAL_MS, 1);
    let denseBudgetMs = readInteger(env, 'SHEETSENTRY_DENSE_BUDGET_MS', DEFAULT_DENSE_BUDGET_MS, 1);
    if (denseBudgetMs < denseIntervalMs) {
        console.warn(`[WARN] SHEETSENTRY_DENSE_BUDGET_MS (${denseBudgetMs}) is shorter than one dense interval. Using ${denseIntervalMs}.`);
        denseBudgetMs = denseIntervalMs;
    }

    const config: MonitorConfig = {
        name: 'sheetsentry',
        version: env.get('SHEETSENTRY_VERSION') || '0.1.0',
        watchFolders: readList(env, 'SHEETSENTRY_WATCH_FOLDERS', path.delimiter).map(resolveDir),
        ignorePatterns: readList(env, 'SHEETSENTRY_IGNORE_PATTERNS'),
        stateDir,
        baselineDir: dirOrDefault('SHEETSENTRY_BASELINE_DIR', path.join(stateDir, 'baselines')),
        logDir: dirOrDefault('SHEETSENTRY_LOG_DIR', path.join(stateDir, 'logs')),
        cacheDir: dirOrDefault('SHEETSENTRY_CACHE_DIR', path.join(stateDir, 'cache')),
        progressFile: path.join(stateDir, 'baseline_progress.json'),
        baselineCodec: readCodec(env, 'SHEETSENTRY_BASELINE_CODEC', 'gzip'),
        archiveCodec: readCodec(env, 'SHEETSENTRY_ARCHIVE_CODEC', 'brotli'),
        archiveAfterDays: readInteger(env, 'SHEETSENTRY_ARCHIVE_AFTER_DAYS', DEFAULT_ARCHIVE_AFTER_DAYS, 0),
        saveMaxAttempts: readInteger(env, 'SHEETSENTRY_SAVE_MAX_ATTEMPTS', DEFAULT_SAVE_MAX_ATTEMPTS, 1),
        saveRetryDelayMs: readInteger(env, 'SHEETSENTRY_SAVE_RETRY_DELAY_MS', DEFAULT_SAVE_RETRY_DELAY_MS, 0),
        scanOnStartup: readBoolean(env, 'SHEETSENTRY_SCAN_ON_STARTUP', true),
        resumeScan: readBoolean(env, 'SHEETSENTRY_RESUME_SCAN', true),
        memoryLimitMB: readInteger(env, 'SHEETSENTRY_MEMORY_LIMIT_MB', DEFAULT_MEMORY_LIMIT_MB, 0),
        reliefPauseMs: readInteger(env, 'SHEETSENTRY_RELIEF_PAUSE_MS', DEFAULT_RELIEF_PAUSE_MS, 0),
        useLocalCache: readBoolean(env, 'SHEETSENTRY_USE_LOCAL_CACHE', true),
        extractionTimeoutMs: readInteger(env, 'SHEETSENTRY_EXTRACTION_TIMEOUT_MS', DEFAULT_EXTRACTION_TIMEOUT_MS, 0),
        watchdogIntervalMs: readInteger(env, 'SHEETSENTRY_WATCHDOG_INTERVAL_MS', DEFAULT_WATCHDOG_INTERVAL_MS, 1),
        debounceMs: readInteger(env, 'SHEETSENTRY_DEBOUNCE_MS', DEFAULT_DEBOUNCE_MS, 0),
        createSettleMs: readInteger(env, 'SHEETSENTRY_CREATE_SETTLE_MS', DEFAULT_CREATE_SETTLE_MS, 0),
        renameWindowMs: readInteger(env, 'SHEETSENTRY_RENAME_WINDOW_MS', DEFAULT_RENAME_WINDOW_MS, 0),
        watchUsePolling: readBoolean(env, 'SHEETSENTRY_WATCH_USE_POLLING', false),
        watchPollIntervalMs: readInteger(env, 'SHEETSENTRY_WATCH_POLL_INTERVAL_MS', DEFAULT_WATCH_POLL_INTERVAL_MS, 1),
        pollSizeThresholdMB: readInteger(env, 'SHEETSENTRY_POLL_SIZE_THRESHOLD_MB', DEFAULT_POLL_SIZE_THRESHOLD_MB, 0),
        denseIntervalMs,
        denseBudgetMs,
        sparseIntervalMs: readInteger(env, 'SHEETSENTRY_SPARSE_INTERVAL_MS', DEFAULT_SPARSE_INTERVAL_MS, 1),
        pollMaxFailures: readInteger(env, 'SHEETSENTRY_POLL_MAX_FAILURES', DEFAULT_MAX_CONSECUTIVE_FAILURES, 1),
        excludedKinds: readChangeKinds(env, 'SHEETSENTRY_EXCLUDED_KINDS'),
        ignoredAuthors: readList(env, 'SHEETSENTRY_IGNORED_AUTHORS'),
        persistUnreportedChanges: readBoolean(env, 'SHEETSENTRY_PERSIST_UNREPORTED', true),
        refreshAuthorOnUnchanged: readBoolean(env, 'SHEETSENTRY_REFRESH_AUTHOR', false),
        consoleReport: readBoolean(env, 'SHEETSENTRY_CONSOLE_REPORT', true),
    };

    return config;
}

export function logConfigurationSummary(config: MonitorConfig): void {
    console.log(`[MONITOR] Starting ${config.name} v${config.version}`);
    console.log(`[MONITOR] Configuration Summary:`);
    console.log(`[MONITOR]   Watch folders: ${config.watchFolders.length > 0 ? config.watchFolders.join(', ') : '[Not configured]'}`);
    console.log(`[MONITOR]   Baselines: ${config.baselineDir} (${config.baselineCodec})`);
    console.log(`[MONITOR]   Audit log: ${config.logDir}`);
    console.log(`[MONITOR]   Local cache: ${config.useLocalCache ? config.cacheDir : 'disabled'}`);
    console.log(`[MONITOR]   Start-up scan: ${config.scanOnStartup ? `enabled${config.resumeScan ? ' (resumable)' : ''}` : 'disabled'}`);
    console.log(`[MONITOR]   Extraction timeout: ${config.extractionTimeoutMs > 0 ? `${config.extractionTimeoutMs}ms` : 'disabled'}`);
    console.log(`[MONITOR]   Memory limit: ${config.memoryLimitMB > 0 ? `${config.memoryLimitMB}MB` : 'disabled'}`);
    console.log(`[MONITOR]   Debounce: ${config.debounceMs}ms`);
    console.log(`[MONITOR]   Polling: dense ${config.denseIntervalMs}ms for ${config.denseBudgetMs}ms below ${config.pollSizeThresholdMB}MB, sparse ${config.sparseIntervalMs}ms above`);
    console.log(`[MONITOR]   Watcher: ${config.watchUsePolling ? `polling every ${config.watchPollIntervalMs}ms` : 'native events'}`);
    if (config.archiveAfterDays > 0) {
        console.log(`[MONITOR]   Archive: baselines idle for ${config.archiveAfterDays} days move to ${config.archiveCodec}`);
    }
    if (config.excludedKinds.length > 0) {
        console.log(`[MONITOR]   Excluded change kinds: ${config.excludedKinds.join(', ')}`);
    }
    if (config.ignoredAuthors.length > 0) {
        console.log(`[MONITOR]   Ignored authors: ${config.ignoredAuthors.join(', ')}`);
    }
}

export function showHelpMessage(): void {
    console.log(`
sheetsentry: cell-level change auditing for shared spreadsheet folders

Usage: sheetsentry [options]

Options:
  --help, -h                          Show this help message

Environment Variables (also read from ~/.sheetsentry/.env):
  SHEETSENTRY_WATCH_FOLDERS           Folders to monitor, separated by '${path.delimiter}'
  SHEETSENTRY_IGNORE_PATTERNS         Extra gitignore-style patterns to skip (comma separated)
  SHEETSENTRY_STATE_DIR               Root for baselines, logs and cache (default: ~/.sheetsentry)
  SHEETSENTRY_BASELINE_DIR            Baseline directory (default: <state>/baselines)
  SHEETSENTRY_LOG_DIR                 Audit log directory (default: <state>/logs)
  SHEETSENTRY_CACHE_DIR               Local cache directory (default: <state>/cache)

  Baselines:
  SHEETSENTRY_BASELINE_CODEC          gzip, brotli or json (default: gzip)
  SHEETSENTRY_ARCHIVE_AFTER_DAYS      Re-encode baselines idle this long; 0 disables (default: 0)
  SHEETSENTRY_ARCHIVE_CODEC           Codec for archived baselines (default: brotli)
  SHEETSENTRY_SAVE_MAX_ATTEMPTS       Save attempts before giving up (default: ${DEFAULT_SAVE_MAX_ATTEMPTS})
  SHEETSENTRY_SAVE_RETRY_DELAY_MS     Base retry delay, doubled per attempt (default: ${DEFAULT_SAVE_RETRY_DELAY_MS})

  Start-up scan:
  SHEETSENTRY_SCAN_ON_STARTUP         Seed baselines for every file at start (default: true)
  SHEETSENTRY_RESUME_SCAN             Resume an interrupted scan (default: true)
  SHEETSENTRY_MEMORY_LIMIT_MB         Halt the scan above this RSS; 0 disables (default: ${DEFAULT_MEMORY_LIMIT_MB})
  SHEETSENTRY_RELIEF_PAUSE_MS         Pause before re-checking memory (default: ${DEFAULT_RELIEF_PAUSE_MS})

  Extraction:
  SHEETSENTRY_USE_LOCAL_CACHE         Copy files locally before reading (default: true)
  SHEETSENTRY_EXTRACTION_TIMEOUT_MS   Per-file read timeout; 0 disables (default: ${DEFAULT_EXTRACTION_TIMEOUT_MS})
  SHEETSENTRY_WATCHDOG_INTERVAL_MS    Stalled-read check interval (default: ${DEFAULT_WATCHDOG_INTERVAL_MS})

  Events and polling:
  SHEETSENTRY_DEBOUNCE_MS             Drop repeat modifications within this window (default: ${DEFAULT_DEBOUNCE_MS})
  SHEETSENTRY_CREATE_SETTLE_MS        Wait before seeding a new file (default: ${DEFAULT_CREATE_SETTLE_MS})
  SHEETSENTRY_RENAME_WINDOW_MS        Pair delete+create into a move within this window (default: ${DEFAULT_RENAME_WINDOW_MS})
  SHEETSENTRY_WATCH_USE_POLLING       Stat-poll the folders, for network shares (default: false)
  SHEETSENTRY_WATCH_POLL_INTERVAL_MS  Watcher poll interval (default: ${DEFAULT_WATCH_POLL_INTERVAL_MS})
  SHEETSENTRY_POLL_SIZE_THRESHOLD_MB  Files at or above this size poll sparsely (default: ${DEFAULT_POLL_SIZE_THRESHOLD_MB})
  SHEETSENTRY_DENSE_INTERVAL_MS       Dense poll interval (default: ${DEFAULT_DENSE_INTERVAL_MS})
  SHEETSENTRY_DENSE_BUDGET_MS         Dense quiet budget (default: ${DEFAULT_DENSE_BUDGET_MS})
  SHEETSENTRY_SPARSE_INTERVAL_MS      Sparse poll interval (default: ${DEFAULT_SPARSE_INTERVAL_MS})
  SHEETSENTRY_POLL_MAX_FAILURES       Failed reads in a row before polling gives up (default: ${DEFAULT_MAX_CONSECUTIVE_FAILURES})

  Reporting:
  SHEETSENTRY_EXCLUDED_KINDS          Change kinds not written to the audit log (comma separated)
  SHEETSENTRY_IGNORED_AUTHORS         Authors whose edits are absorbed silently (comma separated)
  SHEETSENTRY_PERSIST_UNREPORTED      Refresh the baseline when every change was filtered (default: true)
  SHEETSENTRY_REFRESH_AUTHOR          Record a new last author even without cell changes (default: false)
  SHEETSENTRY_CONSOLE_REPORT          Print each change to the console (default: true)

Examples:
  SHEETSENTRY_WATCH_FOLDERS=/mnt/finance${path.delimiter}/mnt/ops sheetsentry
  SHEETSENTRY_EXCLUDED_KINDS=indirect_changed SHEETSENTRY_IGNORED_AUTHORS=svc-backup sheetsentry
        `);
}
