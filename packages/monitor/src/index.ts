#!/usr/bin/env -S node --import tsx

import { createMonitorConfig, logConfigurationSummary, showHelpMessage } from './config';
import { SpreadsheetMonitor } from './monitor';

export * from './config';
export * from './monitor';
export * from './discovery';
export * from './cache/local-mirror';
export * from './extractor/cell-values';
export * from './extractor/exceljs-extractor';
export * from './sink/csv-audit-sink';
export * from './watcher/rename-correlator';
export * from './watcher/chokidar-source';

let activeMonitor: SpreadsheetMonitor | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    if (args.includes('--help') || args.includes('-h')) {
        showHelpMessage();
        process.exit(0);
    }

    const config = createMonitorConfig();
    logConfigurationSummary(config);

    const monitor = new SpreadsheetMonitor(config);
    activeMonitor = monitor;
    await monitor.start();
}

async function handleShutdownSignal(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    console.log(`[MONITOR] Received ${signal}, shutting down gracefully...`);
    try {
        if (activeMonitor) {
            await activeMonitor.shutdown();
        }
    } catch (error) {
        console.error('[MONITOR] Error during graceful shutdown:', error);
    } finally {
        process.exit(0);
    }
}

if (require.main === module) {
    process.on('SIGINT', () => {
        void handleShutdownSignal('SIGINT');
    });
    process.on('SIGTERM', () => {
        void handleShutdownSignal('SIGTERM');
    });

    main().catch((error) => {
        console.error('[MONITOR] Fatal error:', error);
        process.exit(1);
    });
}
