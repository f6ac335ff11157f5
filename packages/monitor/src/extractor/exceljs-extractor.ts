import * as fsp from 'fs/promises';
import { Workbook } from 'exceljs';
import { SpreadsheetExtractor, WorkbookSnapshot, WorksheetMap } from '@sheetsentry/core';
import { toCellRecord } from './cell-values';

interface AuthorEntry {
    mtimeMs: number;
    size: number;
    author: string | null;
}

/**
 * Reads .xlsx/.xlsm workbooks with ExcelJS. Merged ranges report only their
 * top-left cell; formulas are kept as written, never evaluated.
 */
export class ExcelJsExtractor implements SpreadsheetExtractor {
    private readonly authors = new Map<string, AuthorEntry>();

    private async loadWorkbook(filePath: string): Promise<Workbook> {
        const workbook = new Workbook();
        await workbook.xlsx.readFile(filePath);
        return workbook;
    }

    private rememberAuthor(filePath: string, stats: { mtimeMs: number; size: number }, workbook: Workbook): string | null {
        const author = workbook.lastModifiedBy ? workbook.lastModifiedBy.trim() : '';
        const entry: AuthorEntry = { mtimeMs: stats.mtimeMs, size: stats.size, author: author.length > 0 ? author : null };
        this.authors.set(filePath, entry);
        return entry.author;
    }

    public async extract(filePath: string): Promise<WorkbookSnapshot> {
        const stats = await fsp.stat(filePath);
        const workbook = await this.loadWorkbook(filePath);
        this.rememberAuthor(filePath, stats, workbook);

        const snapshot: WorkbookSnapshot = {};
        workbook.eachSheet((worksheet) => {
            const cells: WorksheetMap = {};
            worksheet.eachRow({ includeEmpty: false }, (row) => {
                row.eachCell({ includeEmpty: false }, (cell) => {
                    if (cell.isMerged && cell.master.address !== cell.address) {
                        return;
                    }
                    const record = toCellRecord(cell.value, cell.formula || undefined);
                    if (record) {
                        cells[cell.address] = record;
                    }
                });
            });
            if (Object.keys(cells).length > 0) {
                snapshot[worksheet.name] = cells;
            }
        });
        return snapshot;
    }

    /**
     * Author from the document properties. Reuses what the last extract saw
     * when the file has not changed since.
     */
    public async lastAuthor(filePath: string): Promise<string | null> {
        const stats = await fsp.stat(filePath);
        const cached = this.authors.get(filePath);
        if (cached && cached.mtimeMs === stats.mtimeMs && cached.size === stats.size) {
            return cached.author;
        }
        const workbook = await this.loadWorkbook(filePath);
        return this.rememberAuthor(filePath, stats, workbook);
    }
}
