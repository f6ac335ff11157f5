import type { CellValue as ExcelCellValue } from 'exceljs';
import { CellRecord, CellValue } from '@sheetsentry/core';

type FormulaResult = Date | number | string | boolean | { error: string } | undefined;

function normalizeResult(result: FormulaResult): CellValue | null {
    if (result === undefined) {
        return null;
    }
    if (result instanceof Date) {
        return result.toISOString();
    }
    if (typeof result === 'object') {
        return result.error;
    }
    return result;
}

function withEquals(formula: string): string {
    return formula.startsWith('=') ? formula : `=${formula}`;
}

/**
 * Normalise one ExcelJS cell value. `formulaText` is the cell's resolved
 * formula, needed for shared formulas whose value only names the master cell.
 * Returns null for cells that carry neither a value nor a formula.
 */
export function toCellRecord(raw: ExcelCellValue, formulaText?: string): CellRecord | null {
    if (raw === null || raw === undefined) {
        return null;
    }
    if (raw instanceof Date) {
        return { value: raw.toISOString(), formula: null };
    }
    if (typeof raw !== 'object') {
        if (typeof raw === 'string' && raw.length === 0) {
            return null;
        }
        return { value: raw, formula: null };
    }
    if ('error' in raw) {
        return { value: raw.error, formula: null };
    }
    if ('richText' in raw) {
        const text = raw.richText.map((run) => run.text).join('');
        return text.length > 0 ? { value: text, formula: null } : null;
    }
    if ('hyperlink' in raw) {
        // Hyperlinks over rich text arrive with a non-string text at runtime.
        const text = typeof raw.text === 'string' && raw.text ? raw.text : raw.hyperlink;
        return text ? { value: text, formula: null } : null;
    }

    // Formula cells: plain, shared or array.
    const ownFormula = 'formula' in raw ? raw.formula : undefined;
    const formula = formulaText || ownFormula;
    const value = normalizeResult(raw.result);
    if (!formula) {
        return value === null ? null : { value, formula: null };
    }
    return { value, formula: withEquals(formula) };
}
