import { CellChange, CellRecord, ChangeKind, WorkbookSnapshot, WorksheetMap } from '../types';

// [1]Sheet1!A1 style links into the workbook's external link table.
const EXTERNAL_INDEX_PATTERN = /\[\d+\][^!]*!/;
// 'C:\share\[Budget.xlsx]Q1'!B2 or '\\server\dir\Sheet'!A1 style quoted paths.
const EXTERNAL_PATH_PATTERN = /'[^']*(?:[\\/]|\[[^\]]+\])[^']*'!/;

const CELL_ADDRESS_PATTERN = /^\$?([A-Za-z]+)\$?(\d+)$/;

export function hasExternalReference(formula: string): boolean {
    return EXTERNAL_INDEX_PATTERN.test(formula) || EXTERNAL_PATH_PATTERN.test(formula);
}

/**
 * Classify one address. Returns null when nothing meaningful changed.
 */
export function classifyChange(oldCell: CellRecord | null, newCell: CellRecord | null): ChangeKind | null {
    if (!oldCell && !newCell) {
        return null;
    }
    if (!oldCell) {
        return 'added';
    }
    if (!newCell) {
        return 'deleted';
    }

    const oldFormula = oldCell.formula ?? null;
    const newFormula = newCell.formula ?? null;
    const oldValue = oldCell.value ?? null;
    const newValue = newCell.value ?? null;

    if (oldFormula !== newFormula) {
        return 'formula_changed';
    }
    if (oldValue === newValue) {
        return null;
    }
    if (oldFormula === null) {
        return 'direct_value_changed';
    }
    return hasExternalReference(oldFormula) ? 'external_ref_updated' : 'indirect_changed';
}

function columnIndex(letters: string): number {
    let index = 0;
    for (const letter of letters.toUpperCase()) {
        index = index * 26 + (letter.charCodeAt(0) - 64);
    }
    return index;
}

/**
 * Row-major ordering for A1 addresses; anything unparsable sorts after, by text.
 */
export function compareCellAddresses(a: string, b: string): number {
    const matchA = CELL_ADDRESS_PATTERN.exec(a);
    const matchB = CELL_ADDRESS_PATTERN.exec(b);
    if (matchA && matchB) {
        const rowDelta = Number(matchA[2]) - Number(matchB[2]);
        if (rowDelta !== 0) {
            return rowDelta;
        }
        const columnDelta = columnIndex(matchA[1]) - columnIndex(matchB[1]);
        if (columnDelta !== 0) {
            return columnDelta;
        }
    } else if (matchA) {
        return -1;
    } else if (matchB) {
        return 1;
    }
    return a.localeCompare(b);
}

export function diffWorksheet(worksheet: string, oldCells: WorksheetMap, newCells: WorksheetMap): CellChange[] {
    const addresses = new Set([...Object.keys(oldCells), ...Object.keys(newCells)]);
    const changes: CellChange[] = [];

    for (const address of Array.from(addresses).sort(compareCellAddresses)) {
        const oldCell = Object.prototype.hasOwnProperty.call(oldCells, address) ? oldCells[address] : null;
        const newCell = Object.prototype.hasOwnProperty.call(newCells, address) ? newCells[address] : null;
        const kind = classifyChange(oldCell, newCell);
        if (kind) {
            changes.push({ worksheet, address, oldCell, newCell, kind });
        }
    }

    return changes;
}

export function diff(oldSnapshot: WorkbookSnapshot, newSnapshot: WorkbookSnapshot): CellChange[] {
    const worksheets = new Set([...Object.keys(oldSnapshot), ...Object.keys(newSnapshot)]);
    const changes: CellChange[] = [];

    for (const worksheet of Array.from(worksheets).sort((a, b) => a.localeCompare(b))) {
        changes.push(...diffWorksheet(worksheet, oldSnapshot[worksheet] ?? {}, newSnapshot[worksheet] ?? {}));
    }

    return changes;
}
