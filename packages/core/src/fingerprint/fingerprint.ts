import * as crypto from 'crypto';
import { CellRecord, WorkbookSnapshot } from '../types';

function compareKeys(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}

function canonicalCell(cell: CellRecord): [CellRecord['value'], CellRecord['formula']] {
    return [cell.value ?? null, cell.formula ?? null];
}

/**
 * Canonical text for a snapshot: worksheets and addresses in code-unit order,
 * empty worksheets dropped, every cell as a [value, formula] pair.
 */
export function canonicalizeSnapshot(snapshot: WorkbookSnapshot): string {
    const worksheets = Object.keys(snapshot).sort(compareKeys);
    const parts: string[] = [];

    for (const worksheet of worksheets) {
        const cells = snapshot[worksheet];
        const addresses = Object.keys(cells).sort(compareKeys);
        if (addresses.length === 0) {
            continue;
        }
        const entries = addresses.map((address) => [address, canonicalCell(cells[address])]);
        parts.push(JSON.stringify([worksheet, entries]));
    }

    return `[${parts.join(',')}]`;
}

/**
 * Deterministic content hash of a workbook snapshot.
 */
export function fingerprint(snapshot: WorkbookSnapshot): string {
    return crypto.createHash('sha256').update(canonicalizeSnapshot(snapshot)).digest('hex');
}

export function countCells(snapshot: WorkbookSnapshot): number {
    let total = 0;
    for (const cells of Object.values(snapshot)) {
        total += Object.keys(cells).length;
    }
    return total;
}
