import { z } from 'zod';

export type CellValue = string | number | boolean;

/**
 * One non-empty cell as read from a workbook. At least one of `value` and
 * `formula` is non-null; empty cells are simply absent from a WorksheetMap.
 */
export interface CellRecord {
    readonly value: CellValue | null;
    readonly formula: string | null;
}

export type WorksheetMap = Record<string, CellRecord>;

export type WorkbookSnapshot = Record<string, WorksheetMap>;

export interface Baseline {
    contentHash: string;
    lastAuthor: string | null;
    cells: WorkbookSnapshot;
    timestamp: string;
}

export const CHANGE_KINDS = [
    'added',
    'deleted',
    'formula_changed',
    'direct_value_changed',
    'external_ref_updated',
    'indirect_changed',
] as const;

export type ChangeKind = typeof CHANGE_KINDS[number];

export const changeKindSchema = z.enum(CHANGE_KINDS);

export interface CellChange {
    worksheet: string;
    address: string;
    oldCell: CellRecord | null;
    newCell: CellRecord | null;
    kind: ChangeKind;
}

/**
 * One audit row. Every reportable CellChange becomes exactly one ChangeRecord.
 */
export interface ChangeRecord {
    timestamp: string;
    filename: string;
    worksheet: string;
    address: string;
    oldValue: CellValue | null;
    oldFormula: string | null;
    newValue: CellValue | null;
    newFormula: string | null;
    author: string | null;
    kind: ChangeKind;
}

export interface ProgressRecord {
    completed: number;
    total: number;
    timestamp: string;
}

export type FileEvent =
    | { kind: 'created'; path: string }
    | { kind: 'modified'; path: string }
    | { kind: 'moved_to'; path: string; oldPath: string };

export interface SpreadsheetExtractor {
    extract(filePath: string): Promise<WorkbookSnapshot>;
    lastAuthor(filePath: string): Promise<string | null>;
}

export interface ChangeSink {
    record(rows: ChangeRecord[]): Promise<void>;
}

export interface LocalCacheMirror {
    ensureLocalCopy(networkPath: string): Promise<string>;
}

export function cellRecord(value: CellValue | null, formula: string | null = null): CellRecord {
    return { value, formula };
}

const cellValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const cellRecordSchema = z
    .object({
        value: cellValueSchema.nullable().optional(),
        formula: z.string().nullable().optional(),
    })
    .strict()
    .refine((cell) => (cell.value ?? null) !== null || (cell.formula ?? null) !== null, {
        message: 'cell must carry a value or a formula',
    })
    .transform((cell): CellRecord => ({ value: cell.value ?? null, formula: cell.formula ?? null }));

export const workbookSnapshotSchema = z.record(z.string(), z.record(z.string(), cellRecordSchema));

export const progressRecordSchema = z.object({
    completed: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), { message: 'timestamp must be ISO-8601' }),
});
