import { z } from 'zod';
import { Baseline, workbookSnapshotSchema } from '../types';

export const ARTIFACT_FORMAT_VERSION = 'v2';

const timestampSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'timestamp must be ISO-8601',
});

// Current on-disk shape.
const baselineArtifactV2Schema = z.object({
    formatVersion: z.literal('v2'),
    contentHash: z.string().min(1),
    lastAuthor: z.string().nullable(),
    timestamp: timestampSchema,
    cells: workbookSnapshotSchema,
});

// Legacy shape written by the first generation of the monitor (snake_case, no version tag).
const baselineArtifactV1Schema = z.object({
    content_hash: z.string().min(1),
    last_author: z.string().nullable().optional(),
    timestamp: timestampSchema.optional(),
    cells: workbookSnapshotSchema,
});

export type BaselineArtifactV2 = z.infer<typeof baselineArtifactV2Schema>;

export interface DecodedArtifact {
    baseline: Baseline;
    /** True when the artifact used an older format and should be rewritten. */
    legacy: boolean;
}

export function serializeBaseline(baseline: Baseline): string {
    const artifact: BaselineArtifactV2 = {
        formatVersion: ARTIFACT_FORMAT_VERSION,
        contentHash: baseline.contentHash,
        lastAuthor: baseline.lastAuthor,
        timestamp: baseline.timestamp,
        cells: baseline.cells,
    };
    return JSON.stringify(artifact);
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'artifact'}: ${issue.message}`)
        .join('; ');
}

/**
 * Parse artifact text into a Baseline. Throws a plain Error describing the
 * first validation issues; the store wraps it as a corrupt-artifact failure.
 */
export function parseBaseline(text: string): DecodedArtifact {
    const raw: unknown = JSON.parse(text);

    if (typeof raw === 'object' && raw !== null && 'formatVersion' in raw) {
        const parsed = baselineArtifactV2Schema.safeParse(raw);
        if (!parsed.success) {
            throw new Error(`Invalid baseline artifact: ${formatIssues(parsed.error)}`);
        }
        return {
            baseline: {
                contentHash: parsed.data.contentHash,
                lastAuthor: parsed.data.lastAuthor,
                timestamp: parsed.data.timestamp,
                cells: parsed.data.cells,
            },
            legacy: false,
        };
    }

    const legacy = baselineArtifactV1Schema.safeParse(raw);
    if (!legacy.success) {
        throw new Error(`Invalid legacy baseline artifact: ${formatIssues(legacy.error)}`);
    }
    return {
        baseline: {
            contentHash: legacy.data.content_hash,
            lastAuthor: legacy.data.last_author ?? null,
            timestamp: legacy.data.timestamp ?? new Date(0).toISOString(),
            cells: legacy.data.cells,
        },
        legacy: true,
    };
}
