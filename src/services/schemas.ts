/**
 * Wire schemas for the MangaDex API responses
 */

import { z } from 'zod';

import { DecodeError } from './errors';
import type { AggregateResponse, Chapter, ChapterPageManifest, Volume } from '../types';

const NUMERIC_LABEL = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Reads a volume or chapter label as a number.
 * Anything that is not plain decimal text ("none", "", "NaN", "1a", null) is absent.
 */
export function parseLabel(raw: unknown): number | undefined {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : undefined;
    }
    if (typeof raw !== 'string') {
        return undefined;
    }
    const text = raw.trim();
    if (!NUMERIC_LABEL.test(text)) {
        return undefined;
    }
    const value = Number.parseFloat(text);
    return Number.isFinite(value) ? value : undefined;
}

const labelSchema = z
    .union([z.string(), z.number(), z.null()])
    .optional()
    .transform((raw) => parseLabel(raw));

export const chapterSchema = z
    .object({
        chapter: labelSchema,
        id: z.string().min(1),
        count: z.number().int().nonnegative(),
        others: z.array(z.string()).default([]),
    })
    .transform((raw): Chapter => {
        const chapter: Chapter = { id: raw.id, count: raw.count, others: raw.others };
        if (raw.chapter !== undefined) {
            chapter.chapter = raw.chapter;
        }
        return chapter;
    });

// The API sends `[]` instead of `{}` for an empty mapping
const emptyList = z.array(z.unknown()).length(0);

export const volumeSchema = z
    .object({
        volume: labelSchema,
        count: z.number().int().nonnegative(),
        chapters: z.union([
            z.record(chapterSchema),
            emptyList.transform((): Record<string, Chapter> => ({})),
        ]),
    })
    .transform((raw): Volume => {
        const volume: Volume = { count: raw.count, chapters: raw.chapters };
        if (raw.volume !== undefined) {
            volume.volume = raw.volume;
        }
        return volume;
    });

/**
 * Untagged aggregate body: the empty marker or a volume mapping
 */
export const aggregateSchema = z.union([
    z.object({ volumes: emptyList }).transform((): AggregateResponse => ({ kind: 'empty' })),
    z
        .object({ volumes: z.record(volumeSchema) })
        .transform((raw): AggregateResponse => ({ kind: 'populated', volumes: raw.volumes })),
]);

export const manifestSchema = z.object({
    baseUrl: z.string().url(),
    chapter: z.object({
        hash: z.string().min(1),
        data: z.array(z.string()),
        dataSaver: z.array(z.string()),
    }),
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validates a parsed JSON value against a schema
 *
 * @param url - Source of the value, carried by the error
 * @throws DecodeError when the value does not match
 */
export function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, url: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new DecodeError(`Unexpected response from ${url}: ${formatIssues(result.error)}`, url, {
            cause: result.error,
        });
    }
    return result.data;
}

export function decodeAggregate(value: unknown, url: string): AggregateResponse {
    return decode(aggregateSchema, value, url);
}

export function decodeManifest(value: unknown, url: string): ChapterPageManifest {
    return decode(manifestSchema, value, url);
}
