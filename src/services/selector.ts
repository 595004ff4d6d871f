/**
 * Chapter ordering and selection
 */

import type { Chapter, ChapterFilters, Volume } from '../types';

/**
 * Total order on chapters: unlabeled chapters first, then by numeric label
 */
export function compareChapters(a: Chapter, b: Chapter): number {
    if (a.chapter === undefined) {
        return b.chapter === undefined ? 0 : -1;
    }
    if (b.chapter === undefined) {
        return 1;
    }
    return a.chapter - b.chapter;
}

/**
 * Collects every chapter of the given volumes into one sorted list.
 * Array.prototype.sort is stable, so equal chapters keep their collection order.
 */
export function flattenChapters(volumes: readonly Volume[]): Chapter[] {
    return volumes.flatMap((v) => Object.values(v.chapters)).sort(compareChapters);
}

/**
 * Checks a label against optional bounds. An absent label never satisfies a range.
 */
export function inRange(label: number | undefined, min?: number, max?: number): boolean {
    if (label === undefined) {
        return false;
    }
    return (min === undefined || label >= min) && (max === undefined || label <= max);
}

function listed(label: number | undefined, values: readonly number[]): boolean {
    return label !== undefined && values.includes(label);
}

/**
 * Name of the filter that selectChapters will apply, by precedence
 */
export type SelectionMode = 'volumes' | 'chapters' | 'chapterRange' | 'volumeRange' | 'all';

export function selectionMode(filters: ChapterFilters): SelectionMode {
    if (filters.volumes && filters.volumes.length > 0) {
        return 'volumes';
    }
    if (filters.chapters && filters.chapters.length > 0) {
        return 'chapters';
    }
    if (filters.minChapter !== undefined || filters.maxChapter !== undefined) {
        return 'chapterRange';
    }
    if (filters.minVolume !== undefined || filters.maxVolume !== undefined) {
        return 'volumeRange';
    }
    return 'all';
}

/**
 * Orders and filters the chapters of a manga.
 * Only the first set filter is applied: volume list, chapter list,
 * chapter range, volume range, in that order.
 *
 * @param volumes - Volumes from the aggregate query, in any order
 * @param filters - User criteria
 * @returns Chapters in download order
 */
export function selectChapters(volumes: readonly Volume[], filters: ChapterFilters = {}): Chapter[] {
    switch (selectionMode(filters)) {
        case 'volumes': {
            const wanted = filters.volumes ?? [];
            return flattenChapters(volumes.filter((v) => listed(v.volume, wanted)));
        }
        case 'chapters': {
            const wanted = filters.chapters ?? [];
            return flattenChapters(volumes).filter((c) => listed(c.chapter, wanted));
        }
        case 'chapterRange':
            return flattenChapters(volumes).filter((c) =>
                inRange(c.chapter, filters.minChapter, filters.maxChapter)
            );
        case 'volumeRange':
            return flattenChapters(
                volumes.filter((v) => inRange(v.volume, filters.minVolume, filters.maxVolume))
            );
        case 'all':
            return flattenChapters(volumes);
    }
}
