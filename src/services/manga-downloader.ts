/**
 * Manga download pipeline: resolve, query, select, then download chapter by chapter
 */

import { join } from 'node:path';

import { DEFAULT_LANGUAGE, PATHS } from '../config/constants';
import { chapterDirName, chapterLabelWidth } from '../utils/text';
import { silentLogger, type Logger } from '../utils/logger';
import { packCbz } from './cbz-packager';
import { ChapterDownloadRequest } from './chapter-request';
import { createDownloadService, type DownloadService, type ThrottleOptions } from './downloader';
import { describeError } from './errors';
import { MangaQuery } from './manga-query';
import { NetworkManager } from './network';
import { selectChapters } from './selector';
import type { Chapter, ChapterFilters, NetworkOptions } from '../types';

/**
 * A selected chapter with its destination folder
 */
export interface PlannedChapter {
    chapter: Chapter;
    name: string;
    request: ChapterDownloadRequest;
}

/**
 * Outcome of one chapter download
 */
export type ChapterResult =
    | { success: true; planned: PlannedChapter }
    | { success: false; planned: PlannedChapter; error: Error };

export interface DownloadHooks {
    onChapterStart?: (planned: PlannedChapter, position: number, total: number) => void;
    onChapterDone?: (result: ChapterResult, position: number, total: number) => void;
    onPageProgress?: (request: ChapterDownloadRequest, current: number, total: number) => void;
}

export interface PlanOptions {
    /** Parent folder of the chapter folders */
    path?: string;
    dataSaver?: boolean;
}

/**
 * Gives each chapter a destination folder under `path`.
 * Folder names come from the chapter label padded to the width of the
 * largest label; repeated names get a `_2`, `_3`... suffix so no two
 * chapters share a folder.
 *
 * @param chapters - Chapters in download order
 */
export function planChapterDownloads(chapters: readonly Chapter[], options: PlanOptions = {}): PlannedChapter[] {
    const labels = chapters.flatMap((c) => (c.chapter === undefined ? [] : [c.chapter]));
    const width = chapterLabelWidth(labels.length > 0 ? Math.max(...labels) : undefined);
    const seen = new Map<string, number>();
    const root = options.path ?? PATHS.OUTPUT_DIR;

    return chapters.map((chapter) => {
        const base = chapterDirName(chapter.chapter, width);
        const occurrence = (seen.get(base) ?? 0) + 1;
        seen.set(base, occurrence);
        const name = occurrence === 1 ? base : `${base}_${occurrence}`;

        const request = ChapterDownloadRequest.create(chapter.id)
            .withDataSaver(options.dataSaver ?? true)
            .withPath(join(root, name));
        return { chapter, name, request };
    });
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(describeError(error));
}

/**
 * Runs the planned chapters through a download service, one at a time.
 * Each call waits for `ready()`; a failed chapter is recorded and the
 * loop moves on to the next one.
 */
export async function runDownloads(
    service: DownloadService,
    plan: readonly PlannedChapter[],
    hooks: DownloadHooks = {}
): Promise<ChapterResult[]> {
    const results: ChapterResult[] = [];

    for (const [position, planned] of plan.entries()) {
        await service.ready();
        hooks.onChapterStart?.(planned, position + 1, plan.length);

        let result: ChapterResult;
        try {
            await service.call(planned.request);
            result = { success: true, planned };
        } catch (error) {
            result = { success: false, planned, error: toError(error) };
        }

        results.push(result);
        hooks.onChapterDone?.(result, position + 1, plan.length);
    }

    return results;
}

export interface DownloadMangaOptions extends DownloadHooks {
    /** Translation languages; defaults to English */
    languages?: string[];
    groups?: string[];
    filters?: ChapterFilters;
    path?: string;
    dataSaver?: boolean;
    /** Pack the downloaded chapters into a CBZ archive */
    cbz?: boolean;
    throttle?: ThrottleOptions;
    network?: NetworkOptions | NetworkManager;
    logger?: Logger;
}

export interface MangaDownloadResult {
    mangaId: string;
    chapters: ChapterResult[];
    /** Archive path when packing was requested and something was downloaded */
    archive: string | null;
}

/**
 * Downloads the selected chapters of a manga
 *
 * @param reference - Manga id or title link
 * @throws InvalidReferenceError, or RequestError/DecodeError from the aggregate query.
 *   Chapter failures are reported in the result instead.
 */
export async function downloadManga(
    reference: string,
    options: DownloadMangaOptions = {}
): Promise<MangaDownloadResult> {
    const logger = options.logger ?? silentLogger;
    const network =
        options.network instanceof NetworkManager ? options.network : new NetworkManager(options.network, logger);

    let query = MangaQuery.fromReference(reference);
    for (const language of options.languages ?? [DEFAULT_LANGUAGE]) {
        query = query.language(language);
    }
    for (const group of options.groups ?? []) {
        query = query.group(group);
    }

    const volumes = await query.execute(network);
    const chapters = selectChapters(volumes, options.filters);
    logger.debug(`${volumes.length} volumes, ${chapters.length} chapters selected`);

    const plan = planChapterDownloads(chapters, { path: options.path, dataSaver: options.dataSaver });
    const service = createDownloadService(network, {
        ...options.throttle,
        logger,
        onPageProgress: options.onPageProgress,
    });
    const results = await runDownloads(service, plan, options);

    let archive: string | null = null;
    if (options.cbz) {
        const dirs = results.filter((r) => r.success).map((r) => r.planned.request.path);
        archive = await packCbz(dirs);
    }

    return { mangaId: query.id, chapters: results, archive };
}
