/**
 * Page Fetcher
 * Downloads every page of one chapter concurrently into its destination folder.
 */

import { join } from 'node:path';

import { QUALITY, type Quality } from '../config/constants';
import { ensureDir, writeBytes } from '../utils/fs';
import { digitCount, pageFileName } from '../utils/text';
import { silentLogger, type Logger } from '../utils/logger';
import { decodeManifest } from './schemas';
import { describeError } from './errors';
import type { ChapterDownloadRequest } from './chapter-request';
import type { NetworkManager } from './network';
import type { ChapterPageManifest, ProgressCallback } from '../types';

/**
 * One page to download: where from and where to
 */
export interface PageTask {
    index: number;
    url: string;
    file: string;
}

export interface PageFetchOptions {
    logger?: Logger;
    /** Called after each page settles, successfully or not */
    onProgress?: ProgressCallback;
}

/**
 * Fetches the page manifest of a chapter
 *
 * @throws RequestError or DecodeError
 */
export async function fetchManifest(
    network: NetworkManager,
    chapterId: string
): Promise<ChapterPageManifest> {
    const url = network.apiUrl(`/at-home/server/${encodeURIComponent(chapterId)}`);
    return decodeManifest(await network.getJson(url), url);
}

/**
 * Lays out the page downloads for a manifest.
 * File names depend only on the page index, never on completion order.
 *
 * @param manifest - Page manifest of the chapter
 * @param dataSaver - Compressed (true) or original (false) pages
 * @param dir - Destination folder
 */
export function planPages(manifest: ChapterPageManifest, dataSaver: boolean, dir: string): PageTask[] {
    const quality: Quality = dataSaver ? QUALITY.DATA_SAVER : QUALITY.ORIGINAL;
    const files = dataSaver ? manifest.chapter.dataSaver : manifest.chapter.data;
    const width = digitCount(files.length);

    return files.map((filename, index) => ({
        index,
        url: `${manifest.baseUrl}/${quality}/${manifest.chapter.hash}/${filename}`,
        file: join(dir, pageFileName(index, width, filename)),
    }));
}

/**
 * Downloads one chapter described by the request.
 *
 * The manifest is fetched first; if that fails nothing is written.
 * All pages are then started at once and awaited together. A failing page
 * does not stop the others: once every page has settled, the failure of
 * the lowest page index is thrown. Pages written before that stay on disk.
 *
 * @throws RequestError, DecodeError or IoError
 */
export async function fetchChapterPages(
    network: NetworkManager,
    request: ChapterDownloadRequest,
    options: PageFetchOptions = {}
): Promise<void> {
    const logger = options.logger ?? silentLogger;
    logger.debug(`Fetching manifest for ${request.toString()}`);

    const manifest = await fetchManifest(network, request.id);
    await ensureDir(request.path);

    const tasks = planPages(manifest, request.dataSaver, request.path);
    let settled = 0;

    // runs in each page's finally, so it must not throw
    const reportProgress = (): void => {
        settled++;
        try {
            options.onProgress?.(settled, tasks.length);
        } catch (error) {
            logger.warn(`Progress callback failed: ${describeError(error)}`);
        }
    };

    const downloads = tasks.map(async (task) => {
        try {
            logger.debug(`Download ${task.file}`);
            const bytes = await network.getBytes(task.url);
            await writeBytes(task.file, bytes);
        } finally {
            reportProgress();
        }
    });

    const results = await Promise.allSettled(downloads);
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) {
        const failedCount = results.filter((r) => r.status === 'rejected').length;
        logger.debug(`${failedCount}/${tasks.length} pages failed in ${request.path}`);
        throw failure.reason;
    }
}
