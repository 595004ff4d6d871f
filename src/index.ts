/**
 * mangadex-dl - MangaDex chapter downloader
 *
 * Main entry point for the module API
 *
 * @example
 * ```typescript
 * const result = await downloadManga('https://mangadex.org/title/{id}/slug', {
 *     filters: { minChapter: 1, maxChapter: 10 },
 *     path: './downloads',
 * });
 * for (const chapter of result.chapters) {
 *     if (!chapter.success) console.error(chapter.error.message);
 * }
 * ```
 */

export type {
    Chapter,
    Volume,
    AggregateResponse,
    ChapterPageManifest,
    ChapterFilters,
    NetworkOptions,
    FetchOptions,
    HttpResponse,
    ProxyConfig,
    ProxyInput,
    ProxyProtocol,
    ProgressCallback,
} from './types/index';

export {
    MangadexError,
    InvalidReferenceError,
    RequestError,
    DecodeError,
    IoError,
} from './services/errors';
export { NetworkManager } from './services/network';
export { resolveReference, resolveMangaId, resolveChapterId, buildLink } from './services/resolver';
export { MangaQuery } from './services/manga-query';
export { compareChapters, flattenChapters, selectChapters, selectionMode } from './services/selector';
export type { SelectionMode } from './services/selector';
export { ChapterDownloadRequest } from './services/chapter-request';
export {
    ChapterDownloader,
    ThrottledDownloader,
    createDownloadService,
} from './services/downloader';
export type { DownloadService, ThrottleOptions, ChapterDownloaderOptions } from './services/downloader';
export { fetchChapterPages, fetchManifest, planPages } from './services/page-fetcher';
export type { PageTask, PageFetchOptions } from './services/page-fetcher';
export { packCbz } from './services/cbz-packager';
export type { CbzOptions } from './services/cbz-packager';
export { downloadManga, planChapterDownloads, runDownloads } from './services/manga-downloader';
export type {
    ChapterResult,
    DownloadHooks,
    DownloadMangaOptions,
    MangaDownloadResult,
    PlannedChapter,
} from './services/manga-downloader';
export { createLogger, silentLogger } from './utils/logger';
export type { Logger } from './utils/logger';
