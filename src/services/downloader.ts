/**
 * Chapter download services
 *
 * A DownloadService is driven by pairs of calls: await `ready()`, then
 * `call(request)`. The base ChapterDownloader is always ready;
 * ThrottledDownloader wraps any service and paces how often `call` may start.
 */

import { THROTTLE } from '../config/constants';
import { silentLogger, type Logger } from '../utils/logger';
import { fetchChapterPages } from './page-fetcher';
import type { ChapterDownloadRequest } from './chapter-request';
import type { NetworkManager } from './network';
import type { ProgressCallback } from '../types';

export interface DownloadService {
    /**
     * Resolves once the service accepts the next `call`
     */
    ready(): Promise<void>;

    /**
     * Starts one chapter download
     *
     * @returns Settles when the chapter is fully downloaded or has failed
     *   with a MangadexError
     */
    call(request: ChapterDownloadRequest): Promise<void>;
}

export interface ChapterDownloaderOptions {
    logger?: Logger;
    onPageProgress?: (request: ChapterDownloadRequest, current: number, total: number) => void;
}

/**
 * Downloads chapters through the page fetcher. No admission control.
 */
export class ChapterDownloader implements DownloadService {
    private readonly logger: Logger;

    constructor(
        private readonly network: NetworkManager,
        private readonly options: ChapterDownloaderOptions = {}
    ) {
        this.logger = options.logger ?? silentLogger;
    }

    async ready(): Promise<void> {
        // always ready
    }

    async call(request: ChapterDownloadRequest): Promise<void> {
        const onPageProgress = this.options.onPageProgress;
        const onProgress: ProgressCallback | undefined = onPageProgress
            ? (current, total) => onPageProgress(request, current, total)
            : undefined;

        await fetchChapterPages(this.network, request, { logger: this.logger, onProgress });
    }
}

export interface ThrottleOptions {
    /** Call starts admitted per window */
    limit?: number;
    /** Window length in milliseconds */
    periodMs?: number;
}

/**
 * Admission gate: at most `limit` calls start per `periodMs` window.
 *
 * A window opens at the first admission after the previous one expired.
 * `ready()` reserves a slot, waiting for the next window when the current
 * one is used up; `call()` spends the reservation and delegates unchanged,
 * so chapters already running are never paused. Concurrent `ready()`
 * callers are queued and admitted in arrival order.
 */
export class ThrottledDownloader implements DownloadService {
    private readonly limit: number;
    private readonly periodMs: number;
    private windowEnd: number = Number.NEGATIVE_INFINITY;
    private remaining: number = 0;
    private reserved: number = 0;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly inner: DownloadService,
        options: ThrottleOptions = {}
    ) {
        this.limit = options.limit ?? THROTTLE.LIMIT;
        this.periodMs = options.periodMs ?? THROTTLE.PERIOD_MS;

        if (!Number.isInteger(this.limit) || this.limit < 1) {
            throw new Error(`Throttle limit must be a positive integer, got ${this.limit}`);
        }
        if (!Number.isFinite(this.periodMs) || this.periodMs < 0) {
            throw new Error(`Throttle period must be a non-negative number, got ${this.periodMs}`);
        }
    }

    ready(): Promise<void> {
        const turn = this.queue.then(() => this.admit());
        // a failed admission rejects its own caller only
        this.queue = turn.catch(() => undefined);
        return turn;
    }

    /**
     * @throws Error when no slot was reserved by a preceding `ready()`
     */
    call(request: ChapterDownloadRequest): Promise<void> {
        if (this.reserved === 0) {
            return Promise.reject(new Error('ThrottledDownloader.call() invoked without a preceding ready()'));
        }
        this.reserved--;
        return this.inner.call(request);
    }

    private async admit(): Promise<void> {
        await this.inner.ready();

        let now = Date.now();
        if (now >= this.windowEnd) {
            this.openWindow(now);
        }
        if (this.remaining === 0) {
            await sleep(this.windowEnd - now);
            now = Date.now();
            this.openWindow(now);
        }

        this.remaining--;
        this.reserved++;
    }

    private openWindow(now: number): void {
        this.windowEnd = now + this.periodMs;
        this.remaining = this.limit;
    }
}

/**
 * Builds the default service stack: page fetcher behind the admission gate
 */
export function createDownloadService(
    network: NetworkManager,
    options: ChapterDownloaderOptions & ThrottleOptions = {}
): DownloadService {
    return new ThrottledDownloader(new ChapterDownloader(network, options), options);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
