/**
 * Tests for the manga download pipeline and CBZ packing
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fc from 'fast-check';
import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import JSZip from 'jszip';
import { downloadManga, planChapterDownloads, runDownloads } from '../../src/services/manga-downloader';
import { packCbz } from '../../src/services/cbz-packager';
import { InvalidReferenceError } from '../../src/services/errors';
import type { DownloadService } from '../../src/services/downloader';
import type { Chapter } from '../../src/types';
import {
    API,
    UPLOADS,
    jsonResponse,
    makeTempDir,
    removeTempDir,
    stubFetch,
    textResponse,
} from '../helpers/fake-api';

function chapter(id: string, value?: number): Chapter {
    return { chapter: value, id, count: 1, others: [] };
}

const aggregate = {
    result: 'ok',
    volumes: {
        '1': {
            volume: '1',
            count: 2,
            chapters: {
                '1': { chapter: '1', id: 'ch-1', count: 1, others: [] },
                '2': { chapter: '2', id: 'ch-2', count: 1, others: [] },
            },
        },
        none: {
            volume: 'none',
            count: 1,
            chapters: { none: { chapter: 'none', id: 'ch-x', count: 1, others: [] } },
        },
    },
};

/**
 * Serves manga m-1; every chapter has pages a.jpg and b.jpg whose body is `{chapter}:{file}`
 */
function serveManga(failing: string[] = []): URL[] {
    const api = stubFetch((url) => {
        if (url.origin === API && url.pathname === '/manga/m-1/aggregate') {
            return jsonResponse(aggregate);
        }
        if (url.origin === API && url.pathname.startsWith('/at-home/server/')) {
            const id = url.pathname.slice('/at-home/server/'.length);
            if (failing.includes(id)) {
                return textResponse('missing', 404, 'Not Found');
            }
            return jsonResponse({ baseUrl: UPLOADS, chapter: { hash: id, data: [], dataSaver: ['a.jpg', 'b.jpg'] } });
        }
        if (url.origin === UPLOADS) {
            const [, , hash, file] = url.pathname.split('/');
            return textResponse(`${hash}:${file}`);
        }
        return textResponse('unexpected', 500);
    });
    return api.requests;
}

async function archiveEntries(path: string): Promise<JSZip> {
    return JSZip.loadAsync(await readFile(path));
}

function fileNames(zip: JSZip): string[] {
    return Object.values(zip.files)
        .filter((entry) => !entry.dir)
        .map((entry) => entry.name)
        .sort();
}

describe('Manga downloader property tests', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await removeTempDir(root);
    });

    describe('planChapterDownloads', () => {
        it('should pad folder names to the widest label', () => {
            const plan = planChapterDownloads([chapter('a', 1), chapter('b', 2), chapter('c', 10)], { path: root });

            expect(plan.map((p) => p.name)).toEqual(['chapter_01', 'chapter_02', 'chapter_10']);
            expect(plan.map((p) => p.request.path)).toEqual([
                join(root, 'chapter_01'),
                join(root, 'chapter_02'),
                join(root, 'chapter_10'),
            ]);
            expect(plan.every((p) => p.request.dataSaver)).toBe(true);
        });

        it('should suffix repeated names', () => {
            const plan = planChapterDownloads(
                [chapter('n1'), chapter('n2'), chapter('a', 5), chapter('b', 5)],
                { path: root, dataSaver: false }
            );

            expect(plan.map((p) => p.name)).toEqual(['chapter_none', 'chapter_none_2', 'chapter_5', 'chapter_5_2']);
            expect(plan.map((p) => p.request.id)).toEqual(['n1', 'n2', 'a', 'b']);
            expect(plan.some((p) => p.request.dataSaver)).toBe(false);
        });

        it('should never give two chapters the same folder', () => {
            fc.assert(
                fc.property(
                    fc.array(fc.option(fc.integer({ min: 0, max: 20 }), { nil: undefined }), { maxLength: 30 }),
                    (labels) => {
                        const plan = planChapterDownloads(labels.map((l, i) => chapter(`c${i}`, l)));
                        expect(new Set(plan.map((p) => p.name)).size).toBe(plan.length);
                    }
                ),
                { numRuns: 100 }
            );
        });
    });

    describe('runDownloads', () => {
        it('should wait for ready before each call and go on after a failure', async () => {
            const events: string[] = [];
            const service: DownloadService = {
                async ready() {
                    events.push('ready');
                },
                async call(request) {
                    events.push(`call:${request.id}`);
                    if (request.id === 'b') {
                        throw new Error('boom');
                    }
                },
            };
            const plan = planChapterDownloads([chapter('a', 1), chapter('b', 2), chapter('c', 3)], { path: root });
            const done: Array<[string, boolean, number, number]> = [];

            const results = await runDownloads(service, plan, {
                onChapterDone: (result, position, total) =>
                    done.push([result.planned.name, result.success, position, total]),
            });

            expect(events).toEqual(['ready', 'call:a', 'ready', 'call:b', 'ready', 'call:c']);
            expect(done).toEqual([
                ['chapter_1', true, 1, 3],
                ['chapter_2', false, 2, 3],
                ['chapter_3', true, 3, 3],
            ]);
            const failed = results[1];
            expect(failed?.success === false ? failed.error.message : null).toBe('boom');
        });
    });

    describe('downloadManga', () => {
        it('should download the selected chapters in order into numbered folders', async () => {
            const requests = serveManga();
            const started: string[] = [];

            const result = await downloadManga('https://mangadex.org/title/m-1/some-title', {
                path: root,
                network: { apiBaseUrl: API },
                throttle: { periodMs: 0 },
                onChapterStart: (planned) => started.push(planned.name),
            });

            expect(result.mangaId).toBe('m-1');
            expect(result.archive).toBeNull();
            expect(result.chapters.map((c) => c.success)).toEqual([true, true, true]);
            expect(started).toEqual(['chapter_none', 'chapter_1', 'chapter_2']);
            expect((await readdir(root)).sort()).toEqual(['chapter_1', 'chapter_2', 'chapter_none']);
            expect((await readdir(join(root, 'chapter_2'))).sort()).toEqual(['page_0.jpg', 'page_1.jpg']);
            expect(await readFile(join(root, 'chapter_2', 'page_1.jpg'), 'utf-8')).toBe('ch-2:b.jpg');

            const first = requests[0];
            expect(first?.pathname).toBe('/manga/m-1/aggregate');
            expect(first?.searchParams.getAll('translatedLanguage[]')).toEqual(['en']);
        });

        it('should apply filters, languages and groups', async () => {
            const requests = serveManga();

            const result = await downloadManga('m-1', {
                path: root,
                network: { apiBaseUrl: API },
                throttle: { periodMs: 0 },
                languages: ['fr', 'es'],
                groups: ['g-1'],
                filters: { chapters: [2] },
            });

            expect(result.chapters.map((c) => c.planned.chapter.id)).toEqual(['ch-2']);
            expect(requests[0]?.searchParams.getAll('translatedLanguage[]')).toEqual(['fr', 'es']);
            expect(requests[0]?.searchParams.getAll('group[]')).toEqual(['g-1']);
        });

        it('should pack only the chapters that succeeded', async () => {
            serveManga(['ch-1']);

            const result = await downloadManga('m-1', {
                path: root,
                network: { apiBaseUrl: API },
                throttle: { periodMs: 0 },
                cbz: true,
            });

            expect(result.chapters.map((c) => c.success)).toEqual([true, false, true]);
            expect(result.archive).toBe(join(root, 'manga.cbz'));

            const zip = await archiveEntries(join(root, 'manga.cbz'));
            expect(fileNames(zip)).toEqual([
                '00000_chapter_none/page_0.jpg',
                '00000_chapter_none/page_1.jpg',
                '00001_chapter_2/page_0.jpg',
                '00001_chapter_2/page_1.jpg',
            ]);
            expect(await zip.file('00001_chapter_2/page_1.jpg')?.async('string')).toBe('ch-2:b.jpg');
            expect(await readdir(root)).toEqual(['manga.cbz']);
        });

        it('should reject a foreign link before any request', async () => {
            const requests = serveManga();

            await expect(downloadManga('https://example.com/title/m-1', { path: root })).rejects.toBeInstanceOf(
                InvalidReferenceError
            );
            expect(requests).toHaveLength(0);
        });

        it('should download nothing for an empty aggregate', async () => {
            stubFetch(() => jsonResponse({ result: 'ok', volumes: [] }));

            const result = await downloadManga('m-1', { path: root, network: { apiBaseUrl: API }, cbz: true });

            expect(result.chapters).toEqual([]);
            expect(result.archive).toBeNull();
            expect(await readdir(root)).toEqual([]);
        });
    });

    describe('packCbz', () => {
        it('should return null when there is nothing to pack', async () => {
            await expect(packCbz([])).resolves.toBeNull();
        });

        it('should keep the sources when asked to', async () => {
            const dir = join(root, 'chapter_1');
            await mkdir(dir);
            await writeFile(join(dir, 'page_0.jpg'), 'x');

            const archive = await packCbz([dir], { fileName: 'one.cbz', removeSources: false });

            expect(archive).toBe(join(root, 'one.cbz'));
            expect(existsSync(dir)).toBe(true);
            expect(fileNames(await archiveEntries(join(root, 'one.cbz')))).toEqual(['00000_chapter_1/page_0.jpg']);
        });
    });
});
