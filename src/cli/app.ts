/**
 * CLI Application for mangadex-dl
 */

import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import { NetworkManager } from '../services/network';
import { ChapterDownloader } from '../services/downloader';
import { ChapterDownloadRequest } from '../services/chapter-request';
import { downloadManga, type ChapterResult, type PlannedChapter } from '../services/manga-downloader';
import { isLink, resolveReference } from '../services/resolver';
import { describeError } from '../services/errors';
import { createLogger, type Logger } from '../utils/logger';
import type { LinkKind } from '../config/constants';
import type { ChapterFilters, ProxyInput } from '../types';

export interface CommonCliOptions {
    path: string;
    dataSaver: boolean;
    proxy?: ProxyInput;
    verbose?: boolean;
}

export interface MangaCliOptions {
    language: string;
    groups: string[];
    filters: ChapterFilters;
    cbz: boolean;
    rate?: number;
    periodMs?: number;
}

/**
 * Main CLI Application class
 */
export class Application {
    private readonly network: NetworkManager;
    private readonly logger: Logger;

    constructor(private readonly options: CommonCliOptions) {
        this.logger = createLogger(options.verbose ?? false);
        this.network = new NetworkManager({ proxy: options.proxy }, this.logger);
    }

    /**
     * Downloads the selected chapters of a manga
     *
     * @returns Process exit code
     */
    async runManga(reference: string | undefined, options: MangaCliOptions): Promise<number> {
        console.log(chalk.cyan('\n📚 mangadex-dl - Manga Downloader\n'));

        try {
            const mangaRef = await this.getReference(reference, 'manga');
            let spinner: Ora | null = null;

            const result = await downloadManga(mangaRef, {
                network: this.network,
                logger: this.logger,
                languages: [options.language],
                groups: options.groups,
                filters: options.filters,
                path: this.options.path,
                dataSaver: this.options.dataSaver,
                cbz: options.cbz,
                throttle: { limit: options.rate, periodMs: options.periodMs },
                onChapterStart: (planned, position, total) => {
                    spinner = ora(`[${position}/${total}] Downloading ${planned.name}`).start();
                },
                onPageProgress: (request, current, total) => {
                    if (spinner) {
                        spinner.text = `Downloading ${request.path}: ${current}/${total} pages`;
                    }
                },
                onChapterDone: (chapterResult) => {
                    this.reportChapter(spinner, chapterResult);
                    spinner = null;
                },
            });

            const failed = result.chapters.filter((r) => !r.success).length;
            if (result.chapters.length === 0) {
                console.log(chalk.yellow('No chapters matched the selection.'));
            } else if (failed > 0) {
                console.log(
                    chalk.yellow(`\n⚠ Downloaded ${result.chapters.length - failed}/${result.chapters.length} chapters`)
                );
            } else {
                console.log(chalk.green(`\n✅ Downloaded ${result.chapters.length} chapters to ${this.options.path}`));
            }
            if (result.archive) {
                console.log(chalk.green(`📦 Archive: ${result.archive}`));
            }
            return failed > 0 ? 1 : 0;
        } catch (error) {
            return this.fail(error);
        }
    }

    /**
     * Downloads a single chapter without admission control
     *
     * @returns Process exit code
     */
    async runChapter(reference: string | undefined): Promise<number> {
        try {
            const chapterRef = await this.getReference(reference, 'chapter');
            const request = ChapterDownloadRequest.fromReference(chapterRef)
                .withPath(this.options.path)
                .withDataSaver(this.options.dataSaver);

            const spinner = ora(`Downloading chapter ${request.id}`).start();
            const downloader = new ChapterDownloader(this.network, {
                logger: this.logger,
                onPageProgress: (_, current, total) => {
                    spinner.text = `Downloading chapter ${request.id}: ${current}/${total} pages`;
                },
            });

            try {
                await downloader.ready();
                await downloader.call(request);
            } catch (error) {
                spinner.fail(chalk.red(`Failed: ${describeError(error)}`));
                return 1;
            }
            spinner.succeed(chalk.green(`Saved to ${request.path}`));
            return 0;
        } catch (error) {
            return this.fail(error);
        }
    }

    /**
     * Reference from the command line, or asked for interactively
     */
    private async getReference(reference: string | undefined, kind: LinkKind): Promise<string> {
        if (reference) {
            return reference;
        }
        return input({
            message: kind === 'manga' ? 'Manga id or URL:' : 'Chapter id or URL:',
            validate: (value) => {
                if (!value.trim()) return 'A reference is required';
                if (!isLink(value.trim())) return true;
                try {
                    resolveReference(value, kind);
                    return true;
                } catch (error) {
                    return describeError(error);
                }
            },
        });
    }

    private reportChapter(spinner: Ora | null, result: ChapterResult): void {
        const label = describePlanned(result.planned);
        if (result.success) {
            spinner?.succeed(chalk.green(label));
        } else {
            const message = `${label}: ${result.error.message}`;
            if (spinner) {
                spinner.fail(chalk.red(message));
            } else {
                this.logger.error(message);
            }
        }
    }

    private fail(error: unknown): number {
        if (error instanceof Error && error.name === 'ExitPromptError') {
            console.log(chalk.yellow('\nGoodbye! 👋'));
            return 0;
        }
        this.logger.error(`\nError: ${describeError(error)}`);
        return 1;
    }
}

function describePlanned(planned: PlannedChapter): string {
    return `${planned.name} (${planned.chapter.id})`;
}
