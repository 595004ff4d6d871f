#!/usr/bin/env tsx
/**
 * CLI Entry Point for mangadex-dl
 */

import { Command, InvalidArgumentError, Option } from 'commander';

import { Application } from '../cli/app';
import { DEFAULT_LANGUAGE, PATHS, THROTTLE } from '../config/constants';
import { isValidProxyUrl, splitProxyList } from '../utils/proxy';
import type { ProxyInput } from '../types';

interface CommonCommandOptions {
    path: string;
    raw?: boolean;
    proxy?: ProxyInput;
    verbose?: boolean;
}

interface MangaCommandOptions extends CommonCommandOptions {
    language: string;
    group: string[];
    chapter: number[];
    volume: number[];
    minChapter?: number;
    maxChapter?: number;
    minVolume?: number;
    maxVolume?: number;
    cbz?: boolean;
    rate: number;
    period: number;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`'${value}' is not a number.`);
    }
    return parsed;
}

function parsePositiveInt(value: string): number {
    const parsed = parseNumber(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError(`'${value}' is not a positive integer.`);
    }
    return parsed;
}

function collectNumber(value: string, previous: number[]): number[] {
    return [...previous, parseNumber(value)];
}

function collectString(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function parseProxy(value: string): ProxyInput {
    const urls = splitProxyList(value);
    for (const url of urls) {
        if (!isValidProxyUrl(url)) {
            throw new InvalidArgumentError(
                `Invalid proxy URL: ${url}. Supported formats: http://host:port, https://host:port, socks5://host:port`
            );
        }
    }
    const [single] = urls;
    return urls.length === 1 && single !== undefined ? single : urls;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('-p, --path <dir>', 'destination folder', PATHS.OUTPUT_DIR)
        .option('-r, --raw', 'download uncompressed images')
        .option('--proxy <urls>', 'proxy URL(s) to use (comma-separated for rotation)', parseProxy)
        .option('--verbose', 'enable verbose output');
}

const program = new Command();

program
    .name('mangadex-dl')
    .description('Download manga chapters from MangaDex')
    .version('1.0.0');

const selections = ['volume', 'chapter', 'chapterRange', 'volumeRange'] as const;
type Selection = (typeof selections)[number];

function conflictsExcept(own: Selection): string[] {
    const names: Record<Selection, string[]> = {
        volume: ['volume'],
        chapter: ['chapter'],
        chapterRange: ['minChapter', 'maxChapter'],
        volumeRange: ['minVolume', 'maxVolume'],
    };
    return selections.filter((s) => s !== own).flatMap((s) => names[s]);
}

withCommonOptions(
    program
        .command('manga')
        .description('Download the chapters of a manga')
        .argument('[manga]', 'manga id or url')
        .option('-l, --language <code>', 'translation language', DEFAULT_LANGUAGE)
        .option('-g, --group <id>', 'translation group (repeatable)', collectString, [])
        .addOption(
            new Option('-c, --chapter <number>', 'chapter to download (repeatable)')
                .argParser(collectNumber)
                .default([])
                .conflicts(conflictsExcept('chapter'))
        )
        .addOption(
            new Option('-v, --volume <number>', 'volume to download (repeatable)')
                .argParser(collectNumber)
                .default([])
                .conflicts(conflictsExcept('volume'))
        )
        .addOption(
            new Option('--min-chapter <number>', 'lowest chapter to download')
                .argParser(parseNumber)
                .conflicts(conflictsExcept('chapterRange'))
        )
        .addOption(
            new Option('--max-chapter <number>', 'highest chapter to download')
                .argParser(parseNumber)
                .conflicts(conflictsExcept('chapterRange'))
        )
        .addOption(
            new Option('--min-volume <number>', 'lowest volume to download')
                .argParser(parseNumber)
                .conflicts(conflictsExcept('volumeRange'))
        )
        .addOption(
            new Option('--max-volume <number>', 'highest volume to download')
                .argParser(parseNumber)
                .conflicts(conflictsExcept('volumeRange'))
        )
        .option('--cbz', 'pack the downloaded chapters into a cbz file')
        .option('--rate <count>', 'chapters started per period', parsePositiveInt, THROTTLE.LIMIT)
        .option('--period <ms>', 'admission period in milliseconds', parseNumber, THROTTLE.PERIOD_MS)
).action(async (manga: string | undefined, options: MangaCommandOptions) => {
    const app = new Application({
        path: options.path,
        dataSaver: !options.raw,
        proxy: options.proxy,
        verbose: options.verbose,
    });
    process.exitCode = await app.runManga(manga, {
        language: options.language,
        groups: options.group,
        filters: {
            chapters: options.chapter,
            volumes: options.volume,
            minChapter: options.minChapter,
            maxChapter: options.maxChapter,
            minVolume: options.minVolume,
            maxVolume: options.maxVolume,
        },
        cbz: options.cbz ?? false,
        rate: options.rate,
        periodMs: options.period,
    });
});

withCommonOptions(
    program
        .command('chapter')
        .description('Download a single chapter')
        .argument('[chapter]', 'chapter id or url')
).action(async (chapter: string | undefined, options: CommonCommandOptions) => {
    const app = new Application({
        path: options.path,
        dataSaver: !options.raw,
        proxy: options.proxy,
        verbose: options.verbose,
    });
    process.exitCode = await app.runChapter(chapter);
});

await program.parseAsync();
