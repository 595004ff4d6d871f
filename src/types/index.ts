/**
 * Shared types for mangadex-dl
 */

/**
 * A chapter entry from the aggregate endpoint
 */
export interface Chapter {
    /** Numeric chapter label, absent when the source label is not a number */
    chapter?: number;
    /** Identifier used to fetch the page manifest */
    id: string;
    /** Number of additional variants (other groups/uploads) */
    count: number;
    /** Identifiers of the alternate variants */
    others: string[];
}

/**
 * A volume entry from the aggregate endpoint
 */
export interface Volume {
    /** Numeric volume label, absent when the source label is not a number */
    volume?: number;
    count: number;
    /** Chapters keyed by their source label; key order carries no meaning */
    chapters: Record<string, Chapter>;
}

/**
 * Decoded aggregate response: either the explicit "no volumes" marker
 * or a mapping of volume key to Volume
 */
export type AggregateResponse =
    | { kind: 'empty' }
    | { kind: 'populated'; volumes: Record<string, Volume> };

/**
 * Page manifest returned by the at-home server endpoint
 */
export interface ChapterPageManifest {
    baseUrl: string;
    chapter: {
        hash: string;
        /** Original quality filenames */
        data: string[];
        /** Compressed quality filenames */
        dataSaver: string[];
    };
}

/**
 * User criteria for chapter selection.
 * Empty lists and absent bounds mean "not set".
 */
export interface ChapterFilters {
    volumes?: number[];
    chapters?: number[];
    minChapter?: number;
    maxChapter?: number;
    minVolume?: number;
    maxVolume?: number;
}

/**
 * Supported proxy protocols
 */
export type ProxyProtocol = 'http' | 'https' | 'socks5';

/**
 * Parsed proxy configuration
 */
export interface ProxyConfig {
    protocol: ProxyProtocol;
    host: string;
    port: number;
    username?: string;
    password?: string;
}

/**
 * Single proxy URL or list of proxy URLs
 */
export type ProxyInput = string | string[];

/**
 * Options for NetworkManager
 */
export interface NetworkOptions {
    /** API root, without trailing slash */
    apiBaseUrl?: string;
    timeout?: number;
    headers?: Record<string, string>;
    proxy?: ProxyInput;
}

/**
 * Options for a single fetch
 */
export interface FetchOptions {
    headers?: Record<string, string>;
    timeout?: number;
}

/**
 * Buffered HTTP response, independent of the transport that produced it
 */
export interface HttpResponse {
    url: string;
    status: number;
    statusText: string;
    body: Buffer;
}

/**
 * Progress callback type
 */
export type ProgressCallback = (current: number, total: number) => void;
