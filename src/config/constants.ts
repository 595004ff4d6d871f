/**
 * Constants for mangadex-dl
 */

/**
 * Root of the MangaDex REST API
 */
export const API_BASE_URL = 'https://api.mangadex.org';

/**
 * Host of the public site whose title/chapter links are accepted
 */
export const SITE_HOST = 'mangadex.org';

/**
 * First path segment of a detail link, per entity kind
 */
export const LINK_KEYWORDS = {
    manga: 'title',
    chapter: 'chapter',
} as const;

/**
 * Path segment that selects the page quality on the image server
 */
export const QUALITY = {
    DATA_SAVER: 'data-saver',
    ORIGINAL: 'data',
} as const;

/**
 * HTTP headers sent with every request
 */
export const HEADERS: Record<string, string> = {
    'User-Agent': 'mangadex-dl/1.0.0 (+https://www.npmjs.com/package/mangadex-dl)',
    Accept: 'application/json, image/*;q=0.9, */*;q=0.8',
};

/**
 * Network configuration
 */
export const NETWORK = {
    /** Request timeout in milliseconds */
    TIMEOUT: 30000,
} as const;

/**
 * Chapter admission defaults: at most LIMIT chapter downloads start per PERIOD_MS
 */
export const THROTTLE = {
    LIMIT: 1,
    PERIOD_MS: 2000,
} as const;

/**
 * Default filesystem locations
 */
export const PATHS = {
    /** Destination folder when none is given */
    OUTPUT_DIR: '.',
    /** Archive file written next to the chapter folders */
    CBZ_FILE: 'manga.cbz',
} as const;

/**
 * Translation language used when none is given on the command line
 */
export const DEFAULT_LANGUAGE = 'en';

export type Quality = (typeof QUALITY)[keyof typeof QUALITY];
export type LinkKind = keyof typeof LINK_KEYWORDS;
