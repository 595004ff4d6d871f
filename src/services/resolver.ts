/**
 * Identifier resolution for manga and chapter references.
 * A reference is either a bare identifier or a detail link on the site host.
 */

import { LINK_KEYWORDS, SITE_HOST, type LinkKind } from '../config/constants';
import { InvalidReferenceError } from './errors';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Checks whether a reference looks like a link rather than a bare identifier
 */
export function isLink(input: string): boolean {
    return SCHEME_PATTERN.test(input) || input.includes('/');
}

/**
 * Resolves a reference of the given kind into its identifier
 *
 * @param input - Bare identifier, or a link such as `https://mangadex.org/title/{id}/{slug}`
 * @param kind - Entity kind; selects the expected first path segment
 * @throws InvalidReferenceError on a foreign host, a wrong first segment or a missing identifier
 */
export function resolveReference(input: string, kind: LinkKind): string {
    const trimmed = input.trim();
    if (!trimmed) {
        throw new InvalidReferenceError(input);
    }
    if (!isLink(trimmed)) {
        return trimmed;
    }

    let url: URL;
    try {
        url = new URL(SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`);
    } catch {
        throw new InvalidReferenceError(input);
    }

    if (url.hostname.toLowerCase() !== SITE_HOST) {
        throw new InvalidReferenceError(input);
    }

    const segments = url.pathname.split('/').filter((s) => s.length > 0);
    const [keyword, id] = segments;
    if (keyword !== LINK_KEYWORDS[kind] || !id) {
        throw new InvalidReferenceError(input);
    }

    try {
        return decodeURIComponent(id);
    } catch {
        throw new InvalidReferenceError(input);
    }
}

export function resolveMangaId(input: string): string {
    return resolveReference(input, 'manga');
}

export function resolveChapterId(input: string): string {
    return resolveReference(input, 'chapter');
}

/**
 * Builds the public detail link for an identifier
 */
export function buildLink(id: string, kind: LinkKind, slug?: string): string {
    const tail = slug ? `/${encodeURIComponent(slug)}` : '';
    return `https://${SITE_HOST}/${LINK_KEYWORDS[kind]}/${encodeURIComponent(id)}${tail}`;
}
