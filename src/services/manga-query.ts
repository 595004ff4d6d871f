/**
 * Aggregate query: volume and chapter listing of one manga
 */

import type { NetworkManager } from './network';
import { resolveMangaId } from './resolver';
import { decodeAggregate } from './schemas';
import type { Volume } from '../types';

/**
 * Immutable description of an aggregate request.
 * `group` and `language` return a new query with the filter appended.
 *
 * @example
 * ```typescript
 * const volumes = await MangaQuery.fromReference('https://mangadex.org/title/{id}/slug')
 *     .language('en')
 *     .execute(new NetworkManager());
 * ```
 */
export class MangaQuery {
    private constructor(
        readonly id: string,
        readonly groups: readonly string[],
        readonly languages: readonly string[]
    ) {}

    static create(id: string): MangaQuery {
        return new MangaQuery(id, [], []);
    }

    /**
     * @throws InvalidReferenceError when the reference is a link that is not a title link
     */
    static fromReference(reference: string): MangaQuery {
        return MangaQuery.create(resolveMangaId(reference));
    }

    group(group: string): MangaQuery {
        return new MangaQuery(this.id, [...this.groups, group], this.languages);
    }

    language(language: string): MangaQuery {
        return new MangaQuery(this.id, this.groups, [...this.languages, language]);
    }

    /**
     * Aggregate endpoint URL with the filters as repeated query parameters
     */
    toUrl(network: NetworkManager): string {
        const params = new URLSearchParams();
        for (const group of this.groups) {
            params.append('group[]', group);
        }
        for (const language of this.languages) {
            params.append('translatedLanguage[]', language);
        }
        const query = params.toString();
        const path = `/manga/${encodeURIComponent(this.id)}/aggregate`;
        return network.apiUrl(query ? `${path}?${query}` : path);
    }

    /**
     * Runs the query with a single request
     *
     * @returns Volumes in no particular order; empty when the manga has none
     * @throws RequestError on transport failure or non-2xx status
     * @throws DecodeError when the body matches neither response shape
     */
    async execute(network: NetworkManager): Promise<Volume[]> {
        const url = this.toUrl(network);
        const response = decodeAggregate(await network.getJson(url), url);

        if (response.kind === 'empty') {
            return [];
        }
        return Object.values(response.volumes);
    }
}
