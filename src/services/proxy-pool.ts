/**
 * Proxy Pool Service
 * Hands out proxies in round-robin order, one per request.
 */

import type { ProxyConfig, ProxyInput } from '../types';
import { parseProxyUrl } from '../utils/proxy';

export class ProxyPool {
    private readonly proxies: ProxyConfig[];
    private currentIndex: number = 0;

    /**
     * @param input - Single proxy URL or array of proxy URLs
     * @throws Error if the list is empty or any proxy URL is invalid
     */
    constructor(input: ProxyInput) {
        const urls = Array.isArray(input) ? input : [input];

        if (urls.length === 0) {
            throw new Error('ProxyPool requires at least one proxy URL');
        }

        this.proxies = urls.map((url) => parseProxyUrl(url));
    }

    /**
     * Gets the next proxy in rotation
     */
    next(): ProxyConfig {
        const proxy = this.proxies[this.currentIndex % this.proxies.length];
        this.currentIndex = (this.currentIndex + 1) % this.proxies.length;
        if (!proxy) {
            throw new Error('ProxyPool is empty');
        }
        return proxy;
    }

    size(): number {
        return this.proxies.length;
    }

    list(): ProxyConfig[] {
        return [...this.proxies];
    }
}
