/**
 * Proxy URL validation and parsing utilities
 */

import type { ProxyConfig, ProxyProtocol } from '../types';

const SUPPORTED_PROTOCOLS: readonly ProxyProtocol[] = ['http', 'https', 'socks5'];

const DEFAULT_PORTS: Record<ProxyProtocol, number> = {
    http: 80,
    https: 443,
    socks5: 1080,
};

function isProxyProtocol(value: string): value is ProxyProtocol {
    return SUPPORTED_PROTOCOLS.some((p) => p === value);
}

/**
 * Validates if a string is a usable proxy URL
 *
 * @param url - The URL string to validate
 * @returns true if the URL names a supported protocol, a host and a valid port
 */
export function isValidProxyUrl(url: string): boolean {
    try {
        parseProxyUrl(url);
        return true;
    } catch {
        return false;
    }
}

/**
 * Parses a proxy URL string into a ProxyConfig object
 *
 * @param url - The proxy URL to parse
 * @throws Error if the URL is malformed, the protocol unsupported or the port out of range
 */
export function parseProxyUrl(url: string): ProxyConfig {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        throw new Error(`Invalid proxy URL format: ${url}`);
    }

    const protocol = parsed.protocol.replace(':', '');
    if (!isProxyProtocol(protocol)) {
        throw new Error(
            `Unsupported proxy protocol: ${protocol}. Supported: ${SUPPORTED_PROTOCOLS.join(', ')}`
        );
    }

    if (!parsed.hostname) {
        throw new Error('Invalid proxy URL format: missing host');
    }

    const port = parsed.port ? Number(parsed.port) : DEFAULT_PORTS[protocol];
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid proxy port: ${parsed.port}`);
    }

    const config: ProxyConfig = { protocol, host: parsed.hostname, port };
    if (parsed.username) {
        config.username = decodeURIComponent(parsed.username);
    }
    if (parsed.password) {
        config.password = decodeURIComponent(parsed.password);
    }
    return config;
}

/**
 * Rebuilds a proxy URL from a ProxyConfig
 */
export function buildProxyUrl(config: ProxyConfig): string {
    let credentials = '';
    if (config.username) {
        credentials = encodeURIComponent(config.username);
        if (config.password) {
            credentials += `:${encodeURIComponent(config.password)}`;
        }
        credentials += '@';
    }
    return `${config.protocol}://${credentials}${config.host}:${config.port}`;
}

/**
 * Proxy label safe to print: credentials are never shown
 */
export function describeProxy(config: ProxyConfig): string {
    return `${config.protocol}://${config.host}:${config.port}`;
}

/**
 * Splits a comma separated --proxy value into URLs
 */
export function splitProxyList(value: string): string[] {
    return value
        .split(',')
        .map((u) => u.trim())
        .filter((u) => u.length > 0);
}
