/**
 * Network Manager for mangadex-dl
 * Handles HTTP requests with timeouts and optional proxy rotation.
 * Requests are issued exactly once: failures are reported, never retried.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import * as tls from 'node:tls';
import { once } from 'node:events';
import type { Socket } from 'node:net';

import { HttpsProxyAgent } from 'https-proxy-agent';
import { SocksClient } from 'socks';

import { API_BASE_URL, HEADERS, NETWORK } from '../config/constants';
import { buildProxyUrl, describeProxy } from '../utils/proxy';
import { silentLogger, type Logger } from '../utils/logger';
import { ProxyPool } from './proxy-pool';
import { DecodeError, RequestError, describeError } from './errors';
import type { FetchOptions, HttpResponse, NetworkOptions, ProxyConfig } from '../types';

/**
 * Reads an incoming message to the end
 */
function collectResponse(url: string, res: http.IncomingMessage): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
            resolve({
                url,
                status: res.statusCode ?? 0,
                statusText: res.statusMessage ?? '',
                body: Buffer.concat(chunks),
            });
        });
        res.on('error', reject);
    });
}

/**
 * NetworkManager handles all HTTP operations:
 * - per-request timeout
 * - round-robin proxy selection (http, https and socks5)
 * - status and JSON checks mapped to typed errors
 */
export class NetworkManager {
    private requestCount: number = 0;
    private readonly apiBaseUrl: string;
    private readonly headers: Record<string, string>;
    private readonly proxyPool: ProxyPool | null;
    private readonly timeout: number;
    private readonly logger: Logger;

    /**
     * @param options - Optional API root, timeout, extra headers and proxies
     * @param logger - Receives one debug line per request
     */
    constructor(options?: NetworkOptions, logger: Logger = silentLogger) {
        this.apiBaseUrl = (options?.apiBaseUrl ?? API_BASE_URL).replace(/\/+$/, '');
        this.headers = { ...HEADERS, ...options?.headers };
        this.timeout = options?.timeout ?? NETWORK.TIMEOUT;
        this.proxyPool = options?.proxy ? new ProxyPool(options.proxy) : null;
        this.logger = logger;
    }

    /**
     * Builds an absolute API URL
     *
     * @param path - Path starting with a slash, e.g. `/manga/{id}/aggregate`
     */
    apiUrl(path: string): string {
        return `${this.apiBaseUrl}${path}`;
    }

    /**
     * Performs one GET request and buffers the body.
     * The status code is not checked here.
     *
     * @throws RequestError on transport failure or timeout
     */
    async fetch(url: string, options?: FetchOptions): Promise<HttpResponse> {
        const timeout = options?.timeout ?? this.timeout;
        const headers = { ...this.headers, ...options?.headers };
        const proxy = this.proxyPool?.next() ?? null;

        this.requestCount++;
        this.logger.debug(proxy ? `GET ${url} via ${describeProxy(proxy)}` : `GET ${url}`);

        try {
            if (!proxy) {
                return await this.fetchDirect(url, headers, timeout);
            }
            if (proxy.protocol === 'socks5') {
                return await this.fetchViaSocks(url, proxy, headers, timeout);
            }
            return await this.fetchViaHttpProxy(url, proxy, headers, timeout);
        } catch (error) {
            if (error instanceof RequestError) {
                throw error;
            }
            const reason =
                error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
                    ? `timed out after ${timeout}ms`
                    : describeError(error);
            throw new RequestError(`Request to ${url} failed: ${reason}`, url, undefined, {
                cause: error,
            });
        }
    }

    /**
     * GET that requires a 2xx status
     *
     * @throws RequestError on transport failure or non-2xx status
     */
    async get(url: string, options?: FetchOptions): Promise<HttpResponse> {
        const response = await this.fetch(url, options);
        if (response.status < 200 || response.status >= 300) {
            throw new RequestError(
                `HTTP ${response.status} ${response.statusText}`.trim() + ` for ${url}`,
                url,
                response.status
            );
        }
        return response;
    }

    /**
     * Downloads raw bytes
     */
    async getBytes(url: string, options?: FetchOptions): Promise<Buffer> {
        const response = await this.get(url, options);
        return response.body;
    }

    /**
     * Downloads and parses a JSON document. Shape checks are left to the caller.
     *
     * @throws DecodeError when the body is not JSON
     */
    async getJson(url: string, options?: FetchOptions): Promise<unknown> {
        const response = await this.get(url, options);
        try {
            const value: unknown = JSON.parse(response.body.toString('utf-8'));
            return value;
        } catch (error) {
            throw new DecodeError(`Malformed JSON from ${url}: ${describeError(error)}`, url, {
                cause: error,
            });
        }
    }

    private async fetchDirect(
        url: string,
        headers: Record<string, string>,
        timeout: number
    ): Promise<HttpResponse> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, { headers, signal: controller.signal });
            const body = Buffer.from(await response.arrayBuffer());
            return { url, status: response.status, statusText: response.statusText, body };
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Tunnels through an http/https proxy with CONNECT
     */
    private async fetchViaHttpProxy(
        url: string,
        proxy: ProxyConfig,
        headers: Record<string, string>,
        timeout: number
    ): Promise<HttpResponse> {
        const requestOptions: http.RequestOptions = {
            method: 'GET',
            headers,
            agent: new HttpsProxyAgent(buildProxyUrl(proxy)),
            signal: AbortSignal.timeout(timeout),
        };
        const isHttps = new URL(url).protocol === 'https:';

        return new Promise<HttpResponse>((resolve, reject) => {
            const onResponse = (res: http.IncomingMessage): void => {
                collectResponse(url, res).then(resolve, reject);
            };
            const req = isHttps
                ? https.request(url, requestOptions, onResponse)
                : http.request(url, requestOptions, onResponse);
            req.on('error', reject);
            req.end();
        });
    }

    /**
     * Opens a SOCKS5 connection to the target, upgrades it to TLS for https
     * targets, then runs a plain HTTP/1.1 request over it
     */
    private async fetchViaSocks(
        url: string,
        proxy: ProxyConfig,
        headers: Record<string, string>,
        timeout: number
    ): Promise<HttpResponse> {
        const target = new URL(url);
        const isHttps = target.protocol === 'https:';
        const port = target.port ? Number(target.port) : isHttps ? 443 : 80;

        const { socket } = await SocksClient.createConnection({
            proxy: {
                host: proxy.host,
                port: proxy.port,
                type: 5,
                userId: proxy.username,
                password: proxy.password,
            },
            command: 'connect',
            destination: { host: target.hostname, port },
            timeout,
        });

        let stream: Socket = socket;
        if (isHttps) {
            const secure = tls.connect({ socket, servername: target.hostname });
            try {
                await once(secure, 'secureConnect', { signal: AbortSignal.timeout(timeout) });
            } catch (error) {
                secure.destroy();
                socket.destroy();
                throw error;
            }
            stream = secure;
        }

        const signal = AbortSignal.timeout(timeout);
        return new Promise<HttpResponse>((resolve, reject) => {
            const req = http.request(
                {
                    method: 'GET',
                    host: target.hostname,
                    port,
                    path: `${target.pathname}${target.search}`,
                    headers: { ...headers, Host: target.host, Connection: 'close' },
                    signal,
                    createConnection: () => stream,
                },
                (res) => {
                    collectResponse(url, res).then(resolve, reject);
                }
            );
            req.on('error', (error) => {
                stream.destroy();
                reject(error);
            });
            req.end();
        });
    }

    /**
     * Number of requests issued so far
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    hasProxy(): boolean {
        return this.proxyPool !== null;
    }

    getProxyCount(): number {
        return this.proxyPool?.size() ?? 0;
    }
}
