/**
 * Property-based tests for the network layer
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fc from 'fast-check';
import { once } from 'node:events';
import * as net from 'node:net';
import { SocksClient } from 'socks';
import { NetworkManager } from '../../src/services/network';
import { DecodeError, RequestError } from '../../src/services/errors';
import { API, captureRejection, jsonResponse, stubFetch, textResponse } from '../helpers/fake-api';

describe('NetworkManager property tests', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('Status handling', () => {
        it('should turn every non-2xx status into a RequestError carrying it', async () => {
            await fc.assert(
                fc.asyncProperty(
                    fc.integer({ min: 300, max: 599 }).filter((s) => s !== 304),
                    async (status) => {
                        stubFetch(() => textResponse('nope', status));
                        const network = new NetworkManager({ apiBaseUrl: API });
                        const url = network.apiUrl('/ping');

                        const error = await captureRejection(() => network.get(url));
                        expect(error).toBeInstanceOf(RequestError);
                        expect(error).toMatchObject({ status, url });
                    }
                ),
                { numRuns: 50 }
            );
        });

        it('should return the raw response from fetch whatever the status', async () => {
            stubFetch(() => textResponse('teapot', 418, "I'm a teapot"));
            const response = await new NetworkManager().fetch(`${API}/x`);

            expect(response.status).toBe(418);
            expect(response.statusText).toBe("I'm a teapot");
            expect(response.body.toString('utf-8')).toBe('teapot');
        });

        it('should map transport failures to a RequestError without status', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn(async () => {
                    throw new TypeError('fetch failed');
                })
            );
            const error = await captureRejection(() => new NetworkManager().getBytes(`${API}/x`));

            expect(error).toBeInstanceOf(RequestError);
            expect(error).toMatchObject({ status: undefined, url: `${API}/x` });
            expect(error).toHaveProperty('message', `Request to ${API}/x failed: fetch failed`);
        });
    });

    describe('JSON', () => {
        it('should parse JSON bodies', async () => {
            stubFetch(() => jsonResponse({ result: 'ok', n: 1 }));
            await expect(new NetworkManager().getJson(`${API}/x`)).resolves.toEqual({ result: 'ok', n: 1 });
        });

        it('should report malformed JSON as a DecodeError', async () => {
            stubFetch(() => textResponse('<html>'));
            const error = await captureRejection(() => new NetworkManager().getJson(`${API}/x`));

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ url: `${API}/x` });
        });
    });

    describe('SOCKS5 proxy', () => {
        it('should give up a stalled TLS handshake after the timeout and close the tunnel', async () => {
            // accepts the tunnel but never answers the TLS hello
            const peers: net.Socket[] = [];
            const server = net.createServer((peer) => peers.push(peer));
            server.listen(0, '127.0.0.1');
            await once(server, 'listening');
            const address = server.address();
            if (address === null || typeof address === 'string') {
                throw new Error('expected a TCP address');
            }

            const tunnel = net.connect(address.port, '127.0.0.1');
            await once(tunnel, 'connect');
            vi.spyOn(SocksClient, 'createConnection').mockResolvedValue({ socket: tunnel });

            try {
                const network = new NetworkManager({ proxy: 'socks5://127.0.0.1:1080', timeout: 100 });
                const error = await captureRejection(() => network.fetch('https://uploads.test/p0.jpg'));

                expect(error).toBeInstanceOf(RequestError);
                expect(error).toHaveProperty(
                    'message',
                    'Request to https://uploads.test/p0.jpg failed: timed out after 100ms'
                );
                expect(tunnel.destroyed).toBe(true);
            } finally {
                for (const peer of peers) {
                    peer.destroy();
                }
                server.close();
            }
        });
    });

    describe('Configuration', () => {
        it('should join API paths without doubled slashes', () => {
            expect(new NetworkManager({ apiBaseUrl: `${API}/` }).apiUrl('/manga/m')).toBe(`${API}/manga/m`);
            expect(new NetworkManager({ apiBaseUrl: API }).apiUrl('/manga/m')).toBe(`${API}/manga/m`);
        });

        it('should send the configured headers', async () => {
            const fetchMock = vi.fn(async (_input: string | URL, _init?: RequestInit) => textResponse('ok'));
            vi.stubGlobal('fetch', fetchMock);

            await new NetworkManager({ headers: { 'X-Test': 'yes' } }).get(`${API}/x`);

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.headers).toMatchObject({ 'X-Test': 'yes' });
        });

        it('should count every request issued', async () => {
            await fc.assert(
                fc.asyncProperty(fc.integer({ min: 0, max: 10 }), async (count) => {
                    stubFetch(() => textResponse('ok'));
                    const network = new NetworkManager();
                    for (let i = 0; i < count; i++) {
                        await network.get(`${API}/x/${i}`);
                    }
                    expect(network.getRequestCount()).toBe(count);
                }),
                { numRuns: 20 }
            );
        });

        it('should report the proxy pool', () => {
            const direct = new NetworkManager();
            expect(direct.hasProxy()).toBe(false);
            expect(direct.getProxyCount()).toBe(0);

            const proxied = new NetworkManager({ proxy: ['http://localhost:3128', 'socks5://localhost:9050'] });
            expect(proxied.hasProxy()).toBe(true);
            expect(proxied.getProxyCount()).toBe(2);

            expect(() => new NetworkManager({ proxy: 'ftp://localhost:21' })).toThrow('Unsupported proxy protocol');
        });
    });
});
