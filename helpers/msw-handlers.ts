/**
 * MSW (Mock Service Worker) Handlers
 *
 * Default HTTP handlers for testing. These serve a small directory listing and
 * a few downloadable files from in-process mocks. Individual tests can
 * override these handlers using server.use() for test-specific scenarios.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../fixtures');

/** Listing page served by the default handlers. */
export const LISTING_URL = 'https://files.example.com/gb/';

// ============================================================================
// DEFAULT HANDLERS
// ============================================================================

/**
 * Default handlers that provide baseline responses for tests.
 * These can be overridden per-test using server.use().
 */
export const handlers = [
    http.get(LISTING_URL, () => {
        return new HttpResponse(
            readFileSync(join(FIXTURES_DIR, 'listings/game-boy.html'), 'utf-8'),
            { headers: { 'Content-Type': 'text/html' } },
        );
    }),

    // 404 handler for missing resources
    http.get('https://files.example.com/missing/*', () => {
        return new HttpResponse(null, { status: 404 });
    }),
];

// ============================================================================
// SERVER SETUP
// ============================================================================

/**
 * MSW server instance for Node.js testing.
 * Started in test/setup.ts via beforeAll/afterAll hooks.
 */
export const server = setupServer(...handlers);

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Creates a handler that returns an HTML listing page.
 */
export function createListingHandler(url: string, html: string) {
    return http.get(url, () => {
        return new HttpResponse(html, {
            headers: { 'Content-Type': 'text/html' },
        });
    });
}

/**
 * Creates a handler that returns a 404 error.
 */
export function create404Handler(url: string) {
    return http.get(url, () => {
        return new HttpResponse(null, { status: 404 });
    });
}

/**
 * Creates a handler whose request fails at the network level.
 */
export function createNetworkErrorHandler(url: string) {
    return http.get(url, () => {
        return HttpResponse.error();
    });
}

/**
 * Creates a handler that serves a binary body.
 *
 * @param url - URL to serve
 * @param body - Bytes to send
 * @param declareLength - Whether to send a Content-Length header
 */
export function createFileHandler(
    url: string,
    body: Uint8Array,
    declareLength = true,
) {
    return http.get(url, () => {
        const headers: Record<string, string> = {
            'Content-Type': 'application/octet-stream',
        };
        if (declareLength) {
            headers['Content-Length'] = String(body.byteLength);
        }
        const stream = new ReadableStream<Uint8Array>({
            start(controller) {
                if (body.byteLength > 0) {
                    controller.enqueue(body);
                }
                controller.close();
            },
        });
        return new HttpResponse(stream, { headers });
    });
}

/**
 * Creates a handler that declares `declaredLength` bytes, sends `sentBytes`
 * of them, then drops the connection.
 */
export function createDroppingFileHandler(
    url: string,
    sentBytes: number,
    declaredLength: number,
) {
    return http.get(url, () => {
        let pulls = 0;
        // The drop is delayed so the first chunk reaches the reader before it
        const stream = new ReadableStream<Uint8Array>({
            async pull(controller) {
                pulls++;
                if (pulls === 1) {
                    controller.enqueue(new Uint8Array(sentBytes).fill(7));
                    return;
                }
                await new Promise((resolve) => setTimeout(resolve, 50));
                controller.error(new Error('socket hang up'));
            },
        });
        return new HttpResponse(stream, {
            headers: {
                'Content-Type': 'application/octet-stream',
                'Content-Length': String(declaredLength),
            },
        });
    });
}
