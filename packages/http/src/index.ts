/**
 * `@dirshelf/http`
 *
 * Fetch helpers shared by the scraper and the download engine: request
 * headers for listing pages and file bodies, a fetch wrapper that retries
 * what is worth retrying, and errors that print well in the terminal.
 *
 * @packageDocumentation
 */

// ============================================================================
// REQUEST HEADERS
// ============================================================================

const USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/**
 * Headers for listing pages. Some file hosts refuse clients that do not look
 * like a browser.
 */
export const BROWSER_HEADERS = {
    'User-Agent': USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.5',
};

/**
 * Headers for file bodies. `identity` keeps Content-Length equal to the bytes
 * written to disk.
 */
export const DOWNLOAD_HEADERS = {
    'User-Agent': USER_AGENT,
    Accept: '*/*',
    'Accept-Encoding': 'identity',
};

/**
 * Adds a timeout to an optional caller signal.
 *
 * @returns A signal that aborts on whichever fires first, or undefined when
 *   there is neither
 */
export function createSignalWithTimeout(
    timeout?: number,
    signal?: AbortSignal,
): AbortSignal | undefined {
    if (!timeout) return signal;
    const timer = AbortSignal.timeout(timeout);
    return signal ? AbortSignal.any([signal, timer]) : timer;
}

// ============================================================================
// ERROR DETAILS
// ============================================================================

function codeOf(error: Error): string | undefined {
    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * The error followed by its `cause` chain. Node's fetch nests the socket
 * error one or two levels down.
 */
function causeChain(error: Error): Error[] {
    const chain: Error[] = [];
    let current: unknown = error;
    while (current instanceof Error && !chain.includes(current)) {
        chain.push(current);
        current = current.cause;
    }
    return chain;
}

interface HintRule {
    codes: string[];
    /** Lowercase fragments looked for in the joined messages */
    fragments: string[];
    hint: string;
}

const HINTS: HintRule[] = [
    {
        codes: ['ENOTFOUND', 'EAI_AGAIN'],
        fragments: ['getaddrinfo'],
        hint: 'The host name did not resolve. Check the listing URL.',
    },
    {
        codes: ['ECONNREFUSED'],
        fragments: [],
        hint: 'The host refused the connection. The file server may be down.',
    },
    {
        codes: ['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'],
        fragments: ['timeout', 'timed out'],
        hint: 'The host did not answer in time.',
    },
    {
        codes: ['ECONNRESET', 'UND_ERR_SOCKET'],
        fragments: ['socket hang up', 'other side closed'],
        hint: 'The host closed the connection early. Trying again often works.',
    },
    {
        codes: ['CERT_HAS_EXPIRED', 'DEPTH_ZERO_SELF_SIGNED_CERT'],
        fragments: ['certificate'],
        hint: 'The host presented a TLS certificate that could not be verified.',
    },
];

export interface FetchErrorDetails {
    /** Message of the outermost error */
    message: string;
    /** First system error code found along the cause chain */
    code?: string;
    /** Inner messages joined with `->`, prefixed with the code */
    cause?: string;
    hint?: string;
}

/**
 * Flattens a fetch failure into text for the terminal.
 */
export function getFetchErrorDetails(error: unknown): FetchErrorDetails {
    if (!(error instanceof Error)) {
        return { message: String(error) };
    }

    const chain = causeChain(error);
    const messages = [...new Set(chain.map((e) => e.message).filter((m) => m !== ''))];
    const code = chain.map(codeOf).find((c) => c !== undefined);

    const inner = messages.slice(1).join(' -> ');
    const prefix = code ? `[${code}]` : '';
    const cause = [prefix, inner].filter((part) => part !== '').join(' ') || undefined;

    const text = messages.join(' ').toLowerCase();
    const rule = HINTS.find(
        (candidate) =>
            (code !== undefined && candidate.codes.includes(code)) ||
            candidate.fragments.some((fragment) => text.includes(fragment)),
    );

    return {
        message: messages[0] ?? 'Unknown error',
        code,
        cause,
        hint: rule?.hint,
    };
}

/**
 * A request that never produced a response.
 */
export class FetchError extends Error {
    readonly name = 'FetchError';
    public readonly code?: string;
    public readonly hint?: string;

    constructor(
        public readonly url: string,
        public readonly originalError: unknown,
    ) {
        const details = getFetchErrorDetails(originalError);
        super(details.cause ? `${details.message} (${details.cause})` : details.message);
        this.code = details.code;
        this.hint = details.hint;
    }

    format(verbose = false): string {
        const line = `Failed to fetch ${this.url}: ${this.message}`;
        return verbose && this.hint ? `${line}\n  Hint: ${this.hint}` : line;
    }
}

/**
 * A response with a status outside 2xx.
 */
export class HttpStatusError extends Error {
    readonly name = 'HttpStatusError';

    constructor(
        public readonly url: string,
        public readonly status: number,
        public readonly statusText: string,
    ) {
        super(statusText ? `HTTP ${status} ${statusText}` : `HTTP ${status}`);
    }

    format(_verbose = false): string {
        return `Failed to fetch ${this.url}: ${this.message}`;
    }
}

/**
 * One-line description of any fetch failure, with a hint in verbose mode.
 */
export function formatFetchError(error: unknown, url: string, verbose = false): string {
    if (error instanceof FetchError || error instanceof HttpStatusError) {
        return error.format(verbose);
    }
    return new FetchError(url, error).format(verbose);
}

// ============================================================================
// RETRYING FETCH
// ============================================================================

const RETRYABLE_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EPIPE',
    'ENOTFOUND',
    'EAI_AGAIN',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

function isRetryable(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    const chain = causeChain(error);
    if (chain.some((e) => RETRYABLE_CODES.has(codeOf(e) ?? ''))) {
        return true;
    }
    const text = chain.map((e) => e.message.toLowerCase()).join(' ');
    return ['socket hang up', 'other side closed', 'connection reset'].some((fragment) =>
        text.includes(fragment),
    );
}

/**
 * Milliseconds to wait from a `Retry-After` value (seconds or an HTTP date).
 */
function retryAfterMs(value: string | null, now = Date.now()): number | null {
    if (!value) return null;
    if (/^\d+$/.test(value.trim())) {
        return parseInt(value, 10) * 1000;
    }
    const at = Date.parse(value);
    return Number.isNaN(at) || at <= now ? null : at - now;
}

/** Exponential backoff with up to 25% jitter. */
function backoffMs(base: number, attempt: number): number {
    const delay = base * 2 ** attempt;
    return Math.floor(delay * (1 + 0.25 * Math.random()));
}

function wait(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RobustFetchOptions extends RequestInit {
    /** Extra attempts after the first (default: 2) */
    retries?: number;
    /** Base backoff in milliseconds (default: 1000) */
    retryDelay?: number;
}

/**
 * `fetch` that retries connection failures, 429 and 5xx responses.
 *
 * Only getting a response is retried; a body that fails halfway is the
 * caller's to handle. An aborted request is never retried. When every
 * attempt ends in 429 or 5xx, the last response is returned as is.
 *
 * @throws FetchError when no response could be obtained
 */
export async function robustFetch(
    url: string,
    options: RobustFetchOptions = {},
): Promise<Response> {
    const { retries = 2, retryDelay = 1000, ...init } = options;

    for (let attempt = 0; ; attempt++) {
        const last = attempt >= retries;
        let response: Response;
        try {
            response = await fetch(url, init);
        } catch (error) {
            if (init.signal?.aborted || last || !isRetryable(error)) {
                throw new FetchError(url, error);
            }
            await wait(backoffMs(retryDelay, attempt));
            continue;
        }

        const throttled = response.status === 429;
        if (last || (!throttled && response.status < 500)) {
            return response;
        }

        const hinted = throttled ? retryAfterMs(response.headers.get('Retry-After')) : null;
        await response.body?.cancel();
        await wait(hinted ?? backoffMs(retryDelay, attempt));
    }
}

/**
 * The Content-Length header as a byte count, or null when absent or not a
 * plain integer.
 */
export function parseContentLength(headers: Headers): number | null {
    const raw = headers.get('content-length')?.trim();
    return raw && /^\d+$/.test(raw) ? parseInt(raw, 10) : null;
}
