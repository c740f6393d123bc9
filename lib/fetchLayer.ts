/**
 * FetchLayer - The only module that performs HTTP requests for a validation.
 *
 * A page is fetched once and the resulting FetchOutcome is shared read-only
 * by every check. No retries: a failure is final for that invocation and is
 * classified into a small error taxonomy instead of being thrown.
 */

import type { FetchErrorKind, FetchOutcome } from './prospect/schemas';

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; ProspectValidator/1.0)';
const DEFAULT_TIMEOUT_MS = 15000;
const MAX_REDIRECT_FOLLOWS = 10;
const MAX_BODY_BYTES = 512 * 1024; // 512KB
const MAX_ERROR_MESSAGE_LENGTH = 100;

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TLS_CODE_REGEX = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_(GET|VERIFY)_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN|HOSTNAME_MISMATCH)/;

// =============================================================================
// Fetch Options
// =============================================================================

export interface FetchPageOptions {
  method?: 'GET' | 'HEAD';
  timeoutMs?: number;
  userAgent?: string;
  acceptEncoding?: string;
  maxRedirects?: number;
  maxBodyBytes?: number;
  // Retry a HEAD as GET when the server answers 405 Method Not Allowed
  fallbackToGet?: boolean;
}

export type FetchPageFn = (url: string, options?: FetchPageOptions) => Promise<FetchOutcome>;

class TooManyRedirectsError extends Error {
  constructor(limit: number) {
    super(`Exceeded ${limit} redirects`);
    this.name = 'TooManyRedirectsError';
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Perform one retrieval of a URL, following redirects manually.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchOutcome> {
  const method = options.method ?? 'GET';
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const startTime = Date.now();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  let currentUrl = url;
  let currentMethod = method;

  try {
    const response = await followRedirects(url, method, options, controller.signal, (next) => {
      currentUrl = next;
    });

    let finalResponse = response;
    if (currentMethod === 'HEAD' && response.status === 405 && options.fallbackToGet) {
      console.warn(`[FetchLayer] HEAD not allowed for ${currentUrl}, retrying with GET`);
      currentMethod = 'GET';
      finalResponse = await followRedirects(currentUrl, 'GET', options, controller.signal, (next) => {
        currentUrl = next;
      });
    }

    const body = currentMethod === 'GET'
      ? await readBody(finalResponse, options.maxBodyBytes ?? MAX_BODY_BYTES)
      : '';

    return {
      kind: 'response',
      url,
      finalUrl: currentUrl,
      method: currentMethod,
      statusCode: finalResponse.status,
      elapsedMs: Date.now() - startTime,
      headers: collectHeaders(finalResponse.headers),
      body,
      bodyBytes: Buffer.byteLength(body),
    };
  } catch (error) {
    const { kind, message } = classifyFetchError(error);
    console.warn(`[FetchLayer] ${currentMethod} ${currentUrl} failed (${kind}): ${message}`);

    return {
      kind: 'error',
      url,
      finalUrl: currentUrl,
      method: currentMethod,
      elapsedMs: Date.now() - startTime,
      errorKind: kind,
      errorMessage: message,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Best-effort HEAD probe. Returns the final status code, or null on any failure.
 */
export async function probeStatus(
  url: string,
  options: FetchPageOptions = {},
  fetcher: FetchPageFn = fetchPage
): Promise<number | null> {
  try {
    const outcome = await fetcher(url, { ...options, method: 'HEAD' });
    if (outcome.kind === 'error') {
      console.warn(`[FetchLayer] Probe ${url} unavailable: ${outcome.errorKind}`);
      return null;
    }
    return outcome.statusCode;
  } catch (error) {
    console.warn(`[FetchLayer] Probe ${url} threw: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return null;
  }
}

// =============================================================================
// Redirect Handling
// =============================================================================

async function followRedirects(
  url: string,
  method: 'GET' | 'HEAD',
  options: FetchPageOptions,
  signal: AbortSignal,
  onHop: (nextUrl: string) => void
): Promise<Response> {
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECT_FOLLOWS;
  let currentUrl = url;

  for (let hop = 0; hop <= maxRedirects; hop++) {
    const response = await fetch(currentUrl, {
      method,
      redirect: 'manual',
      signal,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Encoding': options.acceptEncoding ?? 'gzip, deflate, br',
      },
    });

    const location = response.headers.get('location');
    if (response.status >= 300 && response.status < 400 && location) {
      if (response.body) await response.body.cancel();
      // Handle relative redirects
      currentUrl = new URL(location, currentUrl).href;
      onHop(currentUrl);
      continue;
    }

    return response;
  }

  throw new TooManyRedirectsError(maxRedirects);
}

// =============================================================================
// Body & Header Helpers
// =============================================================================

async function readBody(response: Response, maxBytes: number): Promise<string> {
  if (!response.body) return '';

  // Stream regardless of Content-Length: chunked responses carry none
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const chunks: string[] = [];
  let bytesRead = 0;

  while (bytesRead < maxBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    const remaining = maxBytes - bytesRead;
    const chunk = value.length > remaining ? value.subarray(0, remaining) : value;
    chunks.push(decoder.decode(chunk, { stream: true }));
    bytesRead += chunk.length;
  }
  chunks.push(decoder.decode());
  await reader.cancel();

  return chunks.join('');
}

function collectHeaders(headers: Headers): Record<string, string> {
  const collected: Record<string, string> = {};
  headers.forEach((value, key) => {
    collected[key.toLowerCase()] = value;
  });
  return collected;
}

// =============================================================================
// Error Classification
// =============================================================================

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Map a thrown fetch error onto the failure taxonomy.
 * undici wraps socket errors as TypeError('fetch failed') with the real error in `cause`.
 */
export function classifyFetchError(error: unknown): { kind: FetchErrorKind; message: string } {
  if (error instanceof TooManyRedirectsError) {
    return { kind: 'too-many-redirects', message: error.message };
  }

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return { kind: 'timeout', message: 'Request timed out' };
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(cause) ?? errorCode(error);
  const message = (cause instanceof Error ? cause.message : null)
    ?? (error instanceof Error ? error.message : String(error));

  if (code) {
    if (TIMEOUT_CODES.has(code)) return { kind: 'timeout', message };
    if (TLS_CODE_REGEX.test(code)) return { kind: 'tls-error', message };
    if (CONNECTION_CODES.has(code)) return { kind: 'connection-failed', message };
  }

  if (/redirect count exceeded/i.test(message)) {
    return { kind: 'too-many-redirects', message };
  }

  return { kind: 'other', message: message.slice(0, MAX_ERROR_MESSAGE_LENGTH) };
}
