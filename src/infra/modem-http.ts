import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { Agent } from 'https';
import { ErrorCode, TransportError, toError } from '../utils/errors.js';
import type { SessionCookie } from '../types/modem.js';

const DEFAULT_TIMEOUT = 10000;

export interface ModemHttpOptions {
  timeoutMs?: number;
  /** Management-plane certificates are usually self-signed, so this defaults to off. */
  verifyTls?: boolean;
  /** Replaces the network transport; used to run the pipeline against canned pages. */
  adapter?: AxiosAdapter;
}

export function createModemHttpClient(options: ModemHttpOptions = {}): AxiosInstance {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
  const client = axios.create({
    timeout: timeoutMs,
    httpsAgent: new Agent({ rejectUnauthorized: options.verifyTls ?? false }),
    responseType: 'text',
    // Callers branch on status themselves
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  // `timeout` only bounds socket idle time; this bounds the whole exchange
  client.interceptors.request.use((config) => {
    config.signal ??= AbortSignal.timeout(timeoutMs);
    return config;
  });
  return client;
}

export function modemUrl(host: string, path: string, query?: string): string {
  const base = `https://${host}${path}`;
  return query ? `${base}?${query}` : base;
}

export function formatCookie(cookie: SessionCookie): string {
  return `${cookie.name}=${cookie.value}`;
}

/**
 * First non-empty value of `name` among the response's Set-Cookie headers.
 * The device may clear the cookie and set it again in the same response.
 */
export function readSetCookie(response: AxiosResponse, name: string): string | undefined {
  const header: unknown = response.headers['set-cookie'];
  const lines = Array.isArray(header) ? header : typeof header === 'string' ? [header] : [];

  for (const line of lines) {
    if (typeof line !== 'string') continue;
    const pair = line.split(';', 1)[0] ?? '';
    const eq = pair.indexOf('=');
    if (eq === -1) continue;
    if (pair.slice(0, eq).trim() !== name) continue;
    const value = pair.slice(eq + 1).trim();
    if (value !== '') return value;
  }
  return undefined;
}

export function bodyText(response: AxiosResponse): string {
  return typeof response.data === 'string' ? response.data : String(response.data ?? '');
}

/** Wrap a failed request (network, TLS, timeout) as a TransportError. */
export function toTransportError(err: unknown, url: string): TransportError {
  if (err instanceof TransportError) return err;

  if (
    axios.isAxiosError(err) &&
    (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === AxiosError.ERR_CANCELED)
  ) {
    return new TransportError(ErrorCode.REQUEST_TIMEOUT, `Request to ${redact(url)} timed out`, {
      cause: err,
      context: { url: redact(url) },
    });
  }

  const cause = toError(err);
  return new TransportError(ErrorCode.REQUEST_FAILED, `Request to ${redact(url)} failed: ${cause.message}`, {
    cause,
    context: { url: redact(url) },
  });
}

/** Strip the query string, which carries credentials or the csrf token. */
export function redact(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}
