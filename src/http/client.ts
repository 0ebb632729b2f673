import type { ZodType } from 'zod';
import { HarnessError, HarnessErrorCode, errorMessage } from '../shared/errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Anything that can take a log line; ResultStore in practice. */
export interface RequestLog {
  log(message: string, ...args: unknown[]): void;
}

export interface HttpResult {
  status: number;
  headers: Record<string, string>;
  text: string;
  json(): unknown;
}

const MAX_LOGGED_BODY = 10_000;

function describeBody(text: string): string {
  return text.length > MAX_LOGGED_BODY
    ? `${text.slice(0, MAX_LOGGED_BODY)}... [${text.length - MAX_LOGGED_BODY} more chars]`
    : text;
}

// Maps fetch failures onto REQUEST_TIMEOUT vs REQUEST_FAILED so callers can
// tell "never answered in time" from "refused".
export function toTransportError(err: unknown, method: string, url: string): HarnessError {
  if (err instanceof HarnessError) return err;
  const name = err instanceof Error ? err.name : '';
  if (name === 'TimeoutError') {
    return new HarnessError(HarnessErrorCode.REQUEST_TIMEOUT, `${method} ${url} timed out`, { url }, { cause: err });
  }
  if (name === 'AbortError') {
    return new HarnessError(HarnessErrorCode.CANCELLED, `${method} ${url} was cancelled`, { url }, { cause: err });
  }
  const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : errorMessage(err);
  return new HarnessError(HarnessErrorCode.REQUEST_FAILED, `${method} ${url} failed: ${cause}`, { url }, { cause: err });
}

export function parseJson(text: string, context: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new HarnessError(
      HarnessErrorCode.PROTOCOL_VIOLATION,
      `${context}: response is not JSON`,
      { body: text.slice(0, 500) },
      { cause: err }
    );
  }
}

export interface HttpTestClientOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * JSON-over-HTTP helper bound to one environment's base URL. Every call is
 * written to the test log before it returns. No retries here; readiness
 * polling is the only place that retries.
 */
export class HttpTestClient {
  constructor(
    readonly baseUrl: string,
    private readonly requestLog: RequestLog,
    private readonly options: HttpTestClientOptions
  ) {}

  url(path: string): string {
    return path.startsWith('http://') || path.startsWith('https://') ? path : `${this.baseUrl}${path}`;
  }

  get(path: string): Promise<HttpResult> {
    return this.request('GET', path);
  }

  post(path: string, body?: unknown): Promise<HttpResult> {
    return this.request('POST', path, body);
  }

  put(path: string, body?: unknown): Promise<HttpResult> {
    return this.request('PUT', path, body);
  }

  delete(path: string): Promise<HttpResult> {
    return this.request('DELETE', path);
  }

  async request(method: HttpMethod, path: string, body?: unknown, signal?: AbortSignal): Promise<HttpResult> {
    const url = this.url(path);
    const headers: Record<string, string> = { ...this.options.headers };
    let payload: string | undefined;
    if (body !== undefined) {
      payload = JSON.stringify(body);
      headers['Content-Type'] = 'application/json';
    }

    this.requestLog.log('%s %s%s', method, path, payload !== undefined ? ` ${describeBody(payload)}` : '');

    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
      text = await response.text();
    } catch (err) {
      const transport = toTransportError(err, method, url);
      this.requestLog.log('Error: %s %s: %s', method, path, transport.message);
      throw transport;
    }

    this.requestLog.log('Response: %d %s', response.status, describeBody(text));

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => { responseHeaders[key] = value; });
    return {
      status: response.status,
      headers: responseHeaders,
      text,
      json: () => parseJson(text, `${method} ${path}`),
    };
  }

  async getJson<T>(path: string, schema: ZodType<T>): Promise<{ status: number; data: T }> {
    const result = await this.get(path);
    return { status: result.status, data: schema.parse(result.json()) };
  }

  /** Fetches a page and fails unless it answers 200. */
  async getHTML(path: string): Promise<string> {
    const result = await this.get(path);
    if (result.status !== 200) {
      throw new HarnessError(HarnessErrorCode.REQUEST_FAILED, `GET ${path}: unexpected status ${result.status}`, {
        status: result.status,
      });
    }
    return result.text;
  }
}

/** Status of one bounded GET against a health path. Throws only on transport errors. */
export async function healthStatus(baseUrl: string, healthPath: string, timeoutMs: number): Promise<number> {
  const url = `${baseUrl}${healthPath}`;
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await response.arrayBuffer();
    return response.status;
  } catch (err) {
    throw toTransportError(err, 'GET', url);
  }
}

/**
 * Readiness probe: true on HTTP 200. Any other status throws REQUEST_FAILED
 * naming it, so polling callers keep it as the last probe error.
 */
export async function probeHealth(baseUrl: string, healthPath: string, timeoutMs: number): Promise<boolean> {
  const status = await healthStatus(baseUrl, healthPath, timeoutMs);
  if (status !== 200) {
    throw new HarnessError(HarnessErrorCode.REQUEST_FAILED, `GET ${baseUrl}${healthPath}: HTTP ${status}`, { status });
  }
  return true;
}
