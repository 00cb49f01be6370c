import {
  ControlPlaneApiError,
  ControlPlaneInternalError,
  ControlPlaneNetworkError,
} from '../core/errors';
import { Logger, pulumiLogger, scoped } from '../core/logger';
import { SleepFn, sleep as defaultSleep } from '../utils/clock';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;

export interface RetryPolicy {
  /** Retries after the first attempt, only for 5xx responses */
  maxRetries?: number;
  /** Delay before retry k is `baseDelayMs * 2^k` */
  baseDelayMs?: number;
}

export interface RequestOptions extends RetryPolicy {
  headers?: Record<string, string>;
  /** Serialized as JSON when present */
  body?: unknown;
}

export interface ControlPlaneClientOptions extends RetryPolicy {
  fetch?: FetchFn;
  sleep?: SleepFn;
  logger?: Logger;
}

/**
 * Minimal HTTP client for the control plane.
 *
 * 5xx responses are retried with exponential backoff and surface as
 * {@link ControlPlaneInternalError} once retries run out. Every other non-2xx
 * status fails immediately with {@link ControlPlaneApiError}. Redirects are not
 * followed, so a 3xx is a failure too.
 */
export class ControlPlaneClient {
  constructor(private readonly options: ControlPlaneClientOptions = {}) {}

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    const maxRetries = options.maxRetries ?? this.options.maxRetries ?? DEFAULT_MAX_RETRIES;
    const baseDelayMs = options.baseDelayMs ?? this.options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    const doFetch = this.options.fetch ?? fetch;
    const wait = this.options.sleep ?? defaultSleep;
    const log = scoped(this.options.logger ?? pulumiLogger, 'ControlPlane');

    const init: RequestInit = {
      method,
      headers: options.headers ?? {},
      redirect: 'manual',
    };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    for (let attempt = 0; ; attempt++) {
      let response: Response;
      try {
        response = await doFetch(url, init);
      } catch (error) {
        throw new ControlPlaneNetworkError(method, url, error);
      }

      const payload = await readPayload(response);
      if (response.ok) {
        return payload;
      }

      if (response.status >= 500 && response.status < 600) {
        if (attempt < maxRetries) {
          const delay = baseDelayMs * 2 ** attempt;
          log.warn(`${method} ${url} returned ${response.status}, retrying in ${delay}ms (${attempt + 1}/${maxRetries})`);
          await wait(delay);
          continue;
        }
        throw new ControlPlaneInternalError(response.status, payload, method, url, attempt + 1);
      }

      throw new ControlPlaneApiError(response.status, payload, method, url);
    }
  }
}

/** Parsed JSON when the body is JSON, the raw text otherwise. */
async function readPayload(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === '') return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
