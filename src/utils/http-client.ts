import { IndexRequestError } from './errors.js';
import { logger } from './logger.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  /** Per request timeout in milliseconds */
  timeout?: number;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  /** Media type without parameters, lowercased; empty when the server sends none */
  contentType: string;
  /** Raw body; empty for 404 responses */
  text: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Minimal HTTP client for package index requests.
 */
export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
  }

  /**
   * GET a document. A 404 is returned as `{ status: 404 }`; any other
   * non-2xx status or transport failure throws IndexRequestError.
   */
  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    logger.debug(`GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { ...this.headers, ...headers },
        signal: AbortSignal.timeout(this.timeout)
      });
    } catch (error) {
      throw new IndexRequestError(url, undefined, error instanceof Error ? error.message : String(error));
    }

    const contentType = (response.headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();

    if (response.status === 404) {
      return { status: 404, contentType, text: '' };
    }

    if (!response.ok) {
      throw new IndexRequestError(url, response.status, `HTTP ${response.status} ${response.statusText}`);
    }

    try {
      return { status: response.status, contentType, text: await response.text() };
    } catch (error) {
      throw new IndexRequestError(url, response.status, `failed to read body: ${String(error)}`);
    }
  }
}
