/**
 * @module source/http
 *
 * HTTP(S) {@link TileSource} filling a fixed slippy-map URL template.
 *
 * Leverages the Node.js built-in `fetch` (Node 18+). Its global dispatcher
 * keeps connections alive and pools them per origin, so one
 * {@link HttpTileSource} shared by every worker reuses the same sockets for
 * the whole session. Includes per-request timeouts via `AbortController`
 * and retry with exponential backoff for transient failures.
 */

import type { TileAddress } from '../address.js';
import { NetworkFailure } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { DEFAULT_USER_AGENT } from '../options.js';
import type { TileSource } from './source.js';

/**
 * Configuration options for {@link HttpTileSource}.
 */
export interface HttpTileSourceOptions {
  /**
   * Headers sent with every request. A default `User-Agent` is added
   * unless one is given here.
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds, covering the response body.
   *
   * @defaultValue 5000
   */
  timeout?: number;
  /**
   * Retry configuration for transient failures.
   *
   * Retries are attempted on HTTP 5xx, HTTP 429, network errors and
   * timeouts. Other statuses (e.g. 404) fail at once. Backoff between
   * attempts follows `backoff * 2^attempt` ms.
   *
   * @defaultValue \{ attempts: 2, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts (including the initial request). */
    attempts: number;
    /** Base backoff delay in milliseconds before the first retry. */
    backoff: number;
  };
  /** Values substituted for `{s}`. @defaultValue ["a", "b", "c", "d"] */
  subdomains?: string[];
  logger?: Logger;
}

type Attempt =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; retryable: boolean; error: NetworkFailure };

/**
 * HTTP tile source for templates such as
 * `https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}.png`.
 *
 * @example
 * ```typescript
 * const source = new HttpTileSource(
 *   'https://tile.example.com/{z}/{x}/{y}.png',
 *   { timeout: 3_000, retry: { attempts: 3, backoff: 250 } },
 * );
 *
 * const bytes = await source.fetch(tileAddress(13, 4250, 2861));
 * await source.close();
 * ```
 */
export class HttpTileSource implements TileSource {
  readonly template: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;
  private readonly subdomains: string[];
  private readonly logger: Logger;
  private closed = false;

  /**
   * @param template - URL with `{z}`, `{x}`, `{y}` and optionally `{s}`.
   * @param options - Optional configuration. See {@link HttpTileSourceOptions}.
   */
  constructor(template: string, options?: HttpTileSourceOptions) {
    this.template = template;
    this.headers = { 'User-Agent': DEFAULT_USER_AGENT, ...options?.headers };
    this.timeout = options?.timeout ?? 5_000;
    this.retryAttempts = options?.retry?.attempts ?? 2;
    this.retryBackoff = options?.retry?.backoff ?? 200;
    this.subdomains = options?.subdomains ?? ['a', 'b', 'c', 'd'];
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Fill the template for one tile. `{s}` rotates through the subdomains
   * by `(col + row)`, so neighbouring tiles spread across hosts.
   */
  url(address: TileAddress): string {
    const subdomain = this.subdomains[(address.col + address.row) % this.subdomains.length];
    return this.template
      .replaceAll('{s}', subdomain)
      .replaceAll('{z}', String(address.zoom))
      .replaceAll('{x}', String(address.col))
      .replaceAll('{y}', String(address.row));
  }

  /**
   * GET the tile, retrying transient failures.
   *
   * @throws {NetworkFailure} The last failure once attempts are exhausted,
   *   or at once for a non-retryable status or a closed source.
   */
  async fetch(address: TileAddress): Promise<Uint8Array> {
    if (this.closed) {
      throw new NetworkFailure('Tile source is closed', address);
    }

    const url = this.url(address);
    let lastError: NetworkFailure | null = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      const outcome = await this.attempt(url, address);
      if (outcome.ok) return outcome.bytes;

      lastError = outcome.error;
      if (!outcome.retryable || attempt === this.retryAttempts - 1) break;

      this.logger.debug(
        `Retrying ${url} (attempt ${attempt + 2}/${this.retryAttempts}): ${outcome.error.message}`,
      );
      await sleep(this.retryBackoff * Math.pow(2, attempt));
    }

    throw lastError ?? new NetworkFailure(`Failed to fetch ${url}`, address);
  }

  /**
   * Reject further fetches. Requests already in flight are not aborted.
   */
  async close(): Promise<void> {
    this.closed = true;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * One request with a timeout that also covers reading the body.
   */
  private async attempt(url: string, address: TileAddress): Promise<Attempt> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        headers: this.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        // Drain so the pooled connection can be reused.
        await response.arrayBuffer();
        return {
          ok: false,
          retryable: response.status >= 500 || response.status === 429,
          error: new NetworkFailure(`HTTP ${response.status} fetching ${url}`, address, {
            status: response.status,
          }),
        };
      }

      return { ok: true, bytes: new Uint8Array(await response.arrayBuffer()) };
    } catch (err) {
      const message = controller.signal.aborted
        ? `Timed out after ${this.timeout}ms fetching ${url}`
        : `Request failed for ${url}: ${err instanceof Error ? err.message : String(err)}`;
      return {
        ok: false,
        retryable: true,
        error: new NetworkFailure(message, address, { cause: err }),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Sleep for the specified duration.
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
