/**
 * @module options
 *
 * Configuration for {@link TileManager} and its resolution.
 *
 * Values cascade through two levels:
 *
 * 1. {@link TileManagerConfig}: caller-provided values (highest priority)
 * 2. {@link DEFAULT_CONFIG}: built-in fallbacks
 *
 * The merged result is validated with a zod schema; every violation is
 * reported at once in a {@link ConfigError}. {@link configFromEnv} reads
 * the same fields from environment variables.
 *
 * @example
 * ```typescript
 * const config = resolveConfig({
 *   url: 'https://tile.example.com/{z}/{x}/{y}.png',
 *   workers: 6,
 * });
 * // → { ..., workers: 6, tileSize: 256, extension: 'png', ... }
 * ```
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

/**
 * Caller-facing configuration. Any field left `undefined` falls through to
 * {@link DEFAULT_CONFIG}.
 */
export interface TileManagerConfig {
  /**
   * Tile URL template. `{z}`, `{x}` and `{y}` are required; `{s}` is
   * replaced by one of {@link TileManagerConfig.subdomains}.
   */
  url?: string;
  /** Root directory of the disk tier. @defaultValue "cache_tiles" */
  cacheDir?: string;
  /**
   * File extension for cached tiles, without the dot. Derived from the URL
   * template when omitted, else `"png"`.
   */
  extension?: string;
  /** Number of background workers. @defaultValue 4 */
  workers?: number;
  /** Tile edge length in pixels. @defaultValue 256 */
  tileSize?: number;
  /** Per-request timeout in milliseconds. @defaultValue 5000 */
  timeout?: number;
  /**
   * Retry for transient network failures (5xx, 429, transport errors,
   * timeouts). Backoff is `backoff * 2^attempt` ms.
   *
   * @defaultValue \{ attempts: 2, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts, including the first. */
    attempts: number;
    /** Base delay in milliseconds before the first retry. */
    backoff: number;
  };
  /**
   * How long a failed tile is left alone before a request may queue it
   * again, in milliseconds. @defaultValue 5000
   */
  failureCooldown?: number;
  /** Rings of tiles preloaded around the viewport. @defaultValue 2 */
  preloadMargin?: number;
  /** Extra request headers, merged over the default `User-Agent`. */
  headers?: Record<string, string>;
  /** Values substituted for `{s}`. @defaultValue ["a", "b", "c", "d"] */
  subdomains?: string[];
}

export type ResolvedConfig = Required<TileManagerConfig>;

export const DEFAULT_USER_AGENT = 'tilestash/0.1';

/**
 * Built-in default values for every option except `extension`, which is
 * derived from the resolved URL.
 */
export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'extension'> = {
  url: 'https://{s}.basemaps.cartocdn.com/light_all/{z}/{x}/{y}.png',
  cacheDir: 'cache_tiles',
  workers: 4,
  tileSize: 256,
  timeout: 5_000,
  retry: { attempts: 2, backoff: 200 },
  failureCooldown: 5_000,
  preloadMargin: 2,
  headers: { 'User-Agent': DEFAULT_USER_AGENT },
  subdomains: ['a', 'b', 'c', 'd'],
};

const configSchema = z.object({
  url: z.string()
    .refine(
      url => ['{z}', '{x}', '{y}'].every(p => url.includes(p)),
      { message: 'must contain {z}, {x} and {y}' },
    )
    .refine(isHttpTemplate, { message: 'must be an http(s) URL template' }),
  cacheDir: z.string().min(1),
  extension: z.string().regex(/^[a-z0-9]+$/i, { message: 'must be alphanumeric' }),
  workers: z.number().int().min(1).max(64),
  tileSize: z.number().int().positive(),
  timeout: z.number().int().positive(),
  retry: z.object({
    attempts: z.number().int().min(1),
    backoff: z.number().min(0),
  }),
  failureCooldown: z.number().min(0),
  preloadMargin: z.number().int().min(0),
  headers: z.record(z.string()),
  subdomains: z.array(z.string().min(1)).min(1),
});

/**
 * Resolve the effective configuration by layering the caller's values over
 * {@link DEFAULT_CONFIG}, then validate it.
 *
 * `headers` are merged rather than replaced, so callers keep the default
 * `User-Agent` unless they set their own.
 *
 * @throws {ConfigError} Listing every invalid field.
 */
export function resolveConfig(config?: TileManagerConfig): ResolvedConfig {
  const url = config?.url ?? DEFAULT_CONFIG.url;
  const merged: ResolvedConfig = {
    url,
    cacheDir: config?.cacheDir ?? DEFAULT_CONFIG.cacheDir,
    extension: config?.extension ?? extensionFromUrl(url) ?? 'png',
    workers: config?.workers ?? DEFAULT_CONFIG.workers,
    tileSize: config?.tileSize ?? DEFAULT_CONFIG.tileSize,
    timeout: config?.timeout ?? DEFAULT_CONFIG.timeout,
    retry: config?.retry ?? DEFAULT_CONFIG.retry,
    failureCooldown: config?.failureCooldown ?? DEFAULT_CONFIG.failureCooldown,
    preloadMargin: config?.preloadMargin ?? DEFAULT_CONFIG.preloadMargin,
    headers: { ...DEFAULT_CONFIG.headers, ...config?.headers },
    subdomains: config?.subdomains ?? DEFAULT_CONFIG.subdomains,
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function isHttpTemplate(url: string): boolean {
  try {
    const { protocol } = new URL(url.replace(/\{[sxyz]\}/g, '0'));
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Extension of the last path segment of a URL template, if any.
 *
 * @example
 * ```typescript
 * extensionFromUrl('https://t.example.com/{z}/{x}/{y}.jpg?key=1'); // => 'jpg'
 * extensionFromUrl('https://t.example.com/{z}/{x}/{y}');           // => undefined
 * ```
 */
export function extensionFromUrl(url: string): string | undefined {
  const path = url.split(/[?#]/)[0];
  const match = /\.([a-z0-9]+)$/i.exec(path.slice(path.lastIndexOf('/') + 1));
  return match ? match[1].toLowerCase() : undefined;
}

// ─── Environment ────────────────────────────────────────────────────────────

const envSchema = z.object({
  TILESTASH_URL: z.string().optional(),
  TILESTASH_CACHE_DIR: z.string().optional(),
  TILESTASH_WORKERS: z.coerce.number().optional(),
  TILESTASH_TIMEOUT: z.coerce.number().optional(),
  TILESTASH_COOLDOWN: z.coerce.number().optional(),
});

/**
 * Read configuration overrides from environment variables.
 *
 * | Variable | Field |
 * |----------|-------|
 * | `TILESTASH_URL` | `url` |
 * | `TILESTASH_CACHE_DIR` | `cacheDir` |
 * | `TILESTASH_WORKERS` | `workers` |
 * | `TILESTASH_TIMEOUT` | `timeout` |
 * | `TILESTASH_COOLDOWN` | `failureCooldown` |
 *
 * Unset variables are left out of the result so that
 * {@link resolveConfig} applies its defaults.
 *
 * @throws {ConfigError} If a numeric variable is not a number.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): TileManagerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  const config: TileManagerConfig = {};
  if (vars.TILESTASH_URL !== undefined) config.url = vars.TILESTASH_URL;
  if (vars.TILESTASH_CACHE_DIR !== undefined) config.cacheDir = vars.TILESTASH_CACHE_DIR;
  if (vars.TILESTASH_WORKERS !== undefined) config.workers = vars.TILESTASH_WORKERS;
  if (vars.TILESTASH_TIMEOUT !== undefined) config.timeout = vars.TILESTASH_TIMEOUT;
  if (vars.TILESTASH_COOLDOWN !== undefined) config.failureCooldown = vars.TILESTASH_COOLDOWN;
  return config;
}
