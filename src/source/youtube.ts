import { z } from 'zod';
import type { LatestItem, LatestItemFetcher } from './adapter.js';
import type { Config } from '../shared/config.js';
import { FetchError, type FetchErrorKind, errorMessage } from '../shared/errors.js';
import { fail, ok, type Result } from '../shared/result.js';
import { logger } from '../shared/logger.js';

// YouTube Data API v3 response shapes (partial)
const ChannelListSchema = z.object({
  items: z
    .array(
      z.object({
        contentDetails: z.object({
          relatedPlaylists: z.object({ uploads: z.string().min(1) }),
        }),
      }),
    )
    .default([]),
});

const PlaylistItemListSchema = z.object({
  items: z
    .array(
      z.object({
        snippet: z.object({
          title: z.string(),
          resourceId: z.object({ videoId: z.string().min(1) }),
        }),
      }),
    )
    .default([]),
});

const ApiErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

const AUTH_REASONS = new Set([
  'authError',
  'keyInvalid',
  'keyExpired',
  'forbidden',
  'accessNotConfigured',
  'ipRefererBlocked',
]);

const QUOTA_REASONS = new Set([
  'quotaExceeded',
  'rateLimitExceeded',
  'dailyLimitExceeded',
  'userRateLimitExceeded',
]);

type Endpoint = 'channels' | 'playlistItems';

/**
 * Map a non-2xx API response to a fetch error kind. Credential problems are
 * Unauthorized, a missing channel is NotFound, a missing uploads playlist is
 * NoItems, and everything else is worth retrying on a later run.
 */
export function classifyApiError(endpoint: Endpoint, status: number, body: unknown): FetchErrorKind {
  const parsed = ApiErrorBodySchema.safeParse(body);
  const reasons = parsed.success
    ? (parsed.data.error.errors ?? []).flatMap((e) => (e.reason ? [e.reason] : []))
    : [];

  if (status === 401 || reasons.some((r) => AUTH_REASONS.has(r))) return 'Unauthorized';
  if (reasons.some((r) => QUOTA_REASONS.has(r))) return 'Transient';
  if (status === 403) return 'Unauthorized';
  if (status === 404) return endpoint === 'channels' ? 'NotFound' : 'NoItems';
  return 'Transient';
}

export function buildWatchUrl(template: string, itemId: string): string {
  return template.replaceAll('{id}', encodeURIComponent(itemId));
}

export class YouTubeFetcher implements LatestItemFetcher {
  private readonly apiBase: string;

  constructor(private readonly config: Config['youtube']) {
    this.apiBase = config.api_base.replace(/\/+$/, '');
  }

  async fetch(sourceId: string): Promise<Result<LatestItem, FetchError>> {
    const channels = await this.request('channels', {
      part: 'contentDetails',
      id: sourceId,
    });
    if (!channels.ok) return channels;

    const channel = ChannelListSchema.safeParse(channels.data);
    if (!channel.success) {
      return fail(new FetchError('Transient', 'Unexpected channels response shape', { sourceId }));
    }
    const first = channel.data.items[0];
    if (!first) {
      return fail(new FetchError('NotFound', `Channel not found: ${sourceId}`, { sourceId }));
    }
    const uploads = first.contentDetails.relatedPlaylists.uploads;

    const playlist = await this.request('playlistItems', {
      part: 'snippet',
      playlistId: uploads,
      maxResults: '1',
    });
    if (!playlist.ok) return playlist;

    const entries = PlaylistItemListSchema.safeParse(playlist.data);
    if (!entries.success) {
      return fail(new FetchError('Transient', 'Unexpected playlistItems response shape', { sourceId }));
    }
    const latest = entries.data.items[0];
    if (!latest) {
      return fail(new FetchError('NoItems', `No uploads for channel: ${sourceId}`, { sourceId, uploads }));
    }

    const itemId = latest.snippet.resourceId.videoId;
    logger.debug({ sourceId, itemId }, 'Latest upload fetched');
    return ok({
      itemId,
      title: latest.snippet.title,
      url: buildWatchUrl(this.config.watch_url_template, itemId),
    });
  }

  private async request(
    endpoint: Endpoint,
    params: Record<string, string>,
  ): Promise<Result<unknown, FetchError>> {
    const url = new URL(`${this.apiBase}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.config.api_key);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout_ms);

    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      const text = await response.text();
      let body: unknown = null;
      try {
        body = text ? JSON.parse(text) : null;
      } catch {
        if (response.ok) {
          return fail(new FetchError('Transient', `${endpoint} response is not valid JSON`, { endpoint }));
        }
      }

      if (!response.ok) {
        const kind = classifyApiError(endpoint, response.status, body);
        return fail(
          new FetchError(kind, `YouTube API error: ${response.status} on ${endpoint}`, {
            endpoint,
            status: response.status,
            body: text.slice(0, 500),
          }),
        );
      }

      return ok(body);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return fail(
          new FetchError('Transient', `YouTube API request timed out after ${this.config.timeout_ms}ms`, {
            endpoint,
            timeout: this.config.timeout_ms,
          }),
        );
      }
      return fail(new FetchError('Transient', `YouTube API request failed: ${errorMessage(err)}`, { endpoint }));
    } finally {
      clearTimeout(timer);
    }
  }
}
