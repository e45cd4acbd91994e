import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { YouTubeFetcher, buildWatchUrl, classifyApiError } from '../youtube.js';
import { ConfigSchema } from '../../shared/config.js';

const config = ConfigSchema.parse({
  youtube: { api_key: 'test-key', api_base: 'https://yt.test/v3/' },
}).youtube;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const CHANNEL = {
  items: [{ contentDetails: { relatedPlaylists: { uploads: 'UUabc' } } }],
};

const PLAYLIST = {
  items: [{ snippet: { title: 'New Upload', resourceId: { videoId: 'vid2' } } }],
};

function apiError(status: number, reason: string): Response {
  return json({ error: { code: status, message: reason, errors: [{ reason }] } }, status);
}

describe('YouTubeFetcher', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('resolves the uploads playlist and returns its newest entry', async () => {
    const mockFetch = vi.fn().mockResolvedValueOnce(json(CHANNEL)).mockResolvedValueOnce(json(PLAYLIST));
    globalThis.fetch = mockFetch;

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result).toEqual({
      ok: true,
      data: { itemId: 'vid2', title: 'New Upload', url: 'https://www.youtube.com/watch?v=vid2' },
    });

    const channelUrl = new URL(String(mockFetch.mock.calls[0][0]));
    expect(channelUrl.origin + channelUrl.pathname).toBe('https://yt.test/v3/channels');
    expect(channelUrl.searchParams.get('part')).toBe('contentDetails');
    expect(channelUrl.searchParams.get('id')).toBe('UCabc');
    expect(channelUrl.searchParams.get('key')).toBe('test-key');

    const playlistUrl = new URL(String(mockFetch.mock.calls[1][0]));
    expect(playlistUrl.pathname).toBe('/v3/playlistItems');
    expect(playlistUrl.searchParams.get('playlistId')).toBe('UUabc');
    expect(playlistUrl.searchParams.get('maxResults')).toBe('1');
    expect(playlistUrl.searchParams.get('part')).toBe('snippet');
  });

  it('returns NotFound when the channel does not exist', async () => {
    const mockFetch = vi.fn().mockResolvedValue(json({ items: [] }));
    globalThis.fetch = mockFetch;

    const result = await new YouTubeFetcher(config).fetch('UCmissing');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NotFound');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('treats a channel response without items as NotFound', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(json({ kind: 'youtube#channelListResponse' }));

    const result = await new YouTubeFetcher(config).fetch('UCmissing');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NotFound');
  });

  it('returns NoItems when the uploads playlist is empty', async () => {
    globalThis.fetch = vi.fn().mockResolvedValueOnce(json(CHANNEL)).mockResolvedValueOnce(json({ items: [] }));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NoItems');
  });

  it('returns NoItems when the uploads playlist is not found', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(json(CHANNEL))
      .mockResolvedValueOnce(apiError(404, 'playlistNotFound'));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NoItems');
  });

  it('returns Unauthorized for an invalid API key', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(apiError(400, 'keyInvalid'));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Unauthorized');
      expect(result.error.message).toBe('YouTube API error: 400 on channels');
    }
  });

  it('returns Transient on a server error', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Backend Error', { status: 503 }));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('Transient');
  });

  it('returns Transient on a network error', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNRESET'));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Transient');
      expect(result.error.message).toBe('YouTube API request failed: ECONNRESET');
    }
  });

  it('returns Transient on a malformed body', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('<html>', { status: 200 }));

    const result = await new YouTubeFetcher(config).fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('Transient');
  });

  it('returns Transient on timeout', async () => {
    globalThis.fetch = vi.fn().mockImplementation((_url: URL, opts?: RequestInit) => {
      return new Promise<Response>((_resolve, reject) => {
        opts?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
        });
      });
    });

    const fetcher = new YouTubeFetcher({ ...config, timeout_ms: 50 });
    const result = await fetcher.fetch('UCabc');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Transient');
      expect(result.error.message).toBe('YouTube API request timed out after 50ms');
    }
  });
});

describe('classifyApiError', () => {
  it('maps credential failures to Unauthorized', () => {
    expect(classifyApiError('channels', 401, null)).toBe('Unauthorized');
    expect(classifyApiError('channels', 403, { error: { errors: [{ reason: 'forbidden' }] } })).toBe('Unauthorized');
    expect(classifyApiError('channels', 403, { error: { errors: [{ reason: 'accessNotConfigured' }] } })).toBe(
      'Unauthorized',
    );
  });

  it('maps quota exhaustion to Transient', () => {
    expect(classifyApiError('playlistItems', 403, { error: { errors: [{ reason: 'quotaExceeded' }] } })).toBe(
      'Transient',
    );
  });

  it('maps 404 by endpoint', () => {
    expect(classifyApiError('channels', 404, null)).toBe('NotFound');
    expect(classifyApiError('playlistItems', 404, null)).toBe('NoItems');
  });

  it('maps other failures to Transient', () => {
    expect(classifyApiError('channels', 500, null)).toBe('Transient');
    expect(classifyApiError('channels', 400, { error: { errors: [{ reason: 'badRequest' }] } })).toBe('Transient');
  });
});

describe('buildWatchUrl', () => {
  it('substitutes the item id into the template', () => {
    expect(buildWatchUrl('https://www.youtube.com/watch?v={id}', 'abc_123')).toBe(
      'https://www.youtube.com/watch?v=abc_123',
    );
  });
});
