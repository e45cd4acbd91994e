import type { Logger } from 'pino';
import type {
  LatestItemFetcher,
  Notifier,
  SourceRegistry,
  TrackedSource,
} from '../source/adapter.js';
import { decide } from '../detect/detector.js';
import {
  errorMessage,
  type FetchError,
  type FetchErrorKind,
  type RegistryError,
  type SendError,
  type SendErrorKind,
} from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface RunDeps {
  registry: SourceRegistry;
  fetcher: LatestItemFetcher;
  notifier: Notifier;
}

export interface RunOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export type SourceOutcome =
  | { sourceId: string; status: 'notified'; itemId: string; title: string; persisted: boolean; updateError?: string }
  | { sourceId: string; status: 'skipped'; itemId: string }
  | { sourceId: string; status: 'error'; stage: 'fetch'; kind: FetchErrorKind; message: string }
  | { sourceId: string; status: 'error'; stage: 'send'; kind: SendErrorKind; message: string }
  | { sourceId: string; status: 'error'; stage: 'internal'; kind: 'Unexpected'; message: string }
  | { sourceId: string; status: 'cancelled' };

export interface RunFatal {
  sourceId: string;
  kind: 'Unauthorized' | 'AuthFailed';
  message: string;
}

export interface RunReport {
  runId: string;
  outcomes: SourceOutcome[];
  notified: number;
  skipped: number;
  failed: number;
  cancelled: number;
  fatal: RunFatal | null;
  loadError: RegistryError | null;
  durationMs: number;
}

type Stage = 'fetching' | 'deciding' | 'notifying' | 'updating' | 'done';

interface Progress {
  stage: Stage;
}

interface RunState {
  stopped: boolean;
  fatal: RunFatal | null;
}

/**
 * Worker pool that stops handing out work once `shouldStop` turns true.
 * In-flight calls are left to finish.
 */
async function withConcurrency<T>(
  items: T[],
  concurrency: number,
  shouldStop: () => boolean,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(concurrency, queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0 && !shouldStop()) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}

async function processSource(
  source: TrackedSource,
  deps: RunDeps,
  state: RunState,
  log: Logger,
  progress: Progress,
): Promise<SourceOutcome> {
  const { sourceId } = source;
  log.debug({ sourceId }, 'Checking source');

  const fetched = await deps.fetcher.fetch(sourceId);
  if (!fetched.ok) {
    return fetchFailed(source, fetched.error, state, log);
  }

  progress.stage = 'deciding';
  const decision = decide(source.lastNotifiedItemId, fetched.data);
  if (decision.action === 'skip') {
    log.info({ sourceId, itemId: fetched.data.itemId }, 'No new item');
    return { sourceId, status: 'skipped', itemId: fetched.data.itemId };
  }

  progress.stage = 'notifying';
  log.info(
    { sourceId, previous: source.lastNotifiedItemId, itemId: decision.item.itemId, title: decision.item.title },
    'New item detected',
  );
  const sent = await deps.notifier.send({ sourceId, item: decision.item });
  if (!sent.ok) {
    return sendFailed(source, sent.error, state, log);
  }

  progress.stage = 'updating';
  const updated = deps.registry.update(sourceId, decision.item.itemId);
  const base = {
    sourceId,
    status: 'notified' as const,
    itemId: decision.item.itemId,
    title: decision.item.title,
  };
  if (!updated.ok) {
    // The next run will notify again for this item.
    log.error({ sourceId, kind: updated.error.kind, error: updated.error.message }, 'Registry update failed');
    return { ...base, persisted: false, updateError: updated.error.message };
  }

  progress.stage = 'done';
  log.debug({ sourceId }, 'Source processed');
  return { ...base, persisted: true };
}

function fetchFailed(source: TrackedSource, error: FetchError, state: RunState, log: Logger): SourceOutcome {
  const { sourceId } = source;
  if (error.kind === 'Unauthorized') {
    raiseFatal(state, { sourceId, kind: error.kind, message: error.message });
    log.error({ sourceId, kind: error.kind, error: error.message }, 'Fetch unauthorized, aborting run');
  } else {
    log.warn({ sourceId, kind: error.kind, error: error.message }, 'Fetch failed');
  }
  return { sourceId, status: 'error', stage: 'fetch', kind: error.kind, message: error.message };
}

function sendFailed(source: TrackedSource, error: SendError, state: RunState, log: Logger): SourceOutcome {
  const { sourceId } = source;
  if (error.kind === 'AuthFailed') {
    raiseFatal(state, { sourceId, kind: error.kind, message: error.message });
    log.error({ sourceId, kind: error.kind, error: error.message }, 'Email authentication failed, aborting run');
  } else {
    log.warn({ sourceId, kind: error.kind, error: error.message }, 'Email send failed');
  }
  return { sourceId, status: 'error', stage: 'send', kind: error.kind, message: error.message };
}

function raiseFatal(state: RunState, fatal: RunFatal): void {
  state.stopped = true;
  state.fatal ??= fatal;
}

/**
 * One pass over every tracked source: fetch the latest item, notify when it
 * changed, then record it. A source's failure is isolated from the others,
 * except credential failures, which stop the run.
 */
export async function runCheck(deps: RunDeps, options: RunOptions = {}): Promise<RunReport> {
  const startTime = Date.now();
  const runId = generateId(10);
  const log = logger.child({ runId });
  const requested = options.concurrency ?? 1;
  const concurrency = Number.isInteger(requested) && requested >= 1 ? requested : 1;
  if (concurrency !== requested) {
    log.warn({ requested }, 'Invalid concurrency, checking sources one at a time');
  }

  const report: RunReport = {
    runId,
    outcomes: [],
    notified: 0,
    skipped: 0,
    failed: 0,
    cancelled: 0,
    fatal: null,
    loadError: null,
    durationMs: 0,
  };

  const loaded = deps.registry.loadAll();
  if (!loaded.ok) {
    log.error({ kind: loaded.error.kind, error: loaded.error.message }, 'Registry load failed');
    report.loadError = loaded.error;
    report.durationMs = Date.now() - startTime;
    return report;
  }

  const sources = [...loaded.data.values()];
  if (sources.length === 0) {
    log.info('No tracked sources');
    report.durationMs = Date.now() - startTime;
    return report;
  }

  const state: RunState = { stopped: false, fatal: null };
  const onAbort = (): void => {
    state.stopped = true;
    log.warn('Run cancelled');
  };
  if (options.signal?.aborted) {
    state.stopped = true;
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  const results = new Map<string, SourceOutcome>();
  try {
    await withConcurrency(sources, concurrency, () => state.stopped, async (source) => {
      const progress: Progress = { stage: 'fetching' };
      try {
        results.set(source.sourceId, await processSource(source, deps, state, log, progress));
      } catch (err) {
        const message = errorMessage(err);
        log.error({ sourceId: source.sourceId, stage: progress.stage, error: message }, 'Unexpected failure');
        results.set(source.sourceId, {
          sourceId: source.sourceId,
          status: 'error',
          stage: 'internal',
          kind: 'Unexpected',
          message,
        });
      }
    });
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  for (const source of sources) {
    const outcome = results.get(source.sourceId) ?? { sourceId: source.sourceId, status: 'cancelled' };
    report.outcomes.push(outcome);
    if (outcome.status === 'notified') report.notified++;
    else if (outcome.status === 'skipped') report.skipped++;
    else if (outcome.status === 'error') report.failed++;
    else report.cancelled++;
  }

  report.fatal = state.fatal;
  report.durationMs = Date.now() - startTime;
  log.info(
    {
      sources: sources.length,
      notified: report.notified,
      skipped: report.skipped,
      failed: report.failed,
      cancelled: report.cancelled,
      durationMs: report.durationMs,
    },
    report.fatal ? 'Check aborted' : 'Check complete',
  );

  return report;
}
