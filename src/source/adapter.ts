import type { Result } from '../shared/result.js';
import type { FetchError, RegistryError, SendError } from '../shared/errors.js';

/**
 * A tracked channel and the id of the last item a notification went out for.
 * An empty `lastNotifiedItemId` means nothing has been announced yet.
 * `extra` holds any other fields found in the stored entry, written back as is.
 */
export interface TrackedSource {
  sourceId: string;
  lastNotifiedItemId: string;
  extra?: Record<string, unknown>;
}

/**
 * Most recent upload of a source, as seen by one check.
 */
export interface LatestItem {
  itemId: string;
  title: string;
  url: string;
}

export interface NotificationEvent {
  sourceId: string;
  item: LatestItem;
}

export type SourceSnapshot = Map<string, TrackedSource>;

/**
 * Durable sourceId → last-notified-item mapping.
 */
export interface SourceRegistry {
  loadAll(): Result<SourceSnapshot, RegistryError>;
  update(sourceId: string, newItemId: string): Result<void, RegistryError>;
}

/**
 * Resolves a source id to its current latest item.
 */
export interface LatestItemFetcher {
  fetch(sourceId: string): Promise<Result<LatestItem, FetchError>>;
}

/**
 * Delivers one notification to the configured recipient.
 */
export interface Notifier {
  send(event: NotificationEvent): Promise<Result<void, SendError>>;
}
