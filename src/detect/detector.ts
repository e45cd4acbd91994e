import type { LatestItem } from '../source/adapter.js';

export type Decision =
  | { action: 'notify'; item: LatestItem }
  | { action: 'skip' };

/**
 * Notify whenever the fetched item differs from the one last announced.
 * An empty stored id never matches, so a newly tracked source announces its
 * current latest item once.
 */
export function decide(stored: string, fetched: LatestItem): Decision {
  return fetched.itemId !== stored ? { action: 'notify', item: fetched } : { action: 'skip' };
}
