import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { SourceRegistry, SourceSnapshot, TrackedSource } from '../source/adapter.js';
import { RegistryError, errorMessage } from '../shared/errors.js';
import { fail, ok, type Result } from '../shared/result.js';
import { logger } from '../shared/logger.js';

const RegistryFileSchema = z.record(
  z.string().min(1),
  z
    .object({
      lastNotifiedItemId: z.string().default(''),
    })
    .passthrough(),
);

export function parseRegistry(content: string): Result<SourceSnapshot, RegistryError> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return fail(new RegistryError('StorageCorrupt', `Registry is not valid JSON: ${errorMessage(err)}`));
  }

  const parsed = RegistryFileSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(
      new RegistryError('StorageCorrupt', 'Registry does not match the expected shape', {
        errors: parsed.error.flatten().fieldErrors,
      }),
    );
  }

  const snapshot: SourceSnapshot = new Map();
  for (const [sourceId, { lastNotifiedItemId, ...extra }] of Object.entries(parsed.data)) {
    const source: TrackedSource = { sourceId, lastNotifiedItemId };
    if (Object.keys(extra).length > 0) source.extra = extra;
    snapshot.set(sourceId, source);
  }
  return ok(snapshot);
}

export function serialize(snapshot: SourceSnapshot): string {
  const out: Record<string, Record<string, unknown>> = {};
  for (const source of snapshot.values()) {
    out[source.sourceId] = { lastNotifiedItemId: source.lastNotifiedItemId, ...source.extra };
  }
  return `${JSON.stringify(out, null, 4)}\n`;
}

/**
 * Registry backed by a single JSON file. Every mutation rewrites the whole
 * file through a temp file + rename; readers see either the old or the new
 * content. Writes are synchronous, so updates from parallel workers never
 * interleave.
 */
export class JsonFileRegistry implements SourceRegistry {
  private snapshot: SourceSnapshot | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  loadAll(): Result<SourceSnapshot, RegistryError> {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      return fail(
        new RegistryError('StorageUnavailable', `Registry unreadable: ${errorMessage(err)}`, {
          path: this.filePath,
        }),
      );
    }

    const result = parseRegistry(content);
    if (result.ok) {
      this.snapshot = result.data;
      logger.debug({ path: this.filePath, sources: result.data.size }, 'Registry loaded');
    }
    return result;
  }

  update(sourceId: string, newItemId: string): Result<void, RegistryError> {
    const loaded = this.current();
    if (!loaded.ok) return loaded;

    const source = loaded.data.get(sourceId);
    if (!source) {
      return fail(new RegistryError('NotFound', `Source not tracked: ${sourceId}`, { sourceId }));
    }

    const previous = source.lastNotifiedItemId;
    source.lastNotifiedItemId = newItemId;
    const written = this.persist(loaded.data);
    if (!written.ok) {
      source.lastNotifiedItemId = previous;
      return written;
    }

    logger.debug({ sourceId, itemId: newItemId }, 'Registry updated');
    return ok(undefined);
  }

  /**
   * Start tracking a source. Returns false if it is already tracked.
   */
  add(sourceId: string): Result<boolean, RegistryError> {
    const loaded = this.current();
    if (!loaded.ok) return loaded;

    if (loaded.data.has(sourceId)) return ok(false);

    const entry: TrackedSource = { sourceId, lastNotifiedItemId: '' };
    loaded.data.set(sourceId, entry);
    const written = this.persist(loaded.data);
    if (!written.ok) {
      loaded.data.delete(sourceId);
      return written;
    }
    return ok(true);
  }

  remove(sourceId: string): Result<void, RegistryError> {
    const loaded = this.current();
    if (!loaded.ok) return loaded;

    const entry = loaded.data.get(sourceId);
    if (!entry) {
      return fail(new RegistryError('NotFound', `Source not tracked: ${sourceId}`, { sourceId }));
    }

    loaded.data.delete(sourceId);
    const written = this.persist(loaded.data);
    if (!written.ok) {
      loaded.data.set(sourceId, entry);
      return written;
    }
    return ok(undefined);
  }

  /**
   * Create an empty registry file. Returns false when one already exists.
   */
  init(): Result<boolean, RegistryError> {
    if (fs.existsSync(this.filePath)) return ok(false);
    const written = this.persist(new Map());
    return written.ok ? ok(true) : written;
  }

  private current(): Result<SourceSnapshot, RegistryError> {
    return this.snapshot ? ok(this.snapshot) : this.loadAll();
  }

  private persist(snapshot: SourceSnapshot): Result<void, RegistryError> {
    const tmpPath = path.join(
      path.dirname(this.filePath),
      `.${path.basename(this.filePath)}.${process.pid}.tmp`,
    );
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, serialize(snapshot), 'utf-8');
      fs.renameSync(tmpPath, this.filePath);
      return ok(undefined);
    } catch (err) {
      this.discardTemp(tmpPath);
      return fail(
        new RegistryError('WriteFailed', `Registry write failed: ${errorMessage(err)}`, {
          path: this.filePath,
        }),
      );
    }
  }

  private discardTemp(tmpPath: string): void {
    try {
      if (fs.existsSync(tmpPath) && fs.lstatSync(tmpPath).isFile()) fs.rmSync(tmpPath, { force: true });
    } catch (err) {
      logger.warn({ path: tmpPath, error: errorMessage(err) }, 'Could not remove registry temp file');
    }
  }
}
