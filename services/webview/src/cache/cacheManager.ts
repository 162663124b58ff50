import type { BaseLogger } from 'pino';
import {
  enumerateTrackedFiles,
  itemsDirectory,
  latestMtimeOf,
  type ProductLayout,
  type TrackedFile,
  type TrackedKind,
} from '../fs/enumerate';
import { isDirectory, nodeFileSystem, type BacklogFileSystem } from '../fs/fileSystem';
import { buildRecord } from '../parsing/records';
import { logger as defaultLogger } from '../logger';
import type { ItemRecord, ProductCache, ProductName } from '../types';
import { createProductCache } from './productCache';

const WARNING_LABEL: Record<TrackedKind, string> = {
  item: 'Invalid item',
  decision: 'Invalid decision',
  topic: 'Invalid topic',
  workset: 'Invalid workset',
};

export const MISSING_ITEMS_WARNING = 'Missing items directory';

/** Upper bound on files read at once during a rebuild; keeps large backlogs clear of EMFILE. */
export const READ_BATCH_SIZE = 32;

async function buildInBatches(fs: BacklogFileSystem, files: TrackedFile[]): Promise<ItemRecord[]> {
  const records: ItemRecord[] = [];
  for (let i = 0; i < files.length; i += READ_BATCH_SIZE) {
    const batch = files.slice(i, i + READ_BATCH_SIZE);
    records.push(...(await Promise.all(batch.map((file) => buildRecord(fs, file)))));
  }
  return records;
}

export interface CacheManagerOptions {
  /** Maps a product name onto its directories under the active workspace. */
  layoutFor: (product: ProductName) => ProductLayout;
  fs?: BacklogFileSystem;
  logger?: BaseLogger;
}

/**
 * Owns every ProductCache. Caches are rebuilt wholesale when a cheap mtime scan
 * shows a tracked file changed, and never patched in place.
 *
 * Concurrent callers for one product share a single in-flight rebuild. `invalidate()`
 * bumps a generation counter so a rebuild started against an old workspace never commits.
 */
export class CacheManager {
  private readonly caches = new Map<ProductName, ProductCache>();
  private readonly inFlight = new Map<ProductName, Promise<ProductCache>>();
  private readonly layoutFor: (product: ProductName) => ProductLayout;
  private readonly fs: BacklogFileSystem;
  private readonly logger: BaseLogger;
  private generation = 0;

  constructor(options: CacheManagerOptions) {
    this.layoutFor = options.layoutFor;
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? defaultLogger;
  }

  async ensureLoaded(product: ProductName, forceRefresh = false): Promise<ProductCache> {
    if (!forceRefresh) {
      const pending = this.inFlight.get(product);
      if (pending) return pending;

      const cached = this.caches.get(product);
      if (cached && !(await this.isStale(product, cached))) return cached;

      // another caller may have noticed the same change while we were scanning
      const started = this.inFlight.get(product);
      if (started) return started;
    }
    return this.startRebuild(product);
  }

  /** Drops one product's cache, or every cache when `product` is empty. */
  invalidate(product = ''): void {
    if (!product) {
      this.caches.clear();
      this.inFlight.clear();
      this.generation += 1;
      return;
    }
    this.caches.delete(product);
    this.inFlight.delete(product);
  }

  has(product: ProductName): boolean {
    return this.caches.has(product);
  }

  private async isStale(product: ProductName, cached: ProductCache): Promise<boolean> {
    const layout = this.layoutFor(product);
    if ((await isDirectory(this.fs, itemsDirectory(layout))) !== cached.hasItemsDir) return true;
    const files = await enumerateTrackedFiles(this.fs, layout);
    if (files.length !== cached.trackedFiles) return true;
    const latest = latestMtimeOf(files);
    return latest !== null && (cached.latestMtime === null || latest > cached.latestMtime);
  }

  private startRebuild(product: ProductName): Promise<ProductCache> {
    const generation = this.generation;
    const promise: Promise<ProductCache> = this.rebuild(product)
      .then((cache) => {
        if (this.generation === generation && this.inFlight.get(product) === promise) {
          this.caches.set(product, cache);
        } else {
          this.logger.debug({ product }, 'discarding superseded product cache rebuild');
        }
        return cache;
      })
      .finally(() => {
        if (this.inFlight.get(product) === promise) this.inFlight.delete(product);
      });
    this.inFlight.set(product, promise);
    return promise;
  }

  private async rebuild(product: ProductName): Promise<ProductCache> {
    const started = Date.now();
    const layout = this.layoutFor(product);
    const files = await enumerateTrackedFiles(this.fs, layout);
    const latestMtime = latestMtimeOf(files);

    if (!(await isDirectory(this.fs, itemsDirectory(layout)))) {
      this.logger.warn({ product }, MISSING_ITEMS_WARNING);
      return createProductCache([], [MISSING_ITEMS_WARNING], latestMtime, files.length, false);
    }

    const records = await buildInBatches(this.fs, files);
    const warnings: string[] = [];
    records.forEach((record, i) => {
      if (!record.valid) {
        warnings.push(`${WARNING_LABEL[files[i].kind]}: ${record.relativePath} - ${record.parseError ?? ''}`);
      }
    });

    const cache = createProductCache(records, warnings, latestMtime, files.length);
    this.logger.debug(
      { product, records: records.length, ids: cache.primaryById.size, warnings: warnings.length, ms: Date.now() - started },
      'product cache rebuilt',
    );
    return cache;
  }
}
