import type { ItemId, ItemRecord, ProductCache } from '../types';

/**
 * True when `candidate` should replace `current` as the record shown for their shared id:
 * the later `updated` string wins, and on a tie the smaller relative path wins.
 * Both comparisons are plain string comparisons, so the outcome never depends on scan order.
 */
export function outranks(candidate: ItemRecord, current: ItemRecord): boolean {
  if (candidate.updated !== current.updated) return candidate.updated > current.updated;
  return candidate.relativePath < current.relativePath;
}

export function indexRecords(allItems: ItemRecord[]): Pick<ProductCache, 'idIndexes' | 'primaryById'> {
  const idIndexes = new Map<ItemId, number[]>();
  allItems.forEach((item, index) => {
    if (!item.valid || !item.id) return;
    const bucket = idIndexes.get(item.id);
    if (bucket) bucket.push(index);
    else idIndexes.set(item.id, [index]);
  });

  const primaryById = new Map<ItemId, number>();
  for (const [id, indexes] of idIndexes) {
    let primary = indexes[0];
    for (const index of indexes.slice(1)) {
      if (outranks(allItems[index], allItems[primary])) primary = index;
    }
    primaryById.set(id, primary);
  }

  return { idIndexes, primaryById };
}

export function createProductCache(
  allItems: ItemRecord[],
  warnings: string[],
  latestMtime: number | null,
  trackedFiles = allItems.length,
  hasItemsDir = true,
  loadedAt = Date.now(),
): ProductCache {
  return { allItems, warnings, latestMtime, trackedFiles, hasItemsDir, loadedAt, ...indexRecords(allItems) };
}

/** Primary records in discovery order. */
export function primaryItems(cache: ProductCache): ItemRecord[] {
  const primaries = [...cache.primaryById.values()].sort((a, b) => a - b);
  return primaries.map((index) => cache.allItems[index]);
}

export function duplicatesOf(cache: ProductCache, id: ItemId): ItemRecord[] {
  return (cache.idIndexes.get(id) ?? []).map((index) => cache.allItems[index]);
}
