export type ItemId = string;
export type ProductName = string;

export type ItemType =
  | 'Epic'
  | 'Feature'
  | 'UserStory'
  | 'Task'
  | 'Bug'
  | 'Theme'
  | 'ADR'
  | 'Topic'
  | 'Workset'
  | 'Unknown';

export type SourceKind = 'Item' | 'Decision' | 'Topic' | 'Workset';

export interface ItemRecord {
  id: ItemId;
  // declared frontmatter types are kept verbatim, so this is wider than ItemType
  type: ItemType | (string & {});
  sourceKind: SourceKind;
  title: string;
  state: string;
  parent: ItemId;
  created: string;
  updated: string;
  relativePath: string;
  rawContent: string;
  valid: boolean;
  parseError?: string;
}

/** Derived state for one product, replaced wholesale on every rebuild. */
export interface ProductCache {
  allItems: ItemRecord[];
  idIndexes: Map<ItemId, number[]>;
  primaryById: Map<ItemId, number>;
  /** Newest tracked mtime in epoch ms, `null` when nothing was tracked. */
  latestMtime: number | null;
  /** Number of tracked files seen by the scan; a change means files were added or removed. */
  trackedFiles: number;
  /** Whether `items/` existed at build time; creating or removing it invalidates the cache. */
  hasItemsDir: boolean;
  warnings: string[];
  loadedAt: number;
}
