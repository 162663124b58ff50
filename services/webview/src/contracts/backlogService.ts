import type { ItemId, ProductName } from '../types';

/** Wire shape of one record in list, kanban and duplicate listings. */
export interface ItemSummary {
  id: ItemId;
  type: string;
  source_kind: string;
  title: string;
  state: string;
  parent: ItemId;
  created: string;
  updated: string;
  path: string;
  valid: boolean;
  parse_error?: string;
  /** Present only when more than one file declares this id. */
  duplicate_count?: number;
}

/** A summary plus the raw file body, returned by item detail lookups. */
export interface ItemDetail extends ItemSummary {
  content: string;
}

export interface ListItemsResult {
  items: ItemSummary[];
  warnings: string[];
  /** ISO-8601 UTC time of the newest tracked file, empty when nothing was tracked. */
  cached_at: string;
}

export interface GetItemResult {
  item: ItemDetail;
  duplicates: ItemSummary[];
}

export interface TreeNode {
  id: ItemId;
  title: string;
  type: string;
  state: string;
  parent: ItemId;
  children: TreeNode[];
}

export interface TreeResult {
  roots: TreeNode[];
  warnings: string[];
}

export const LANES = ['Backlog', 'Doing', 'Blocked', 'Review', 'Done'] as const;
export type Lane = (typeof LANES)[number];

export interface KanbanResult {
  lanes: Record<Lane, ItemSummary[]>;
  warnings: string[];
}

export interface RefreshResult {
  refreshed: ProductName | 'all';
}

export interface WorkspaceInfo {
  products_root: string;
  workspace_root: string;
}

export interface SwitchWorkspaceResult extends WorkspaceInfo {
  switched: true;
}

/** Query surface the HTTP layer (and any other caller) relies on. */
export interface BacklogQueries {
  listProducts(): Promise<ProductName[]>;
  listItems(product: ProductName, forceRefresh?: boolean, query?: string): Promise<ListItemsResult>;
  getItem(product: ProductName, id: ItemId, forceRefresh?: boolean): Promise<GetItemResult>;
  buildTree(product: ProductName, forceRefresh?: boolean): Promise<TreeResult>;
  buildKanban(product: ProductName, forceRefresh?: boolean): Promise<KanbanResult>;
  refresh(product?: ProductName): RefreshResult;
  getWorkspaceInfo(): WorkspaceInfo;
  switchWorkspace(inputPath: string): Promise<SwitchWorkspaceResult>;
}
