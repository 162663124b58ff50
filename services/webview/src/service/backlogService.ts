import path from 'path';
import type { BaseLogger } from 'pino';
import { CacheManager } from '../cache/cacheManager';
import { duplicatesOf, primaryItems } from '../cache/productCache';
import type {
  BacklogQueries,
  GetItemResult,
  ItemDetail,
  ItemSummary,
  KanbanResult,
  ListItemsResult,
  RefreshResult,
  SwitchWorkspaceResult,
  TreeResult,
  WorkspaceInfo,
} from '../contracts/backlogService';
import { BacklogError } from '../errors';
import { isDirectory, nodeFileSystem, type BacklogFileSystem } from '../fs/fileSystem';
import { logger as defaultLogger } from '../logger';
import type { ItemId, ItemRecord, ProductCache, ProductName } from '../types';
import { buildKanban } from '../views/kanban';
import { buildTree } from '../views/tree';
import { resolveProductsRoot, Workspace } from '../workspace/resolver';

const PRODUCT_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export function isValidProductName(product: string): boolean {
  // '.' and '..' match the pattern but would escape the products root
  return PRODUCT_NAME_PATTERN.test(product) && product !== '.' && product !== '..';
}

export function toSummary(item: ItemRecord, duplicateCount = 1): ItemSummary {
  const summary: ItemSummary = {
    id: item.id,
    type: item.type,
    source_kind: item.sourceKind,
    title: item.title,
    state: item.state,
    parent: item.parent,
    created: item.created,
    updated: item.updated,
    path: item.relativePath,
    valid: item.valid,
  };
  if (item.parseError) summary.parse_error = item.parseError;
  if (duplicateCount > 1) summary.duplicate_count = duplicateCount;
  return summary;
}

export function toDetail(item: ItemRecord): ItemDetail {
  return { ...toSummary(item), content: item.rawContent };
}

/** Epoch ms to `YYYY-MM-DDTHH:MM:SSZ`; empty for an unset watermark. */
export function toIsoSeconds(ms: number | null): string {
  if (ms === null) return '';
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function matchesQuery(item: ItemSummary, query: string): boolean {
  const needle = query.toLowerCase();
  return item.id.toLowerCase().includes(needle) || item.title.toLowerCase().includes(needle);
}

export interface BacklogServiceOptions {
  productsRoot: string;
  fs?: BacklogFileSystem;
  logger?: BaseLogger;
}

/**
 * Read-only queries over a backlog workspace.
 * Every product-scoped call goes through the cache manager, which rescans only when files changed.
 */
export class BacklogService implements BacklogQueries {
  private readonly workspace: Workspace;
  private readonly cache: CacheManager;
  private readonly fs: BacklogFileSystem;
  private readonly logger: BaseLogger;

  constructor(options: BacklogServiceOptions) {
    this.workspace = new Workspace(options.productsRoot);
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? defaultLogger;
    this.cache = new CacheManager({
      layoutFor: (product) => ({
        productRoot: this.workspace.productRoot(product),
        workspaceRoot: this.workspace.workspaceRoot,
      }),
      fs: this.fs,
      logger: this.logger,
    });
  }

  get productsRoot(): string {
    return this.workspace.productsRoot;
  }

  async listProducts(): Promise<ProductName[]> {
    const root = this.workspace.productsRoot;
    if (!(await isDirectory(this.fs, root))) return [];

    const products: ProductName[] = [];
    for (const entry of await this.fs.readdir(root)) {
      if (!entry.isDirectory && !entry.isSymbolicLink) continue;
      if (await isDirectory(this.fs, path.join(root, entry.name, 'items'))) products.push(entry.name);
    }
    return products.sort();
  }

  async listItems(product: ProductName, forceRefresh = false, query = ''): Promise<ListItemsResult> {
    const cache = await this.load(product, forceRefresh);
    let items = this.summaries(cache);
    const q = query.trim();
    if (q) items = items.filter((item) => matchesQuery(item, q));
    return { items, warnings: [...cache.warnings], cached_at: toIsoSeconds(cache.latestMtime) };
  }

  async getItem(product: ProductName, id: ItemId, forceRefresh = false): Promise<GetItemResult> {
    const cache = await this.load(product, forceRefresh);
    const primary = cache.primaryById.get(id);
    if (primary === undefined) {
      throw new BacklogError('item_not_found', 'Item not found');
    }
    return {
      item: toDetail(cache.allItems[primary]),
      duplicates: duplicatesOf(cache, id).map((item) => toSummary(item)),
    };
  }

  async buildTree(product: ProductName, forceRefresh = false): Promise<TreeResult> {
    const cache = await this.load(product, forceRefresh);
    const tree = buildTree(primaryItems(cache));
    return { roots: tree.roots, warnings: [...tree.warnings, ...cache.warnings] };
  }

  async buildKanban(product: ProductName, forceRefresh = false): Promise<KanbanResult> {
    const cache = await this.load(product, forceRefresh);
    return { lanes: buildKanban(this.summaries(cache)), warnings: [...cache.warnings] };
  }

  refresh(product: ProductName = ''): RefreshResult {
    if (!product) {
      this.cache.invalidate();
      return { refreshed: 'all' };
    }
    this.assertProductName(product);
    this.cache.invalidate(product);
    return { refreshed: product };
  }

  getWorkspaceInfo(): WorkspaceInfo {
    return this.workspace.info();
  }

  async switchWorkspace(inputPath: string): Promise<SwitchWorkspaceResult> {
    const resolved = await resolveProductsRoot(inputPath, this.fs);
    this.workspace.replace(resolved);
    this.cache.invalidate();
    this.logger.info({ productsRoot: resolved }, 'switched backlog workspace');
    return { ...this.workspace.info(), switched: true };
  }

  private summaries(cache: ProductCache): ItemSummary[] {
    return primaryItems(cache).map((item) => toSummary(item, cache.idIndexes.get(item.id)?.length ?? 1));
  }

  private assertProductName(product: ProductName): void {
    if (!isValidProductName(product)) {
      throw new BacklogError('invalid_product_name', 'Invalid product name');
    }
  }

  private async load(product: ProductName, forceRefresh: boolean): Promise<ProductCache> {
    this.assertProductName(product);
    if (!(await isDirectory(this.fs, this.workspace.productRoot(product)))) {
      throw new BacklogError('product_not_found', 'Product not found');
    }
    return this.cache.ensureLoaded(product, forceRefresh);
  }
}
