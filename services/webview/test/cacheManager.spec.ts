import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheManager, MISSING_ITEMS_WARNING, READ_BATCH_SIZE } from '../src/cache/cacheManager';
import type { BacklogFileSystem } from '../src/fs/fileSystem';
import {
  CountingFileSystem,
  createTempWorkspace,
  itemDoc,
  LimitedFileSystem,
  LockedDirsFileSystem,
  silentLogger,
  type TempWorkspace,
} from './helpers/workspace';

const JAN = new Date('2024-01-01T00:00:00Z');
const FEB = new Date('2024-02-01T00:00:00Z');

describe('CacheManager', () => {
  let ws: TempWorkspace;
  let fs: CountingFileSystem;
  let manager: CacheManager;

  const managerOver = (backing: BacklogFileSystem) =>
    new CacheManager({
      layoutFor: (product) => ({ productRoot: path.join(ws.productsRoot, product), workspaceRoot: ws.root }),
      fs: backing,
      logger: silentLogger,
    });

  beforeEach(async () => {
    ws = await createTempWorkspace();
    fs = new CountingFileSystem();
    manager = managerOver(fs);
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  const story = (id: string, extra: Record<string, string> = {}) =>
    itemDoc({ id, type: 'UserStory', title: `Story ${id}`, ...extra });

  it('loads items, decisions, topics and worksets in that order', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);
    await ws.write('products/demo/decisions/ADR-1.md', itemDoc({ status: 'Accepted' }), JAN);
    await ws.write('topics/search/manifest.json', JSON.stringify({ topic: 'search' }), JAN);
    await ws.write('worksets/w1/manifest.json', JSON.stringify({ name: 'w1' }), FEB);

    const cache = await manager.ensureLoaded('demo');
    expect(cache.allItems.map((r) => r.id)).toEqual(['US-1', 'ADR-1', 'TOPIC-search', 'WORKSET-w1']);
    expect(cache.latestMtime).toBe(FEB.getTime());
    expect(cache.trackedFiles).toBe(4);
    expect(cache.warnings).toEqual([]);
  });

  it('skips readme, index and trash files', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'));
    await ws.write('products/demo/items/README.md', story('R'));
    await ws.write('products/demo/items/story/story.index.md', story('I'));
    await ws.write('products/demo/items/_trash/0000/US-9.md', story('US-9'));
    await ws.write('products/demo/items/story/0000/notes.txt', 'plain');

    const cache = await manager.ensureLoaded('demo');
    expect(cache.allItems.map((r) => r.id)).toEqual(['US-1']);
  });

  it('turns invalid files into warnings', async () => {
    await ws.write('products/demo/items/task/0000/bad.md', 'no header');
    await ws.write('worksets/broken/manifest.json', '[]');

    const cache = await manager.ensureLoaded('demo');
    expect(cache.warnings).toEqual([
      'Invalid item: items/task/0000/bad.md - Missing frontmatter start marker',
      'Invalid workset: worksets/broken/manifest.json - Manifest must be a JSON object',
    ]);
    expect(cache.primaryById.size).toBe(0);
  });

  it('serves the cached value until a tracked file gets newer', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);

    const first = await manager.ensureLoaded('demo');
    fs.reset();
    const second = await manager.ensureLoaded('demo');
    expect(second).toBe(first);
    expect(fs.reads).toEqual([]);

    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1', { state: 'Done' }), FEB);
    const third = await manager.ensureLoaded('demo');
    expect(third).not.toBe(first);
    expect(third.allItems[0].state).toBe('Done');
    expect(fs.reads).toHaveLength(1);
  });

  it('rebuilds when a file is added with an older mtime', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), FEB);
    await manager.ensureLoaded('demo');

    await ws.write('products/demo/items/story/0000/US-2.md', story('US-2'), JAN);
    const cache = await manager.ensureLoaded('demo');
    expect(cache.allItems.map((r) => r.id)).toEqual(['US-1', 'US-2']);
  });

  it('rebuilds when a file is removed', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);
    const removed = await ws.write('products/demo/items/story/0000/US-2.md', story('US-2'), JAN);
    await manager.ensureLoaded('demo');

    await rm(removed);
    const cache = await manager.ensureLoaded('demo');
    expect(cache.allItems.map((r) => r.id)).toEqual(['US-1']);
  });

  it('force refresh rereads even when nothing changed', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);
    const first = await manager.ensureLoaded('demo');

    fs.reset();
    const forced = await manager.ensureLoaded('demo', true);
    expect(forced).not.toBe(first);
    expect(fs.reads).toHaveLength(1);
  });

  it('creates an empty cache when the items directory is missing', async () => {
    await mkdir(path.join(ws.productsRoot, 'empty'), { recursive: true });

    const cache = await manager.ensureLoaded('empty');
    expect(cache.allItems).toEqual([]);
    expect(cache.warnings).toEqual([MISSING_ITEMS_WARNING]);
    expect(cache.latestMtime).toBeNull();
  });

  it('shares one rebuild between concurrent callers', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);

    const [a, b] = await Promise.all([manager.ensureLoaded('demo'), manager.ensureLoaded('demo')]);
    expect(a).toBe(b);
    expect(fs.reads).toHaveLength(1);
  });

  it('invalidate drops caches and discards rebuilds already running', async () => {
    await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'), JAN);
    await manager.ensureLoaded('demo');
    expect(manager.has('demo')).toBe(true);

    manager.invalidate('demo');
    expect(manager.has('demo')).toBe(false);

    const pending = manager.ensureLoaded('demo');
    manager.invalidate();
    const cache = await pending;
    expect(cache.allItems).toHaveLength(1);
    expect(manager.has('demo')).toBe(false);
  });

  it('rebuilds once items/ appears in a product that had none', async () => {
    await mkdir(path.join(ws.productsRoot, 'late'), { recursive: true });
    const before = await manager.ensureLoaded('late');
    expect(before.warnings).toEqual([MISSING_ITEMS_WARNING]);
    expect(before.hasItemsDir).toBe(false);

    await mkdir(path.join(ws.productsRoot, 'late', 'items'));
    const after = await manager.ensureLoaded('late');
    expect(after).not.toBe(before);
    expect(after.warnings).toEqual([]);
    expect(after.hasItemsDir).toBe(true);
  });

  describe('large and damaged trees', () => {
    it('loads a backlog larger than the number of files it may hold open', async () => {
      const count = 300;
      for (let i = 0; i < count; i += 1) {
        const id = `T-${String(i).padStart(4, '0')}`;
        await ws.write(`products/demo/items/task/0000/${id}.md`, itemDoc({ id, type: 'Task' }));
      }
      const limited = new LimitedFileSystem(READ_BATCH_SIZE);

      const cache = await managerOver(limited).ensureLoaded('demo');
      expect(cache.warnings).toEqual([]);
      expect(cache.primaryById.size).toBe(count);
      expect(cache.allItems[count - 1].id).toBe('T-0299');
      expect(limited.peak).toBeLessThanOrEqual(READ_BATCH_SIZE);
    });

    it('reports a manifest that cannot be stat-ed instead of failing the product', async () => {
      await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'));
      await ws.link('manifest.json', 'topics/loop/manifest.json');

      const cache = await manager.ensureLoaded('demo');
      expect(cache.allItems.map((r) => r.id)).toEqual(['US-1', '']);
      expect(cache.warnings).toEqual(['Invalid topic: topics/loop/manifest.json - Failed to open file']);
    });

    it('reports a directory that cannot be listed and keeps its siblings', async () => {
      await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'));
      await ws.write('products/demo/items/task/0000/TSK-1.md', itemDoc({ id: 'TSK-1' }));
      const locked = new LockedDirsFileSystem([path.join(ws.productsRoot, 'demo', 'items', 'task')]);

      const cache = await managerOver(locked).ensureLoaded('demo');
      expect(cache.allItems.map((r) => r.id)).toEqual(['US-1', '']);
      expect(cache.warnings).toEqual(['Invalid item: items/task - Failed to open file']);
    });

    it('follows symlinked item files and topic directories', async () => {
      await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'));
      const shared = await ws.write('shared/US-2.md', story('US-2'));
      await ws.link(shared, 'products/demo/items/story/0000/US-2.md');
      const topicDir = path.dirname(await ws.write('elsewhere/search/manifest.json', JSON.stringify({ topic: 'search' })));
      await ws.link(topicDir, 'topics/search');

      const cache = await manager.ensureLoaded('demo');
      expect(cache.allItems.map((r) => [r.id, r.relativePath])).toEqual([
        ['US-1', 'items/story/0000/US-1.md'],
        ['US-2', 'items/story/0000/US-2.md'],
        ['TOPIC-search', 'topics/search/manifest.json'],
      ]);
    });

    it('does not descend into symlinked directories under items/', async () => {
      await ws.write('products/demo/items/story/0000/US-1.md', story('US-1'));
      const outside = path.dirname(await ws.write('outside/0000/US-3.md', story('US-3')));
      await ws.link(path.dirname(outside), 'products/demo/items/linked');

      const cache = await manager.ensureLoaded('demo');
      expect(cache.allItems.map((r) => r.id)).toEqual(['US-1']);
    });
  });
});
