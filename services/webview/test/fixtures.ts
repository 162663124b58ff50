import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { itemDoc, type TempWorkspace } from './helpers/workspace';

export const JAN = new Date('2024-01-01T00:00:00Z');
export const FEB = new Date('2024-02-01T00:00:00Z');

/**
 * Seeds the `demo` product used by the service and route tests:
 * an epic with a story that exists twice, an orphaned task, one broken file and a decision.
 * Also adds `other` (empty items/) and `noitems` (no items/ at all).
 */
export async function seedDemoWorkspace(ws: TempWorkspace): Promise<void> {
  await ws.write(
    'products/demo/items/epic/0000/EPIC-1.md',
    itemDoc({ id: 'EPIC-1', type: 'Epic', title: 'Platform', state: 'Active', updated: '2024-01-01' }),
    JAN,
  );
  await ws.write(
    'products/demo/items/story/0000/US-1.md',
    itemDoc({ id: 'US-1', type: 'UserStory', title: 'Login', state: 'InProgress', parent: 'EPIC-1', updated: '2024-01-02' }, '# Login'),
    JAN,
  );
  await ws.write(
    'products/demo/items/story/0001/US-1.md',
    itemDoc({ id: 'US-1', type: 'UserStory', title: 'Login (old)', state: 'Proposed', parent: 'EPIC-1', updated: '2024-01-01' }),
    JAN,
  );
  await ws.write(
    'products/demo/items/task/0000/TSK-1.md',
    itemDoc({ id: 'TSK-1', type: 'Task', title: 'Wire cache', state: 'Done', parent: 'GHOST' }),
    JAN,
  );
  await ws.write('products/demo/items/task/0000/broken.md', 'oops', JAN);
  await ws.write('products/demo/decisions/ADR-1.md', itemDoc({ status: 'Accepted', date: '2024-01-15' }), FEB);

  await mkdir(path.join(ws.productsRoot, 'other', 'items'), { recursive: true });
  await mkdir(path.join(ws.productsRoot, 'noitems'), { recursive: true });
  await writeFile(path.join(ws.productsRoot, 'notes.txt'), 'not a product');
}

export const BROKEN_WARNING = 'Invalid item: items/task/0000/broken.md - Missing frontmatter start marker';
