import type { TreeNode } from '../contracts/backlogService';
import type { ItemId, ItemRecord } from '../types';

export const HIERARCHY_TYPES: ReadonlySet<string> = new Set([
  'Epic',
  'Feature',
  'UserStory',
  'Task',
  'Bug',
  'Theme',
]);

export interface TreeBuild {
  roots: TreeNode[];
  warnings: string[];
}

type TreeInput = Pick<ItemRecord, 'id' | 'title' | 'type' | 'state' | 'parent'>;

/**
 * Assembles the parent/child forest from primary records.
 *
 * Items whose parent is missing (or not a hierarchy type) become roots. Every node is
 * placed at most once; a child edge back into the branch being expanded is reported as
 * a cycle and not followed. Nodes only reachable through a cycle are promoted to roots
 * in a second pass so that none is dropped. Roots and children keep input order.
 */
export function buildTree(items: TreeInput[]): TreeBuild {
  const eligible = items.filter((item) => item.id && HIERARCHY_TYPES.has(item.type));
  const byId = new Map<ItemId, TreeInput>();
  for (const item of eligible) {
    if (!byId.has(item.id)) byId.set(item.id, item);
  }

  const warnings: string[] = [];
  const childIds = new Map<ItemId, ItemId[]>();
  for (const item of eligible) {
    if (!item.parent) continue;
    const siblings = childIds.get(item.parent);
    if (siblings) siblings.push(item.id);
    else childIds.set(item.parent, [item.id]);
    if (!byId.has(item.parent)) {
      warnings.push(`Orphan parent missing for item ${item.id}: ${item.parent}`);
    }
  }

  const visiting = new Set<ItemId>();
  const visited = new Set<ItemId>();

  const expand = (item: TreeInput): TreeNode => {
    visiting.add(item.id);
    visited.add(item.id);
    const node: TreeNode = {
      id: item.id,
      title: item.title,
      type: item.type,
      state: item.state,
      parent: item.parent,
      children: [],
    };

    for (const childId of childIds.get(item.id) ?? []) {
      const child = byId.get(childId);
      if (!child) continue;
      if (visiting.has(childId)) {
        warnings.push(`Cycle detected at ${childId}`);
        continue;
      }
      if (visited.has(childId)) continue;
      node.children.push(expand(child));
    }

    visiting.delete(item.id);
    return node;
  };

  const roots: TreeNode[] = [];
  for (const item of eligible) {
    const isRoot = !item.parent || !byId.has(item.parent);
    if (isRoot && !visited.has(item.id)) roots.push(expand(item));
  }
  for (const item of eligible) {
    if (!visited.has(item.id)) roots.push(expand(item));
  }

  return { roots, warnings };
}
