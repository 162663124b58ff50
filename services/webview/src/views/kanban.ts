import type { Lane } from '../contracts/backlogService';

const LANE_BY_STATE = new Map<string, Lane>([
  ['inprogress', 'Doing'],
  ['active', 'Doing'],
  ['blocked', 'Blocked'],
  ['review', 'Review'],
  ['done', 'Done'],
  ['closed', 'Done'],
]);

/** Case-insensitive; anything unrecognised (including the default `Proposed`) is Backlog. */
export function laneFor(state: string): Lane {
  return LANE_BY_STATE.get(state.toLowerCase()) ?? 'Backlog';
}

export function buildKanban<T extends { state: string }>(items: T[]): Record<Lane, T[]> {
  const lanes: Record<Lane, T[]> = { Backlog: [], Doing: [], Blocked: [], Review: [], Done: [] };
  for (const item of items) {
    lanes[laneFor(item.state)].push(item);
  }
  return lanes;
}
