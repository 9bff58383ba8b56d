// ============================================================================
// Snapshot Statistics
// ============================================================================

import { Interner, restoreStateMap } from '@statemap/core';
import { z } from 'zod';

/** Values accepted in snapshots read by the CLI: event IDs or numeric IDs. */
const snapshotValue = z.union([z.string(), z.number()]);

export interface EventTypeCount {
  type: string;
  count: number;
}

export interface SnapshotStats {
  entries: number;
  internedStrings: number;
  /** Sorted by count descending, then type ascending */
  eventTypes: EventTypeCount[];
}

/**
 * Restore a snapshot onto a private interner and summarise it.
 * @throws {SnapshotValidationError} If `input` is not a valid snapshot
 */
export function snapshotStats(input: unknown): SnapshotStats {
  const state = restoreStateMap(input, snapshotValue, { interner: new Interner() });

  const eventTypes: EventTypeCount[] = [];
  for (const type of state.eventTypes()) {
    eventTypes.push({ type, count: [...state.iterEventType(type)].length });
  }
  eventTypes.sort((a, b) => b.count - a.count || (a.type < b.type ? -1 : a.type > b.type ? 1 : 0));

  return {
    entries: state.size,
    internedStrings: state.interner.size,
    eventTypes,
  };
}

export function formatStats(stats: SnapshotStats): string {
  const lines = [
    `entries:          ${stats.entries}`,
    `interned strings: ${stats.internedStrings}`,
    `event types:      ${stats.eventTypes.length}`,
  ];
  for (const { type, count } of stats.eventTypes) {
    lines.push(`  ${String(count).padStart(6)}  ${type}`);
  }
  return lines.join('\n');
}
