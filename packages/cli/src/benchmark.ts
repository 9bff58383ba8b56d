// ============================================================================
// StateMap Benchmark
// ============================================================================
//
// Times point lookups and inserts on a generated room, for StateMap and for
// a naive Map<type, Map<stateKey, value>> baseline:
//   get_well_known — m.room.power_levels / ""
//   get_member     — m.room.member / a present user
//   get_other      — a custom type
//   get_missing    — a type the room has never seen
//   insert         — overwrite of a well-known entry
//
// ============================================================================

import { Interner, StateMap, TYPE_MEMBER, TYPE_POWER_LEVELS, timer } from '@statemap/core';
import { DEFAULT_SEED, generateRoomState, memberId } from './generators.js';

export interface BenchOptions {
  members: number;
  iterations: number;
  seed?: number;
}

export type BenchImpl = 'statemap' | 'naive';

export interface BenchRow {
  name: string;
  impl: BenchImpl;
  iterations: number;
  totalMs: number;
  nsPerOp: number;
}

/** Common surface of the two implementations under test. */
interface Subject {
  get(eventType: string, stateKey: string): string | undefined;
  insert(eventType: string, stateKey: string, value: string): void;
}

class NaiveState implements Subject {
  private state = new Map<string, Map<string, string>>();

  get(eventType: string, stateKey: string): string | undefined {
    return this.state.get(eventType)?.get(stateKey);
  }

  insert(eventType: string, stateKey: string, value: string): void {
    let group = this.state.get(eventType);
    if (!group) {
      group = new Map();
      this.state.set(eventType, group);
    }
    group.set(stateKey, value);
  }
}

type Operation = [name: string, run: (subject: Subject) => unknown];

function operations(members: number): Operation[] {
  const member = memberId(Math.floor(members / 2));
  return [
    ['get_well_known', (s) => s.get(TYPE_POWER_LEVELS, '')],
    ['get_member', (s) => s.get(TYPE_MEMBER, member)],
    ['get_other', (s) => s.get('fooooo', '')],
    ['get_missing', (s) => s.get('missing', '')],
    ['insert', (s) => s.insert(TYPE_POWER_LEVELS, '', '$replacement')],
  ];
}

function measure(
  name: string,
  impl: BenchImpl,
  subject: Subject,
  iterations: number,
  run: Operation[1],
): BenchRow {
  let sink = 0;
  const t = timer(`${impl} ${name}`);
  for (let i = 0; i < iterations; i++) {
    if (run(subject) !== undefined) sink++;
  }
  const totalMs = t.endWith({ iterations, sink });
  return {
    name,
    impl,
    iterations,
    totalMs,
    nsPerOp: iterations > 0 ? (totalMs * 1e6) / iterations : 0,
  };
}

/**
 * Run every operation against both implementations.
 * Rows are ordered by operation, StateMap before the baseline.
 */
export function runBenchmark(options: BenchOptions): BenchRow[] {
  const entries = generateRoomState(options.members, options.seed ?? DEFAULT_SEED);
  const subjects: [BenchImpl, Subject][] = [
    ['statemap', StateMap.from(entries, { interner: new Interner() })],
    ['naive', buildNaive(entries)],
  ];

  const rows: BenchRow[] = [];
  for (const [name, run] of operations(options.members)) {
    for (const [impl, subject] of subjects) {
      rows.push(measure(name, impl, subject, options.iterations, run));
    }
  }
  return rows;
}

function buildNaive(entries: Iterable<readonly [string, string, string]>): NaiveState {
  const naive = new NaiveState();
  for (const [eventType, stateKey, value] of entries) naive.insert(eventType, stateKey, value);
  return naive;
}

/** Render rows as a fixed-width table. */
export function formatBenchReport(rows: BenchRow[]): string {
  const header = `${'operation'.padEnd(16)}${'impl'.padEnd(10)}${'ns/op'.padStart(12)}`;
  const lines = rows.map(
    (r) => `${r.name.padEnd(16)}${r.impl.padEnd(10)}${r.nsPerOp.toFixed(1).padStart(12)}`,
  );
  return [header, '-'.repeat(header.length), ...lines].join('\n');
}
