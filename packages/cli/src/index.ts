// ============================================================================
// @statemap/cli — Public API
// ============================================================================

export { run, USAGE } from './cli.js';
export type { CliIO } from './cli.js';
export { runBenchmark, formatBenchReport } from './benchmark.js';
export type { BenchOptions, BenchRow, BenchImpl } from './benchmark.js';
export { snapshotStats, formatStats } from './stats.js';
export type { SnapshotStats, EventTypeCount } from './stats.js';
export { generateRoomState, seededRandom, memberId, CUSTOM_STATE, DEFAULT_SEED } from './generators.js';
