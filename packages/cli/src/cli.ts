#!/usr/bin/env node
// ============================================================================
// @statemap/cli — Room state container tooling
// ============================================================================
// Commands:
//   statemap bench [--members 1000] [--iterations 100000] [--seed 42]
//                                        → lookup/insert timings vs a naive map
//   statemap stats <snapshot.json>       → entry and interning summary
//   statemap help                        → this text
// ============================================================================

import { readFileSync } from 'node:fs';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import { runBenchmark, formatBenchReport } from './benchmark.js';
import { DEFAULT_SEED } from './generators.js';
import { formatStats, snapshotStats } from './stats.js';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export const USAGE = `Usage:
  statemap bench [--members N] [--iterations N] [--seed N]   Time StateMap against a naive map
  statemap stats <snapshot.json>                             Summarise a state snapshot
  statemap help                                              Show this help`;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function getCount(args: string[], name: string, fallback: number): number {
  const raw = getFlag(args, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--${name} must be a positive integer`);
  }
  return n;
}

function getSeed(args: string[]): number {
  const raw = getFlag(args, 'seed');
  if (raw === undefined) return DEFAULT_SEED;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error('--seed must be a non-negative integer');
  }
  return n;
}

function benchCommand(args: string[], io: CliIO): number {
  const rows = runBenchmark({
    members: getCount(args, 'members', 1000),
    iterations: getCount(args, 'iterations', 100_000),
    seed: getSeed(args),
  });
  io.out(formatBenchReport(rows));
  return 0;
}

function statsCommand(args: string[], io: CliIO): number {
  const inputPath = args[1];
  if (!inputPath) {
    io.err('Usage: statemap stats <snapshot.json>');
    return 1;
  }
  const input: unknown = JSON.parse(readFileSync(inputPath, 'utf-8'));
  io.out(formatStats(snapshotStats(input)));
  return 0;
}

/**
 * Run a CLI command. Returns the process exit code.
 */
export function run(args: string[], io: CliIO = consoleIO): number {
  const command = args[0];
  try {
    switch (command) {
      case 'bench':
        return benchCommand(args, io);
      case 'stats':
        return statsCommand(args, io);
      case undefined:
      case 'help':
      case '--help':
        io.out(USAGE);
        return 0;
      default:
        io.err(`Unknown command: ${command}`);
        io.err(USAGE);
        return 1;
    }
  } catch (error: unknown) {
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

const isMain = process.argv[1] ? fileURLToPath(import.meta.url) === process.argv[1] : false;

if (isMain) {
  process.exitCode = run(process.argv.slice(2));
}
