import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type CliIO, USAGE, run } from '../cli.js';

// ============================================================================
// CLI Tests
// ============================================================================

function captureIO(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => stdout.push(text),
    err: (text) => stderr.push(text),
  };
}

describe('statemap CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'statemap-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): string {
    const file = path.join(dir, name);
    writeFileSync(file, JSON.stringify(value));
    return file;
  }

  it('prints usage without a command', () => {
    const io = captureIO();
    expect(run([], io)).toBe(0);
    expect(io.stdout).toEqual([USAGE]);
  });

  it('rejects unknown commands', () => {
    const io = captureIO();
    expect(run(['frobnicate'], io)).toBe(1);
    expect(io.stderr).toEqual(['Unknown command: frobnicate', USAGE]);
    expect(io.stdout).toEqual([]);
  });

  describe('stats', () => {
    it('summarises a snapshot', () => {
      const file = writeJson('state.json', {
        version: 1,
        entries: [
          ['m.room.member', '@a:example.org', '$1'],
          ['m.room.member', '@b:example.org', '$2'],
          ['m.room.create', '', '$3'],
        ],
      });
      const io = captureIO();

      expect(run(['stats', file], io)).toBe(0);
      expect(io.stdout).toEqual([
        [
          'entries:          3',
          'interned strings: 5',
          'event types:      2',
          '       2  m.room.member',
          '       1  m.room.create',
        ].join('\n'),
      ]);
    });

    it('accepts numeric values', () => {
      const file = writeJson('state.json', {
        version: 1,
        entries: [['m.room.name', '', 10]],
      });
      const io = captureIO();

      expect(run(['stats', file], io)).toBe(0);
      expect(io.stdout[0].split('\n')[0]).toBe('entries:          1');
    });

    it('reports an invalid snapshot', () => {
      const file = writeJson('bad.json', { version: 2, entries: [] });
      const io = captureIO();

      expect(run(['stats', file], io)).toBe(1);
      expect(io.stderr).toHaveLength(1);
      expect(io.stderr[0].startsWith('Error: Invalid state snapshot at $.version:')).toBe(true);
    });

    it('requires a path', () => {
      const io = captureIO();
      expect(run(['stats'], io)).toBe(1);
      expect(io.stderr).toEqual(['Usage: statemap stats <snapshot.json>']);
    });
  });

  describe('bench', () => {
    it('prints a row per operation and implementation', () => {
      const io = captureIO();
      expect(run(['bench', '--members', '5', '--iterations', '10'], io)).toBe(0);

      const lines = io.stdout[0].split('\n');
      expect(lines).toHaveLength(12);
      expect(lines[0]).toBe('operation       impl             ns/op');
      expect(lines[2].startsWith('get_well_known  statemap  ')).toBe(true);
      expect(lines[3].startsWith('get_well_known  naive     ')).toBe(true);
    });

    it('validates numeric flags', () => {
      const io = captureIO();
      expect(run(['bench', '--members', 'lots'], io)).toBe(1);
      expect(io.stderr).toEqual(['Error: --members must be a positive integer']);
    });

    it('accepts a zero seed', () => {
      const io = captureIO();
      expect(run(['bench', '--members', '5', '--iterations', '10', '--seed', '0'], io)).toBe(0);
      expect(io.stderr).toEqual([]);
      expect(io.stdout[0].split('\n')).toHaveLength(12);
    });

    it('rejects a negative seed', () => {
      const io = captureIO();
      expect(run(['bench', '--seed', '-3'], io)).toBe(1);
      expect(io.stderr).toEqual(['Error: --seed must be a non-negative integer']);
    });
  });

  it('is reachable from the workspace scripts', () => {
    const pkg: unknown = JSON.parse(
      readFileSync(new URL('../../../../package.json', import.meta.url), 'utf-8'),
    );
    expect(pkg).toMatchObject({
      scripts: {
        bench: 'tsx packages/cli/src/cli.ts bench',
        stats: 'tsx packages/cli/src/cli.ts stats',
      },
    });
  });
});
