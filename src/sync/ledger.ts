/**
 * Mark ledger: the persisted commit correspondence between the stores.
 *
 * Each registration owns two marks tables: the one the source store writes
 * (`sourceMarksPath`) and the one the aggregate store writes
 * (`aggregateMarksPath`). The stores read and write them through their own
 * `--import-marks` / `--export-marks` options; the ledger only decides which
 * file goes where, reads them back for verification and deletes them on reset.
 */

import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { ExternalToolFailureError } from '../errors.js';
import type { ErrorContext } from '../errors.js';
import { getLog } from '../logger.js';
import type { Direction, MarksMode, NormalizedPath, StoreSide, SubtreeRegistration } from '../types.js';
import type { MarksFiles } from './stores.js';

const log = getLog('ledger');

/** Typed key of one marks table. */
export interface MarkTableRef {
  path: NormalizedPath;
  side: StoreSide;
}

export interface MarkTableLocation extends MarkTableRef {
  file: string;
}

/** mark number → revision identifier */
export type MarkTable = Map<number, string>;

export interface LedgerSnapshot {
  source: MarkTable;
  aggregate: MarkTable;
}

/** File of the table addressed by `side`. */
export function marksFile(registration: SubtreeRegistration, side: StoreSide): string {
  return side === 'source' ? registration.sourceMarksPath : registration.aggregateMarksPath;
}

function locate(registration: SubtreeRegistration, side: StoreSide): MarkTableLocation {
  return { path: registration.path, side, file: marksFile(registration, side) };
}

/** Marks tables of the exporting and the importing store for a direction. */
export function pathsFor(
  registration: SubtreeRegistration,
  direction: Direction,
): { producer: MarkTableLocation; consumer: MarkTableLocation } {
  if (direction === 'source-to-aggregate') {
    return { producer: locate(registration, 'source'), consumer: locate(registration, 'aggregate') };
  }
  return { producer: locate(registration, 'aggregate'), consumer: locate(registration, 'source') };
}

/**
 * Marks options for one side of a transfer.
 * `resume` reads an existing table; both modes write it back.
 */
export function marksArgs(file: string, mode: MarksMode): MarksFiles {
  return {
    importMarks: mode === 'resume' && existsSync(file) ? file : null,
    exportMarks: file,
  };
}

// `:12 <sha>` (git) or `c345 :12 <hash>` (fossil)
const MARK_LINE_RE = /^(?:[a-z]\d+\s+)?:(\d+)\s+(\S+)\s*$/;

/** Parse a marks file. Lines that are not mark records are skipped. */
export function parseMarks(text: string): MarkTable {
  const table: MarkTable = new Map();
  for (const line of text.split('\n')) {
    const match = MARK_LINE_RE.exec(line);
    if (match) {
      table.set(Number(match[1]), match[2]);
    }
  }
  return table;
}

/** Read a marks table; empty when the file does not exist yet. */
export function loadMarks(registration: SubtreeRegistration, side: StoreSide): MarkTable {
  const file = marksFile(registration, side);
  if (!existsSync(file)) return new Map();
  return parseMarks(readFileSync(file, 'utf-8'));
}

export function snapshot(registration: SubtreeRegistration): LedgerSnapshot {
  return {
    source: loadMarks(registration, 'source'),
    aggregate: loadMarks(registration, 'aggregate'),
  };
}

/** Number of marks added between two snapshots, per side. */
export function growth(before: LedgerSnapshot, after: LedgerSnapshot): { source: number; aggregate: number } {
  return {
    source: after.source.size - before.source.size,
    aggregate: after.aggregate.size - before.aggregate.size,
  };
}

/**
 * Fail when a transfer dropped or remapped a mark that existed before it.
 */
export function assertAppendOnly(before: LedgerSnapshot, after: LedgerSnapshot, context: ErrorContext = {}): void {
  for (const side of ['source', 'aggregate'] as const) {
    for (const [mark, revision] of before[side]) {
      const now = after[side].get(mark);
      if (now !== revision) {
        throw new ExternalToolFailureError(
          `Marks table (${side}) was rewritten: mark :${mark} changed from ${revision} to ${now ?? 'nothing'}`,
          'MARKS_REWRITTEN',
          { context: { ...context, side, mark } },
        );
      }
    }
  }
}

/**
 * Drop every mark whose source revision fails `keep`, from both tables, so
 * the source table only names commits a fresh clone contains. The tables
 * share mark numbers, so a mark leaves both or neither. Returns the dropped
 * marks in ascending order.
 */
export function pruneMarks(registration: SubtreeRegistration, keep: (revision: string) => boolean): number[] {
  const dropped = new Set<number>();
  for (const [mark, revision] of loadMarks(registration, 'source')) {
    if (!keep(revision)) dropped.add(mark);
  }
  if (dropped.size === 0) return [];

  for (const side of ['source', 'aggregate'] as const) {
    const file = marksFile(registration, side);
    if (!existsSync(file)) continue;
    const kept = readFileSync(file, 'utf-8')
      .split('\n')
      .filter((line) => {
        const match = MARK_LINE_RE.exec(line);
        return line.length > 0 && !(match && dropped.has(Number(match[1])));
      });
    writeFileSync(file, kept.length > 0 ? `${kept.join('\n')}\n` : '');
  }

  const marks = [...dropped].sort((a, b) => a - b);
  log.debug({ path: registration.path, marks }, `Dropped ${marks.length} mark(s) the source does not hold`);
  return marks;
}

/**
 * Delete both marks tables. The next sync of this subtree is a full transfer.
 * Returns the files that were removed.
 */
export function reset(registration: SubtreeRegistration): string[] {
  const removed: string[] = [];
  for (const side of ['source', 'aggregate'] as const) {
    const file = marksFile(registration, side);
    if (existsSync(file)) {
      rmSync(file);
      removed.push(file);
    }
  }
  log.warn({ path: registration.path, removed }, `Marks reset for ${registration.path}; the next sync re-transfers the full history`);
  return removed;
}
