/**
 * Orchestrator - one run of the inventory check
 * normal: schema → catalog fetch → replace today → print → diff → email
 * status: print the most recent stored snapshot, nothing fetched or written
 * debug:  fixed diagnostic only
 */

import type { Pool } from 'pg';
import type { AppConfig } from '../config.js';
import { fetchInventory, type FetchLike } from './catalog.service.js';
import {
  ensureSchema,
  fetchSnapshot,
  findPreviousSnapshotDay,
  parseSnapshotDay,
  replaceToday,
} from './snapshot.service.js';
import { buildReportEmail, diffSnapshots, findLowStock, formatTable } from './report.service.js';
import type { Notifier } from './notifier.service.js';
import type { StockChange, StockRecord } from '../types/inventory.js';

export const DEBUG_DIAGNOSTIC = 'Inventory Status';
export const NO_SNAPSHOT_MESSAGE = 'No snapshot stored yet';

export interface RunOptions {
  debug: boolean;
  printOutput: boolean;
  status: boolean;
}

export interface RunDeps {
  config: AppConfig;
  pool: Pool;
  notifier: Notifier;
  fetchImpl?: FetchLike;
  now?: () => Date;
  write?: (text: string) => void;
}

export type RunSummary =
  | { mode: 'debug' }
  | { mode: 'status'; day: string | null; records: number }
  | {
      mode: 'snapshot';
      day: string;
      records: number;
      previousDay: string | null;
      changes: number;
      low: number;
      /** null when there was nothing worth emailing */
      emailed: boolean | null;
    };

export async function run(options: RunOptions, deps: RunDeps): Promise<RunSummary> {
  const write = deps.write ?? ((text: string) => console.log(text));
  const now = deps.now ? deps.now() : new Date();

  if (options.debug) {
    write(DEBUG_DIAGNOSTIC);
    return { mode: 'debug' };
  }

  await ensureSchema(deps.pool);

  if (options.status) {
    const day = await findPreviousSnapshotDay(deps.pool);
    if (!day) {
      write(NO_SNAPSHOT_MESSAGE);
      return { mode: 'status', day: null, records: 0 };
    }
    const records = await fetchSnapshot(deps.pool, parseSnapshotDay(day));
    write(`Stock levels for ${day}\n${formatTable(records)}`);
    return { mode: 'status', day, records: records.length };
  }

  const records = await fetchInventory(deps.config.catalog, deps.fetchImpl);
  const { day } = await replaceToday(deps.pool, records, now);

  if (options.printOutput) {
    write(formatTable(records));
  }

  // compare stored against stored: both sides went through the REAL column
  const stored = await fetchSnapshot(deps.pool, now);
  const previousDay = await findPreviousSnapshotDay(deps.pool, now);
  let changes: StockChange[] = [];
  if (previousDay) {
    const previous: StockRecord[] = await fetchSnapshot(deps.pool, parseSnapshotDay(previousDay));
    changes = diffSnapshots(stored, previous);
  }
  const low = findLowStock(stored, deps.config.lowStockThreshold);

  let emailed: boolean | null = null;
  if (low.length > 0 || changes.length > 0) {
    const email = buildReportEmail({ day, previousDay, records: stored, low, changes });
    // failure is recorded in the summary, never raised
    const sent = await deps.notifier.send(email.subject, email.html);
    emailed = sent.ok;
  }

  return {
    mode: 'snapshot',
    day,
    records: stored.length,
    previousDay,
    changes: changes.length,
    low: low.length,
    emailed,
  };
}
