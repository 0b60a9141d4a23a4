/**
 * Snapshot service - daily inventory snapshot, one row per (day, product id)
 * Day boundaries use local time: the capture stamp and the day predicate are
 * both formatted from the same Date on the application side.
 */

import { format, parse } from 'date-fns';
import type { Pool } from 'pg';
import { withTransaction } from '../lib/db.js';
import { pgToQuantity } from '../lib/pg-decimal.js';
import { StorageError } from '../errors.js';
import type { StockRecord } from '../types/inventory.js';

const DAY_FORMAT = 'yyyy-MM-dd';
const STAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
/** inventory.name is VARCHAR(255) */
export const NAME_MAX_LENGTH = 255;

interface InventoryRow {
  id: number;
  name: string;
  quantity: number | string;
}

/** Local calendar day of a Date, e.g. 2026-10-19 */
export function snapshotDay(date: Date): string {
  return format(date, DAY_FORMAT);
}

/** 19-char local capture stamp stored in inventory.date */
export function captureStamp(date: Date): string {
  return format(date, STAMP_FORMAT);
}

/** yyyy-MM-dd → local midnight */
export function parseSnapshotDay(day: string): Date {
  return parse(day, DAY_FORMAT, new Date());
}

/** CREATE TABLE IF NOT EXISTS - safe to call on every run */
export async function ensureSchema(pool: Pool): Promise<void> {
  try {
    await pool.query(
      `CREATE TABLE IF NOT EXISTS inventory (
         date CHAR(19) NOT NULL,
         id INT NOT NULL,
         name VARCHAR(255) NOT NULL,
         quantity REAL NOT NULL
       )`
    );
  } catch (err) {
    throw new StorageError(`Could not create inventory table: ${(err as Error).message}`, err);
  }
}

/**
 * Today's rows are deleted and rewritten inside one transaction.
 * Repeated ids collapse to the last record so the day stays one row per id.
 * Names longer than the column are cut to fit.
 */
export async function replaceToday(
  pool: Pool,
  records: StockRecord[],
  now: Date = new Date()
): Promise<{ day: string; inserted: number }> {
  const day = snapshotDay(now);
  const stamp = captureStamp(now);
  const unique = [...new Map(records.map((r) => [r.id, r] as const)).values()];

  try {
    await withTransaction(pool, async (client) => {
      await client.query(`DELETE FROM inventory WHERE LEFT(date, 10) = $1`, [day]);
      for (const record of unique) {
        await client.query(
          `INSERT INTO inventory (date, id, name, quantity) VALUES ($1, $2, $3, $4)`,
          [stamp, record.id, record.name.slice(0, NAME_MAX_LENGTH), record.quantity]
        );
      }
    });
  } catch (err) {
    throw new StorageError(
      `Snapshot for ${day} rolled back: ${(err as Error).message}`,
      err
    );
  }

  await compact(pool);
  return { day, inserted: unique.length };
}

/** Rows stored for the given local day; [] when there are none */
export async function fetchSnapshot(pool: Pool, forDate: Date): Promise<StockRecord[]> {
  const day = snapshotDay(forDate);
  try {
    const result = await pool.query<InventoryRow>(
      `SELECT id, name, quantity FROM inventory
       WHERE LEFT(date, 10) = $1
       ORDER BY name, id`,
      [day]
    );
    return result.rows.map((row) => ({
      id: Number(row.id),
      name: row.name,
      quantity: pgToQuantity(row.quantity)?.toNumber() ?? 0,
    }));
  } catch (err) {
    throw new StorageError(`Could not read snapshot for ${day}: ${(err as Error).message}`, err);
  }
}

/** Most recent stored day strictly before `before`, or the latest day at all */
export async function findPreviousSnapshotDay(
  pool: Pool,
  before?: Date
): Promise<string | null> {
  try {
    const result = before
      ? await pool.query<{ day: string | null }>(
          `SELECT MAX(LEFT(date, 10)) AS day FROM inventory WHERE LEFT(date, 10) < $1`,
          [snapshotDay(before)]
        )
      : await pool.query<{ day: string | null }>(
          `SELECT MAX(LEFT(date, 10)) AS day FROM inventory`
        );
    return result.rows[0]?.day ?? null;
  } catch (err) {
    throw new StorageError(`Could not look up previous snapshot: ${(err as Error).message}`, err);
  }
}

/** Space reclaim after the daily delete; not part of the snapshot contract */
async function compact(pool: Pool): Promise<void> {
  try {
    await pool.query('VACUUM inventory');
  } catch (err) {
    console.warn(`[inventory-check] VACUUM inventory skipped: ${(err as Error).message}`);
  }
}
