/**
 * Report service - plain-text tables and the HTML email body
 * Pure functions: no I/O, output depends only on the input.
 */

import { formatDelta, formatQuantity, subQuantity, toQuantity } from '../types/decimal.js';
import type { CartridgeStatusRow, StockChange, StockRecord } from '../types/inventory.js';

const NAME_WIDTH = 40;
const QTY_WIDTH = 10;

function byNameThenId<T extends { id: number; name: string }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id - b.id;
}

/** Fixed-width stock table: name padded, quantity right-aligned to 2 decimals */
export function formatTable(records: StockRecord[]): string {
  const lines = [
    `${'Product'.padEnd(NAME_WIDTH)}  ${'Quantity'.padStart(QTY_WIDTH)}`,
    '-'.repeat(NAME_WIDTH + 2 + QTY_WIDTH),
  ];
  for (const record of [...records].sort(byNameThenId)) {
    lines.push(
      `${record.name.padEnd(NAME_WIDTH)}  ${formatQuantity(record.quantity).padStart(QTY_WIDTH)}`
    );
  }
  return lines.join('\n');
}

/** Legacy cartridge report, same text in both formats */
export function formatCartridgeReport(rows: CartridgeStatusRow[]): { text: string; html: string } {
  let text = '';
  for (const row of rows) {
    text +=
      `    ${row.cartridge.padEnd(20)}  ` +
      `${`(${row.letter})`.padEnd(4)}  ` +
      `${row.part}  ` +
      `${`${row.level}%`.padStart(5)}  ` +
      `${row.status}\n`;
  }
  return { text, html: `<pre>${escapeHtml(text)}</pre>` };
}

/** quantity <= threshold */
export function findLowStock(records: StockRecord[], threshold: number): StockRecord[] {
  return records.filter((r) => r.quantity <= threshold).sort(byNameThenId);
}

/** Changed, new and vanished products between two snapshots */
export function diffSnapshots(current: StockRecord[], previous: StockRecord[]): StockChange[] {
  const before = new Map(previous.map((r) => [r.id, r] as const));
  const after = new Map(current.map((r) => [r.id, r] as const));
  const changes: StockChange[] = [];

  for (const [id, cur] of after) {
    const prev = before.get(id);
    const prevQty = toQuantity(prev?.quantity ?? 0);
    const delta = subQuantity(toQuantity(cur.quantity), prevQty);
    // a difference that prints as 0.00 is float noise from the REAL column
    if (prev && delta.toDecimalPlaces(2).isZero()) continue;
    changes.push({
      id,
      name: cur.name,
      previous: prev ? prev.quantity : null,
      current: cur.quantity,
      delta: delta.toNumber(),
    });
  }
  for (const [id, then] of before) {
    if (after.has(id)) continue;
    changes.push({
      id,
      name: then.name,
      previous: then.quantity,
      current: null,
      delta: toQuantity(then.quantity).negated().toNumber(),
    });
  }

  return changes.sort(byNameThenId);
}

/** Product, previous, current, signed delta; `-` marks a missing side */
export function formatChanges(changes: StockChange[]): string {
  const cell = (v: number | null): string => (v === null ? '-' : formatQuantity(v));
  const lines = [
    `${'Product'.padEnd(NAME_WIDTH)}  ${'Previous'.padStart(QTY_WIDTH)}  ` +
      `${'Current'.padStart(QTY_WIDTH)}  ${'Change'.padStart(QTY_WIDTH)}`,
    '-'.repeat(NAME_WIDTH + 3 * (QTY_WIDTH + 2)),
  ];
  for (const c of changes) {
    lines.push(
      `${c.name.padEnd(NAME_WIDTH)}  ${cell(c.previous).padStart(QTY_WIDTH)}  ` +
        `${cell(c.current).padStart(QTY_WIDTH)}  ${formatDelta(c.delta).padStart(QTY_WIDTH)}`
    );
  }
  return lines.join('\n');
}

export interface ReportEmailInput {
  day: string;
  previousDay: string | null;
  records: StockRecord[];
  low: StockRecord[];
  changes: StockChange[];
}

/** Email subject + HTML body: low stock, then changes, then overall levels */
export function buildReportEmail(input: ReportEmailInput): { subject: string; html: string } {
  const subject =
    input.low.length > 0
      ? `Stock running low: ${input.low.length} item(s) to reorder`
      : `Inventory changes for ${input.day}`;

  const sections: string[] = [];
  if (input.low.length > 0) {
    sections.push(
      '<p>Time to reorder the following items</p>',
      `<pre>${escapeHtml(formatTable(input.low))}</pre>`
    );
  }
  if (input.changes.length > 0) {
    const since = input.previousDay ? ` since ${input.previousDay}` : '';
    sections.push(
      `<p>Stock changes${escapeHtml(since)}</p>`,
      `<pre>${escapeHtml(formatChanges(input.changes))}</pre>`
    );
  }
  sections.push(
    `<p>These are the overall stock levels for ${escapeHtml(input.day)}</p>`,
    `<pre>${escapeHtml(formatTable(input.records))}</pre>`
  );

  return { subject, html: sections.join('\n') };
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
